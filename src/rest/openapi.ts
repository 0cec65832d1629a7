import { FEEDBACK_LEVELS, MODEL_TIERS } from "../evaluator/criteria.js";

const jsonBody = (schema: Record<string, unknown>) => ({
  required: true,
  content: { "application/json": { schema } },
});

const ok = (description: string, schemaRef?: string) => ({
  description,
  ...(schemaRef
    ? { content: { "application/json": { schema: { $ref: `#/components/schemas/${schemaRef}` } } } }
    : {}),
});

const textBody = jsonBody({
  type: "object",
  properties: { text: { type: "string" } },
  required: ["text"],
});

export const openApiSpec = {
  openapi: "3.1.0",
  info: {
    title: "Sentence Evaluator",
    description:
      "Evaluates sentences against 14 linguistic criteria for clarity and effectiveness using Gemini. " +
      "History and settings are kept per session, identified by the X-Session-Id header.",
    version: "1.2.0",
  },
  components: {
    schemas: {
      EvaluationRecord: {
        type: "object",
        properties: {
          timestamp: { type: "string", format: "date-time" },
          original_text: { type: "string" },
          feedback_text: { type: "string" },
          model_identifier: { type: "string" },
        },
        required: ["timestamp", "original_text", "feedback_text", "model_identifier"],
      },
      RatingView: {
        type: "object",
        properties: {
          value: { type: "number" },
          display: { type: "string", description: "e.g. 7.0/10" },
          progress: { type: "number", minimum: 0, maximum: 1 },
          caption: { type: "string" },
          band: { type: "string", enum: ["low", "mid", "high"] },
          color: { type: "string", enum: ["red", "orange", "green"] },
          out_of_range: { type: "boolean" },
        },
      },
      Settings: {
        type: "object",
        properties: {
          model: { type: "string", enum: [...MODEL_TIERS] },
          feedback_level: { type: "string", enum: [...FEEDBACK_LEVELS] },
          dark_mode: { type: "boolean" },
          temperature: { type: "number", minimum: 0, maximum: 1, multipleOf: 0.1 },
          max_tokens: { type: "integer", minimum: 100, maximum: 1000, multipleOf: 50 },
        },
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          warning: { type: "boolean" },
        },
        required: ["error"],
      },
    },
    securitySchemes: {
      ApiKeyAuth: { type: "apiKey", in: "header", name: "X-API-Key" },
    },
  },
  security: [{ ApiKeyAuth: [] }],
  paths: {
    "/api/models": {
      get: { operationId: "listModels", summary: "Selectable model tiers", responses: { "200": ok("Model tiers") } },
    },
    "/api/criteria": {
      get: { operationId: "getCriteria", summary: "The 14 evaluation rules, feedback levels and quick tips", responses: { "200": ok("Criteria") } },
    },
    "/api/settings": {
      get: { operationId: "getSettings", summary: "Session settings", responses: { "200": ok("Settings", "Settings") } },
      put: {
        operationId: "updateSettings",
        summary: "Update any subset of the session settings",
        requestBody: jsonBody({ $ref: "#/components/schemas/Settings" }),
        responses: { "200": ok("Updated settings", "Settings"), "400": ok("Invalid settings", "Error") },
      },
    },
    "/api/evaluate": {
      post: {
        operationId: "evaluateText",
        summary: "Evaluate one text. Model failures come back inline as feedback with ok=false.",
        requestBody: textBody,
        responses: { "200": ok("Feedback, rating view and the appended history record"), "400": ok("Blank text", "Error") },
      },
    },
    "/api/session": {
      get: { operationId: "getSession", summary: "Last evaluation of this session", responses: { "200": ok("Session id, creation time, last text, feedback and rating view") } },
    },
    "/api/batch": {
      post: {
        operationId: "evaluateBatch",
        summary: "Evaluate one sentence per line, sequentially, with concise feedback",
        requestBody: textBody,
        responses: { "200": ok("Sentence/feedback rows"), "400": ok("Blank input", "Error") },
      },
    },
    "/api/history": {
      get: { operationId: "listHistory", summary: "History entries, newest first", responses: { "200": ok("History entries") } },
      delete: { operationId: "clearHistory", summary: "Clear all history of this session", responses: { "200": ok("Number of records cleared") } },
    },
    "/api/history/stats": {
      get: { operationId: "getRatingStats", summary: "Count, average and best rating over rated records", responses: { "200": ok("Rating statistics") } },
    },
  },
};
