import { Router, type Response } from "express";
import { z } from "zod";
import {
  EVALUATION_CRITERIA,
  FEEDBACK_LEVELS,
  MODEL_OPTIONS,
  MODEL_TIERS,
  QUICK_TIPS,
  modelForTier,
} from "../evaluator/criteria.js";
import type { TextGenerator } from "../evaluator/gemini.js";
import { evaluateText } from "../evaluator/invoker.js";
import { runBatch } from "../evaluator/batch.js";
import { presentFeedback } from "../evaluator/rating.js";
import { computeRatingStats } from "../session/stats.js";
import { EMPTY_HISTORY_MESSAGE, listHistory } from "../session/history.js";
import { logRest } from "../logging.js";
import { getSession } from "./session.js";

export const BLANK_TEXT_WARNING = "Please enter text before clicking 'Analyze Text'.";
export const BLANK_BATCH_WARNING = "Please enter some text to analyze";
export const BATCH_COMPLETE_MESSAGE = "Analysis complete!";

export interface RouterDeps {
  generate: TextGenerator;
}

const textBodySchema = z.object({
  text: z.string({ required_error: "text is required", invalid_type_error: "text must be a string" }),
});

/** Creativity slider moves in 0.1 steps */
function isTenthStep(value: number): boolean {
  return Math.abs(value * 10 - Math.round(value * 10)) < 1e-9;
}

const settingsPatchSchema = z
  .object({
    model: z.enum(MODEL_TIERS),
    feedback_level: z.enum(FEEDBACK_LEVELS),
    dark_mode: z.boolean(),
    temperature: z.number().min(0).max(1).refine(isTenthStep, "temperature must move in steps of 0.1"),
    max_tokens: z.number().int().min(100).max(1000).multipleOf(50),
  })
  .partial()
  .strict();

function sendError(res: Response, e: unknown, context: string): void {
  const message = e instanceof Error ? e.message : String(e);
  logRest.error({ err: message }, `${context} failed`);
  res.status(500).json({ error: message });
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  router.get("/models", (_req, res) => {
    res.json({ models: MODEL_TIERS.map((tier) => MODEL_OPTIONS[tier]) });
  });

  router.get("/criteria", (_req, res) => {
    res.json({
      criteria: EVALUATION_CRITERIA.trim(),
      feedback_levels: FEEDBACK_LEVELS,
      quick_tips: QUICK_TIPS,
    });
  });

  router.get("/settings", (_req, res) => {
    res.json(getSession(res).settings());
  });

  router.put("/settings", (req, res) => {
    const parsed = settingsPatchSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid settings", issues: parsed.error.issues });
      return;
    }
    res.json(getSession(res).updateSettings(parsed.data));
  });

  // POST /evaluate — single text
  router.post("/evaluate", async (req, res) => {
    try {
      const parsed = textBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "text is required", issues: parsed.error.issues });
        return;
      }
      const { text } = parsed.data;
      if (text.trim().length === 0) {
        res.status(400).json({ error: BLANK_TEXT_WARNING, warning: true });
        return;
      }

      const session = getSession(res);
      const settings = session.settings();
      const outcome = await evaluateText(session, deps.generate, {
        text,
        model: modelForTier(settings.model),
        feedbackLevel: settings.feedback_level,
      });
      session.rememberLast(text, outcome.feedback);

      res.json({
        feedback: outcome.feedback,
        ok: outcome.ok,
        rating: presentFeedback(outcome.feedback).rating,
        record: outcome.record,
      });
    } catch (e: unknown) {
      sendError(res, e, "Evaluation");
    }
  });

  // GET /session — last evaluation of this session
  router.get("/session", (_req, res) => {
    const session = getSession(res);
    const last = session.last();
    res.json({
      session_id: session.id,
      created_at: session.createdAt,
      last_text: last?.text ?? null,
      last_feedback: last?.feedback ?? null,
      last_evaluated: session.lastTimestamp(),
      view: last ? presentFeedback(last.feedback) : null,
      quick_tips: last ? [] : QUICK_TIPS,
    });
  });

  // POST /batch — one sentence per line, evaluated sequentially
  router.post("/batch", async (req, res) => {
    try {
      const parsed = textBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "text is required", issues: parsed.error.issues });
        return;
      }
      if (parsed.data.text.trim().length === 0) {
        res.status(400).json({ error: BLANK_BATCH_WARNING, warning: true });
        return;
      }

      const session = getSession(res);
      const results = await runBatch(session, deps.generate, {
        input: parsed.data.text,
        model: modelForTier(session.settings().model),
        onProgress: (done, total) => {
          logRest.info({ sessionId: session.id, done, total }, "Batch progress");
        },
      });
      res.json({ results, message: BATCH_COMPLETE_MESSAGE });
    } catch (e: unknown) {
      sendError(res, e, "Batch analysis");
    }
  });

  router.get("/history", (_req, res) => {
    const entries = listHistory(getSession(res).history());
    res.json({
      entries,
      count: entries.length,
      ...(entries.length === 0 ? { message: EMPTY_HISTORY_MESSAGE } : {}),
    });
  });

  router.get("/history/stats", (_req, res) => {
    res.json(computeRatingStats(getSession(res).history()));
  });

  router.delete("/history", (_req, res) => {
    const session = getSession(res);
    const result = session.clearHistory();
    logRest.info({ sessionId: session.id, cleared: result.cleared }, "History cleared");
    res.json(result);
  });

  return router;
}
