#!/usr/bin/env node
import { startRestServer } from "./rest/server.js";
import { logger, pruneOldLogs } from "./logging.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { createGeminiGenerator } from "./evaluator/gemini.js";
import { isModelTier } from "./evaluator/criteria.js";
import { SessionStore } from "./session/store.js";
import { setReady } from "./ops/readiness.js";

async function main() {
  logger.info("Sentence Evaluator starting");

  // Missing credentials halt startup before anything is served
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();

  const defaultTier = isModelTier(config.gemini.defaultTier) ? config.gemini.defaultTier : "fast";
  const sessions = new SessionStore({
    ttlMs: config.session.ttlMinutes * 60_000,
    maxRecords: config.session.historyMaxRecords,
    defaultTier,
  });

  const httpServer = await startRestServer({
    port: config.rest.port,
    apiKey: config.rest.apiKey,
    evalRateLimitPerMin: config.rest.evalRateLimitPerMin,
    generate: createGeminiGenerator(config.gemini.apiKey),
    sessions,
  });

  setReady(true);
  logger.info({ defaultTier }, "Sentence Evaluator ready — accepting connections");

  const shutdown = async () => {
    logger.info("Shutting down...");
    setReady(false);
    sessions.closeAll();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });

  // Logged, not fatal
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
