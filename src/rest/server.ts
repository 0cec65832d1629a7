import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { createRouter } from "./routes.js";
import { openApiSpec } from "./openapi.js";
import { sessionMiddleware } from "./session.js";
import { requestLogger, logRest } from "../logging.js";
import type { TextGenerator } from "../evaluator/gemini.js";
import type { SessionStore } from "../session/store.js";
import { isReady } from "../ops/readiness.js";

export interface AppOptions {
  generate: TextGenerator;
  sessions: SessionStore;
  /** Empty disables authentication */
  apiKey: string;
  evalRateLimitPerMin: number;
}

/** X-API-Key header, falling back to a Bearer token */
function providedApiKey(req: Request): string | undefined {
  const header = req.headers["x-api-key"];
  return (
    (typeof header === "string" ? header : undefined) ??
    req.headers.authorization?.replace(/^Bearer\s+/i, "")
  );
}

function apiKeyAuth(key: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!key) {
      next();
      return;
    }
    const providedBuffer = Buffer.from(providedApiKey(req) ?? "");
    const keyBuffer = Buffer.from(key);

    if (
      providedBuffer.length === keyBuffer.length &&
      timingSafeEqual(providedBuffer, keyBuffer)
    ) {
      next();
    } else {
      res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
    }
  };
}

// Verified API key when auth is on, otherwise client IP
function limiterKey(apiKey: string) {
  return (req: Request): string => {
    if (apiKey) return `key:${providedApiKey(req) ?? ""}`;
    return `ip:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
  };
}

const startTime = Date.now();

export function createApp(opts: AppOptions): express.Express {
  const app = express();

  const evalLimiter = rateLimit({
    windowMs: 60_000,
    max: opts.evalRateLimitPerMin,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: limiterKey(opts.apiKey),
    message: { error: `Eval rate limit exceeded — ${opts.evalRateLimitPerMin} evaluations/minute` },
  });

  app.use(cors({ exposedHeaders: ["X-Session-Id"] }));
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.get("/", (_req, res) => {
    res.json({
      name: "sentence-evaluator",
      version: "1.2.0",
      docs: "/openapi.json",
      api: "/api/models",
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: isReady() ? "ok" : "starting",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      sessions: opts.sessions.size(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/openapi.json", (_req, res) => {
    res.json(openApiSpec);
  });

  const auth = apiKeyAuth(opts.apiKey);
  app.use("/api/evaluate", auth, evalLimiter);
  app.use("/api/batch", auth, evalLimiter);
  app.use("/api", auth, sessionMiddleware(opts.sessions), createRouter({ generate: opts.generate }));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Malformed JSON bodies and anything else that escaped a handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      logRest.error({ err: message }, "Unhandled request error");
    }
    res.status(status).json({ error: message });
  });

  return app;
}

export function startRestServer(opts: AppOptions & { port: number }): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(opts);

    const httpServer = app.listen(opts.port, () => {
      logRest.info({ port: opts.port }, "REST server listening");
      logRest.info({ url: `http://localhost:${opts.port}/openapi.json` }, "OpenAPI spec available");
      if (opts.apiKey) {
        logRest.info("API key authentication enabled");
      } else {
        logRest.warn("No REST_API_KEY set — endpoints are unauthenticated");
      }
      resolve(httpServer);
    });
  });
}
