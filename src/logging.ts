import pino from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");
if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

// Rotate log file daily — filename: evaluator-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `evaluator-${date}.log`);
}

// Multi-destination: stderr (human-readable) + file (JSON for parsing)
const transport = pino.transport({
  targets: [
    {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
      level: process.env.LOG_LEVEL ?? "info",
    },
    {
      target: "pino/file",
      options: {
        destination: logFilePath(),
        mkdir: true,
      },
      level: "debug", // file gets everything
    },
  ],
});

export const logger = pino(
  {
    level: "debug", // base level — targets filter individually
    base: { service: "sentence-evaluator" },
  },
  transport,
);

// Typed child loggers for subsystems
export const logRest = logger.child({ subsystem: "rest" });
export const logEval = logger.child({ subsystem: "evaluator" });
export const logSession = logger.child({ subsystem: "session" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30) {
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("evaluator-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/evaluator-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
