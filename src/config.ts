import dotenv from "dotenv";

dotenv.config();

// The Gemini key is required; validateConfig() reports it and startup halts.
export const config = {
  gemini: {
    apiKey: process.env.GEMINI_API_KEY ?? "",
    defaultTier: process.env.GEMINI_DEFAULT_TIER ?? "fast",
  },
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
    evalRateLimitPerMin: parseInt(process.env.EVAL_RATE_LIMIT_PER_MIN ?? "30", 10),
  },
  session: {
    /** Oldest records are dropped once a session holds more than this */
    historyMaxRecords: parseInt(process.env.HISTORY_MAX_RECORDS ?? "500", 10),
    ttlMinutes: parseInt(process.env.SESSION_TTL_MIN ?? "30", 10),
  },
};

export type AppConfig = typeof config;
