import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const clearEnv = () => {
  const keys = [
    "GEMINI_API_KEY",
    "GEMINI_DEFAULT_TIER",
    "REST_PORT",
    "REST_API_KEY",
    "EVAL_RATE_LIMIT_PER_MIN",
    "HISTORY_MAX_RECORDS",
    "SESSION_TTL_MIN",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("uses defaults when nothing is set", async () => {
    const cfg = await loadConfig();
    expect(cfg.gemini.apiKey).toBe("");
    expect(cfg.gemini.defaultTier).toBe("fast");
    expect(cfg.rest.port).toBe(3000);
    expect(cfg.rest.apiKey).toBe("");
    expect(cfg.rest.evalRateLimitPerMin).toBe(30);
    expect(cfg.session.historyMaxRecords).toBe(500);
    expect(cfg.session.ttlMinutes).toBe(30);
  });

  it("reads GEMINI_API_KEY into gemini.apiKey", async () => {
    vi.stubEnv("GEMINI_API_KEY", "test-key");
    const cfg = await loadConfig();
    expect(cfg.gemini.apiKey).toBe("test-key");
  });

  it("parses numeric overrides", async () => {
    vi.stubEnv("REST_PORT", "8080");
    vi.stubEnv("HISTORY_MAX_RECORDS", "50");
    vi.stubEnv("SESSION_TTL_MIN", "5");
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(8080);
    expect(cfg.session.historyMaxRecords).toBe(50);
    expect(cfg.session.ttlMinutes).toBe(5);
  });

  it("reads the default tier", async () => {
    vi.stubEnv("GEMINI_DEFAULT_TIER", "balanced");
    const cfg = await loadConfig();
    expect(cfg.gemini.defaultTier).toBe("balanced");
  });
});
