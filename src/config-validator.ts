import type { AppConfig } from "./config.js";
import { isModelTier } from "./evaluator/criteria.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - GEMINI_API_KEY is set
 * - default model tier is one of fast/balanced/legacy
 * - REST port is in valid range (1-65535)
 * - API key is at least 16 characters (warning if shorter)
 * - eval rate limit, history bound and session TTL are positive integers
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!cfg.gemini.apiKey) {
    errors.push("GEMINI_API_KEY is missing. Set it in your environment variables.");
  }

  if (!isModelTier(cfg.gemini.defaultTier)) {
    errors.push(`GEMINI_DEFAULT_TIER must be one of fast, balanced, legacy, got "${cfg.gemini.defaultTier}"`);
  }

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  // Warn if API key is too short (non-fatal, but insecure)
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!isPositiveInt(cfg.rest.evalRateLimitPerMin)) {
    errors.push(`rest.evalRateLimitPerMin must be positive, got ${cfg.rest.evalRateLimitPerMin}`);
  }

  if (!isPositiveInt(cfg.session.historyMaxRecords)) {
    errors.push(`session.historyMaxRecords must be positive, got ${cfg.session.historyMaxRecords}`);
  }

  if (!isPositiveInt(cfg.session.ttlMinutes)) {
    errors.push(`session.ttlMinutes must be positive, got ${cfg.session.ttlMinutes}`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
