export const EVALUATION_CRITERIA = `
Evaluate the given text based on these 14 rules:
1. Avoid statements referring to the past instead of the present.
2. Avoid factual statements or those that could be interpreted as such.
3. Avoid ambiguity and ensure clarity in meaning.
4. Ensure relevance to the intended topic or psychological object.
5. Avoid statements that would be universally accepted or rejected.
6. Cover the full range of the effective scale of interest.
7. Use simple, clear, and direct language.
8. Keep statements short (preferably under 20 words).
9. Each statement should express only one complete thought.
10. Avoid universal terms such as all, always, none, and never.
11. Use words like only, just, merely with caution.
12. Prefer simple sentences over complex or compound ones.
13. Avoid jargon or words that may confuse the target audience.
14. Eliminate double negatives.
`;

/** Shown before the first evaluation of a session */
export const QUICK_TIPS = [
  "Keep sentences under 20 words",
  "Avoid absolute terms like 'always' or 'never'",
  "Express one complete thought per sentence",
  "Use simple, direct language",
  "Eliminate double negatives",
] as const;

export const FEEDBACK_LEVELS = ["Concise", "Detailed", "Comprehensive"] as const;
export type FeedbackLevel = (typeof FEEDBACK_LEVELS)[number];

/** Batch analysis always asks for this level, whatever the session setting */
export const BATCH_FEEDBACK_LEVEL: FeedbackLevel = "Concise";

export const MODEL_TIERS = ["fast", "balanced", "legacy"] as const;
export type ModelTier = (typeof MODEL_TIERS)[number];

export interface ModelOption {
  readonly tier: ModelTier;
  readonly label: string;
  readonly model: string;
}

export const MODEL_OPTIONS: Record<ModelTier, ModelOption> = {
  fast: { tier: "fast", label: "Gemini 2.5 Flash (Fast)", model: "gemini-2.5-flash" },
  balanced: { tier: "balanced", label: "Gemini 2.5 Pro (Balanced)", model: "gemini-2.5-pro" },
  legacy: { tier: "legacy", label: "Gemini 2.0 Flash (Legacy)", model: "gemini-2.0-flash" },
};

export function isModelTier(value: string): value is ModelTier {
  return (MODEL_TIERS as readonly string[]).includes(value);
}

/** Model identifier for a tier, e.g. "fast" → "gemini-2.5-flash" */
export function modelForTier(tier: ModelTier): string {
  return MODEL_OPTIONS[tier].model;
}

/**
 * Short display name of a model identifier: the last dash-separated segment, capitalised.
 * "gemini-2.5-flash" → "Flash".
 */
export function modelShortLabel(model: string): string {
  const segment = model.split("-").pop() ?? model;
  if (!segment) return segment;
  return segment.charAt(0).toUpperCase() + segment.slice(1).toLowerCase();
}
