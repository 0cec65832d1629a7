import type { FeedbackLevel, ModelTier } from "../evaluator/criteria.js";

/** One evaluation attempt, successful or failed. Frozen once appended. */
export interface EvaluationRecord {
  readonly timestamp: string;
  readonly original_text: string;
  readonly feedback_text: string;
  readonly model_identifier: string;
}

export interface SessionSettings {
  model: ModelTier;
  feedback_level: FeedbackLevel;
  dark_mode: boolean;
  /** Creativity level, 0.0-1.0 */
  temperature: number;
  /** Max response length in tokens, 100-1000 */
  max_tokens: number;
}

export interface LastEvaluation {
  text: string;
  feedback: string;
}
