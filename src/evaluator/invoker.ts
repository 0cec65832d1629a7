import { logEval } from "../logging.js";
import type { SessionState } from "../session/state.js";
import type { EvaluationRecord } from "../session/types.js";
import { EVALUATION_CRITERIA, type FeedbackLevel } from "./criteria.js";
import type { TextGenerator } from "./gemini.js";
import { buildEvaluationPrompt, hashPrompt } from "./prompt.js";

export const ERROR_PREFIX = "Error processing request: ";

export interface EvaluateOptions {
  text: string;
  model: string;
  feedbackLevel: FeedbackLevel;
}

export interface EvaluationOutcome {
  /** Trimmed model text, or the error placeholder */
  feedback: string;
  ok: boolean;
  record: EvaluationRecord;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** ISO timestamp that never goes below the session's newest record. */
function nextTimestamp(session: SessionState): string {
  const now = new Date().toISOString();
  const previous = session.lastTimestamp();
  return previous !== null && previous > now ? previous : now;
}

/**
 * Evaluate one text with a single best-effort model call.
 *
 * Never rejects: a failed call becomes an "Error processing request: ..."
 * feedback string. Either way one record is appended to the session history.
 */
export async function evaluateText(
  session: SessionState,
  generate: TextGenerator,
  opts: EvaluateOptions,
): Promise<EvaluationOutcome> {
  const prompt = buildEvaluationPrompt(opts.text, EVALUATION_CRITERIA, opts.feedbackLevel);
  const start = Date.now();

  let feedback: string;
  let ok: boolean;
  try {
    const raw = await generate({ model: opts.model, prompt });
    feedback = raw.trim();
    ok = true;
    logEval.debug(
      { sessionId: session.id, model: opts.model, promptHash: hashPrompt(prompt), latency_ms: Date.now() - start },
      "Evaluation completed",
    );
  } catch (e: unknown) {
    feedback = `${ERROR_PREFIX}${errorMessage(e)}`;
    ok = false;
    logEval.warn(
      { sessionId: session.id, model: opts.model, err: errorMessage(e), latency_ms: Date.now() - start },
      "Evaluation call failed",
    );
  }

  const record = session.append({
    timestamp: nextTimestamp(session),
    original_text: opts.text,
    feedback_text: feedback,
    model_identifier: opts.model,
  });

  return { feedback, ok, record };
}
