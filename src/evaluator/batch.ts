import type { SessionState } from "../session/state.js";
import { BATCH_FEEDBACK_LEVEL } from "./criteria.js";
import type { TextGenerator } from "./gemini.js";
import { evaluateText } from "./invoker.js";

export interface BatchResult {
  sentence: string;
  feedback: string;
}

export interface BatchOptions {
  input: string;
  model: string;
  /** Called after each line with the number of lines done so far */
  onProgress?: (done: number, total: number) => void;
}

/** One sentence per line; lines are trimmed and blank ones dropped. */
export function splitBatchInput(input: string): string[] {
  return input
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Evaluate every line of `input` in order, one model call at a time, always
 * at the Concise level. A failing line yields its error feedback and the
 * remaining lines still run.
 */
export async function runBatch(
  session: SessionState,
  generate: TextGenerator,
  opts: BatchOptions,
): Promise<BatchResult[]> {
  const sentences = splitBatchInput(opts.input);
  const results: BatchResult[] = [];

  for (const [i, sentence] of sentences.entries()) {
    const { feedback } = await evaluateText(session, generate, {
      text: sentence,
      model: opts.model,
      feedbackLevel: BATCH_FEEDBACK_LEVEL,
    });
    results.push({ sentence, feedback });
    opts.onProgress?.(i + 1, sentences.length);
  }

  return results;
}
