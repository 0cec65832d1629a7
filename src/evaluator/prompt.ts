import { createHash } from "node:crypto";
import type { FeedbackLevel } from "./criteria.js";

export const TEXT_MARKER = "**Text to Evaluate:**";
export const CRITERIA_MARKER = "**Evaluation Criteria:**";
export const RATING_LINE = "- Overall Rating: X/10";

/**
 * Construct the instruction sent to the model.
 * @param text User text, embedded verbatim in double quotes
 * @param criteria Rule list the model grades against
 * @param feedbackLevel Verbosity requested in the response format header
 * @returns Formatted prompt string
 */
export function buildEvaluationPrompt(
  text: string,
  criteria: string,
  feedbackLevel: FeedbackLevel,
): string {
  return [
    "You are an AI assistant skilled in grammar correction and structural refinement.",
    "Analyze the following text based on the 14 rules and provide:",
    "- A brief summary of errors found.",
    "- A revised version of the sentence with corrections.",
    "- A rating from 1-10 based on how well it follows the criteria.",
    "",
    TEXT_MARKER,
    `"${text}"`,
    "",
    CRITERIA_MARKER,
    criteria.trim(),
    "",
    `**Response Format (${feedbackLevel} feedback):**`,
    RATING_LINE,
    "- Identified Issues: (list of issues)",
    "- Suggested Improvements: (specific suggestions)",
    "- Corrected Version: (revised sentence)",
  ].join("\n");
}

/**
 * SHA-256 of a prompt, 16-char hex. Logged with each call so runs with
 * identical prompts can be grouped.
 */
export function hashPrompt(prompt: string): string {
  return createHash("sha256").update(prompt).digest("hex").slice(0, 16);
}
