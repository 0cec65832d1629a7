import { describe, it, expect } from "vitest";
import { buildEvaluationPrompt, hashPrompt } from "../prompt.js";
import { EVALUATION_CRITERIA } from "../criteria.js";

describe("buildEvaluationPrompt", () => {
  const prompt = buildEvaluationPrompt("The cat sat on the mat.", EVALUATION_CRITERIA, "Detailed");

  it("embeds the text in quotes under its marker", () => {
    expect(prompt).toContain('**Text to Evaluate:**\n"The cat sat on the mat."');
  });

  it("embeds the criteria under its marker", () => {
    expect(prompt).toContain("**Evaluation Criteria:**\nEvaluate the given text based on these 14 rules:");
    expect(prompt).toContain("14. Eliminate double negatives.");
  });

  it("names the feedback level in the response format header", () => {
    expect(prompt).toContain("**Response Format (Detailed feedback):**\n- Overall Rating: X/10");
    expect(buildEvaluationPrompt("x", EVALUATION_CRITERIA, "Concise")).toContain("**Response Format (Concise feedback):**");
  });

  it("asks for issues, improvements and a corrected version", () => {
    expect(prompt.endsWith(
      "- Identified Issues: (list of issues)\n" +
      "- Suggested Improvements: (specific suggestions)\n" +
      "- Corrected Version: (revised sentence)",
    )).toBe(true);
  });

  it("does not validate the text", () => {
    expect(buildEvaluationPrompt("", EVALUATION_CRITERIA, "Concise")).toContain('**Text to Evaluate:**\n""');
  });
});

describe("hashPrompt", () => {
  it("returns a stable 16-char hex digest", () => {
    const a = hashPrompt("same prompt");
    expect(a).toMatch(/^[0-9a-f]{16}$/);
    expect(hashPrompt("same prompt")).toBe(a);
    expect(hashPrompt("other prompt")).not.toBe(a);
  });
});
