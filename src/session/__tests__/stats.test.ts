import { describe, it, expect } from "vitest";
import { computeRatingStats, NO_RATING_DATA_MESSAGE } from "../stats.js";
import { SessionState } from "../state.js";
import type { EvaluationRecord } from "../types.js";

function withFeedback(feedback_text: string): EvaluationRecord {
  return {
    timestamp: "2026-03-01T10:00:00.000Z",
    original_text: "text",
    feedback_text,
    model_identifier: "gemini-2.5-flash",
  };
}

describe("computeRatingStats", () => {
  it("averages and maxes the parsed ratings", () => {
    const stats = computeRatingStats([
      withFeedback("Overall Rating: 3/10"),
      withFeedback("Overall Rating: 9/10"),
    ]);
    expect(stats).toEqual({
      status: "ok",
      total_evaluations: 2,
      rated_count: 2,
      average: 6,
      best: 9,
      series: [
        { index: 0, rating: 3 },
        { index: 1, rating: 9 },
      ],
    });
  });

  it("excludes records without a parsable rating from every aggregate", () => {
    const stats = computeRatingStats([
      withFeedback("Overall Rating: 3/10"),
      withFeedback("Error processing request: quota exceeded"),
      withFeedback("Overall Rating: 9/10"),
      withFeedback("Overall Rating: excellent/10"),
    ]);
    expect(stats.status).toBe("ok");
    if (stats.status !== "ok") return;
    expect(stats.total_evaluations).toBe(4);
    expect(stats.rated_count).toBe(2);
    expect(stats.average).toBe(6);
    expect(stats.best).toBe(9);
  });

  it("reports no data instead of dividing by zero", () => {
    expect(computeRatingStats([])).toEqual({
      status: "no_data",
      total_evaluations: 0,
      message: NO_RATING_DATA_MESSAGE,
    });
    expect(computeRatingStats([withFeedback("no marker here")])).toEqual({
      status: "no_data",
      total_evaluations: 1,
      message: "No rating data available in history",
    });
  });

  it("reports no data after the history is cleared", () => {
    const session = new SessionState("s", { maxRecords: 10, defaultTier: "fast" });
    session.append(withFeedback("Overall Rating: 5/10"));
    expect(computeRatingStats(session.history()).status).toBe("ok");

    session.clearHistory();
    expect(computeRatingStats(session.history()).status).toBe("no_data");
  });
});
