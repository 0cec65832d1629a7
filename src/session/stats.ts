import { extractRating } from "../evaluator/rating.js";
import type { EvaluationRecord } from "./types.js";

export const NO_RATING_DATA_MESSAGE = "No rating data available in history";

export interface RatingPoint {
  index: number;
  rating: number;
}

export type RatingStats =
  | {
      status: "ok";
      total_evaluations: number;
      rated_count: number;
      average: number;
      best: number;
      series: RatingPoint[];
    }
  | {
      status: "no_data";
      total_evaluations: number;
      message: string;
    };

/**
 * Aggregate ratings over a history. Records whose feedback carries no
 * parsable rating count toward total_evaluations only.
 */
export function computeRatingStats(records: readonly EvaluationRecord[]): RatingStats {
  const ratings: number[] = [];
  for (const record of records) {
    const rating = extractRating(record.feedback_text);
    if (rating !== null) ratings.push(rating);
  }

  if (ratings.length === 0) {
    return { status: "no_data", total_evaluations: records.length, message: NO_RATING_DATA_MESSAGE };
  }

  const sum = ratings.reduce((acc, r) => acc + r, 0);
  return {
    status: "ok",
    total_evaluations: records.length,
    rated_count: ratings.length,
    average: sum / ratings.length,
    best: Math.max(...ratings),
    series: ratings.map((rating, index) => ({ index, rating })),
  };
}
