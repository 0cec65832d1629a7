import { getBandColorName, getRatingBand, type ColorName, type RatingBand } from "../shared/colors.js";

export const RATING_MARKER = "Overall Rating:";

// Plain decimal or exponent notation; no hex, no "Infinity"
const FLOAT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Best-effort rating parser. The model's output format is never trusted:
 * a missing marker or any unparsable token yields null.
 *
 * "...Overall Rating: 7/10\n..." → 7
 */
export function extractRating(feedback: string): number | null {
  const markerAt = feedback.indexOf(RATING_MARKER);
  if (markerAt === -1) return null;

  const rest = feedback.slice(markerAt + RATING_MARKER.length);
  const line = rest.split("\n")[0] ?? "";
  const token = (line.trim().split("/")[0] ?? "").trim();
  if (!FLOAT_RE.test(token)) return null;

  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

export interface RatingView {
  value: number;
  /** "7.0/10" */
  display: string;
  /** value / 10, bounded to [0, 1] for a progress indicator */
  progress: number;
  /** "Quality Score: 7.0/10" */
  caption: string;
  band: RatingBand;
  color: ColorName;
  /** Parsed value lies outside 0-10; shown verbatim */
  out_of_range: boolean;
}

export interface FeedbackView {
  feedback: string;
  rating: RatingView | null;
}

export function buildRatingView(value: number): RatingView {
  const band = getRatingBand(value);
  const formatted = value.toFixed(1);
  return {
    value,
    display: `${formatted}/10`,
    progress: Math.min(1, Math.max(0, value / 10)),
    caption: `Quality Score: ${formatted}/10`,
    band,
    color: getBandColorName(band),
    out_of_range: value < 0 || value > 10,
  };
}

export function presentFeedback(feedback: string): FeedbackView {
  const rating = extractRating(feedback);
  return {
    feedback,
    rating: rating === null ? null : buildRatingView(rating),
  };
}
