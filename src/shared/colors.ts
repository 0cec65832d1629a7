/**
 * Shared color utilities for the rating display.
 * Returns semantic color names that a front end maps to its own palette.
 */

export type ColorName = 'green' | 'orange' | 'red';

export type RatingBand = 'low' | 'mid' | 'high';

/** Map a 0-10 rating to its quality band: <4 low, [4,7) mid, ≥7 high */
export function getRatingBand(rating: number): RatingBand {
  if (rating < 4) return 'low';
  if (rating < 7) return 'mid';
  return 'high';
}

const BAND_COLORS: Record<RatingBand, ColorName> = {
  low: 'red',
  mid: 'orange',
  high: 'green',
};

export function getBandColorName(band: RatingBand): ColorName {
  return BAND_COLORS[band];
}
