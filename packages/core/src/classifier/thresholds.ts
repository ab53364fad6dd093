/**
 * Rating-dependent blunder thresholds
 *
 * Thresholds are more lenient for lower-rated players and stricter for higher-rated.
 * Values are in centipawns (cp).
 */

/**
 * Blunder threshold for one rating band
 */
export interface RatingBand {
  /** Minimum rating for this band */
  minRating: number;
  /** Maximum rating for this band (exclusive) */
  maxRating: number;
  /** Minimum centipawn loss to classify as blunder */
  blunderThreshold: number;
}

/**
 * Rating bands, contiguous from 0 to 4000
 */
export const RATING_BANDS: readonly RatingBand[] = [
  // Beginners
  { minRating: 0, maxRating: 1000, blunderThreshold: 500 },
  // Novice
  { minRating: 1000, maxRating: 1200, blunderThreshold: 400 },
  // Intermediate
  { minRating: 1200, maxRating: 1400, blunderThreshold: 300 },
  // Club
  { minRating: 1400, maxRating: 1600, blunderThreshold: 250 },
  // Strong club
  { minRating: 1600, maxRating: 1800, blunderThreshold: 200 },
  // Expert
  { minRating: 1800, maxRating: 2000, blunderThreshold: 180 },
  // Candidate master
  { minRating: 2000, maxRating: 2200, blunderThreshold: 150 },
  // Master
  { minRating: 2200, maxRating: 2400, blunderThreshold: 120 },
  // IM/GM
  { minRating: 2400, maxRating: 4000, blunderThreshold: 100 },
];

/**
 * Centipawn loss that counts as a blunder when no rating is configured
 */
export const DEFAULT_BLUNDER_THRESHOLD = 200;

/**
 * Band for a player's rating; ratings outside 0..3999 are clamped
 */
export function getRatingBand(rating: number): RatingBand {
  const clampedRating = Math.max(0, Math.min(rating, 3999));
  const band = RATING_BANDS.find(
    (b) => clampedRating >= b.minRating && clampedRating < b.maxRating,
  );
  return band ?? { minRating: 0, maxRating: 4000, blunderThreshold: DEFAULT_BLUNDER_THRESHOLD };
}

/**
 * Resolve the blunder threshold: an explicit value wins, then the rating band,
 * then {@link DEFAULT_BLUNDER_THRESHOLD}
 */
export function getBlunderThreshold(options: { thresholdCp?: number; rating?: number } = {}): number {
  if (options.thresholdCp !== undefined) {
    return options.thresholdCp;
  }
  if (options.rating !== undefined) {
    return getRatingBand(options.rating).blunderThreshold;
  }
  return DEFAULT_BLUNDER_THRESHOLD;
}
