/**
 * Centipawn conversion for mate scores
 */

/**
 * Magnitude assigned to an immediate mate
 */
export const MATE_SCORE = 100000;

/**
 * Map a mate distance onto the centipawn scale.
 *
 * Positive distances (side to move mates) land just below `MATE_SCORE`,
 * negative ones just above `-MATE_SCORE`; shorter mates are more extreme.
 * `mate 0` means the side to move is already mated.
 */
export function mateToCentipawns(mate: number): number {
  return mate > 0 ? MATE_SCORE - mate * 100 : -MATE_SCORE - mate * 100;
}

/**
 * Whether a centipawn value encodes a forced mate
 */
export function isMateScore(score: number): boolean {
  return Math.abs(score) > MATE_SCORE / 2;
}
