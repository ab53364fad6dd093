/**
 * @enginelens/core - Analysis built on engine sessions
 *
 * - Multi-PV reconciliation into ranked candidate moves
 * - Blunder detection by comparing a move with the engine's best line
 * - Rating-band blunder thresholds
 */

export const VERSION = '0.1.0';

export * from './classifier/thresholds.js';
export * from './blunder/ranking.js';
export * from './blunder/blunder-evaluator.js';
export { EvaluationError } from './errors.js';
