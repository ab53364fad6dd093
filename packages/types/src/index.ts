/**
 * @enginelens/types - Shared type definitions for enginelens
 *
 * Usage:
 *   import type { AnalysisEvent, BlunderVerdict } from '@enginelens/types';
 */

export * from './analysis/index.js';
