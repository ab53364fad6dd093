/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress spinner and status output (JSON mode) */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print engine traffic to stderr (default: false) */
  debug?: boolean;
}
