/**
 * Configuration schema types for the enginelens CLI
 */

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Engine executable (looked up on PATH when not absolute) */
  path: string;
  /** Extra command line arguments for the engine */
  args: string[];
  /** Search threads */
  threads: number;
  /** Principal variations reported in parallel */
  multiPv: number;
  /** Upper bound for the startup handshake (ms) */
  handshakeTimeoutMs: number;
}

/**
 * Search configuration
 */
export interface AnalysisConfigSchema {
  /** Fixed search depth in plies */
  depth: number;
}

/**
 * Blunder check configuration
 */
export interface BlunderConfigSchema {
  /** Fixed centipawn-loss threshold */
  thresholdCp?: number;
  /** Player rating; selects a rating-band threshold when no fixed threshold is set */
  rating?: number;
}

/**
 * Complete enginelens configuration
 */
export interface EngineLensConfig {
  engine: EngineConfigSchema;
  analysis: AnalysisConfigSchema;
  blunder: BlunderConfigSchema;
}

/**
 * CLI options (parsed from command line)
 */
export interface CliOptions {
  config?: string;
  engine?: string;
  depth?: number;
  multipv?: number;
  threads?: number;
  threshold?: number;
  rating?: number;
  /** Search for this long instead of to a fixed depth (ms) */
  movetime?: number;
  /** Moves played from the given position, SAN or UCI */
  moves?: string;
  json?: boolean;
  noColor?: boolean;
  debug?: boolean;
  showConfig?: boolean;
}
