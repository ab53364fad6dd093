/**
 * Default configuration values
 */

import type { EngineLensConfig } from './schema.js';

export const DEFAULT_ENGINE_CONFIG: EngineLensConfig['engine'] = {
  path: 'stockfish',
  args: [],
  threads: 1,
  multiPv: 3,
  handshakeTimeoutMs: 10000,
};

export const DEFAULT_ANALYSIS_CONFIG: EngineLensConfig['analysis'] = {
  depth: 18,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: EngineLensConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  analysis: DEFAULT_ANALYSIS_CONFIG,
  blunder: {},
};
