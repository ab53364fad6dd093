/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, EngineLensConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialConfig } from './validation.js';

type Section = keyof EngineLensConfig;

interface EnvBinding {
  section: Section;
  key: string;
  kind: 'string' | 'number' | 'list';
}

/**
 * Environment variable mapping
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // Engine
  ENGINELENS_ENGINE_PATH: { section: 'engine', key: 'path', kind: 'string' },
  ENGINELENS_ENGINE_ARGS: { section: 'engine', key: 'args', kind: 'list' },
  ENGINELENS_THREADS: { section: 'engine', key: 'threads', kind: 'number' },
  ENGINELENS_MULTIPV: { section: 'engine', key: 'multiPv', kind: 'number' },
  ENGINELENS_HANDSHAKE_TIMEOUT: { section: 'engine', key: 'handshakeTimeoutMs', kind: 'number' },

  // Analysis
  ENGINELENS_DEPTH: { section: 'analysis', key: 'depth', kind: 'number' },

  // Blunder checks
  ENGINELENS_BLUNDER_THRESHOLD: { section: 'blunder', key: 'thresholdCp', kind: 'number' },
  ENGINELENS_RATING: { section: 'blunder', key: 'rating', kind: 'number' },
};

/**
 * Config file locations searched from the working directory upwards
 */
const SEARCH_PLACES = [
  'package.json',
  '.enginelensrc',
  '.enginelensrc.json',
  '.enginelensrc.yaml',
  '.enginelensrc.yml',
  '.enginelensrc.js',
  '.enginelensrc.cjs',
  'enginelens.config.js',
  'enginelens.config.cjs',
];

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, kind: EnvBinding['kind']): unknown {
  switch (kind) {
    case 'number':
      // NaN is left for validation to report
      return Number(value);
    case 'list':
      return value.split(/\s+/).filter((part) => part.length > 0);
    default:
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const raw: Partial<Record<Section, Record<string, unknown>>> = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = raw[binding.section] ?? {};
      section[binding.key] = parseEnvValue(value, binding.kind);
      raw[binding.section] = section;
    }
  }

  return validatePartialConfig(raw, 'environment configuration');
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * @returns null when no config file exists
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('enginelens', { searchPlaces: SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const where = configPath ? ` ${resolveAbsolutePath(configPath)}` : '';
    throw new ConfigError(
      `Could not read config file${where}: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the file exists and contains valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config, `config file ${result.filepath}`);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const engine: NonNullable<PartialConfig['engine']> = {};
  const analysis: NonNullable<PartialConfig['analysis']> = {};
  const blunder: NonNullable<PartialConfig['blunder']> = {};

  if (options.engine !== undefined) engine.path = options.engine;
  if (options.threads !== undefined) engine.threads = options.threads;
  if (options.multipv !== undefined) engine.multiPv = options.multipv;
  if (options.depth !== undefined) analysis.depth = options.depth;
  if (options.threshold !== undefined) blunder.thresholdCp = options.threshold;
  if (options.rating !== undefined) blunder.rating = options.rating;

  return { engine, analysis, blunder };
}

/**
 * Merge a partial configuration over a complete one; source values win
 */
export function mergeConfig(target: EngineLensConfig, source: PartialConfig): EngineLensConfig {
  return {
    engine: { ...target.engine, ...source.engine },
    analysis: { ...target.analysis, ...source.analysis },
    blunder: { ...target.blunder, ...source.blunder },
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<EngineLensConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: EngineLensConfig): string {
  return JSON.stringify(config, null, 2);
}
