/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

/**
 * Chess rating schema (100-4000)
 */
const ratingSchema = z.number().int().min(100).max(4000);

export const engineConfigSchema = z.object({
  path: z.string().min(1),
  args: z.array(z.string()),
  threads: z.number().int().min(1).max(1024),
  multiPv: z.number().int().min(1).max(500),
  handshakeTimeoutMs: z.number().int().min(100).max(600000),
});

export const analysisConfigSchema = z.object({
  depth: depthSchema,
});

export const blunderConfigSchema = z.object({
  thresholdCp: z.number().int().min(1).optional(),
  rating: ratingSchema.optional(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  analysis: analysisConfigSchema,
  blunder: blunderConfigSchema,
});

/**
 * Partial configuration schema (config files and environment)
 */
export const partialConfigSchema = z
  .object({
    engine: engineConfigSchema.partial().optional(),
    analysis: analysisConfigSchema.partial().optional(),
    blunder: blunderConfigSchema.optional(),
  })
  .strict();

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source: string = 'configuration',
  ) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Invalid ${source}:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      `Invalid ${this.source}:`,
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError, source: string): ConfigValidationError {
  const errors = error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
  return new ConfigValidationError(errors, source);
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): z.infer<typeof configSchema> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, 'configuration');
  }
  return result.data;
}

/**
 * Validate a partial configuration
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source = 'configuration'): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error, source);
  }
  return result.data;
}
