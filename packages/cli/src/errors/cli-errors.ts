/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

import { EvaluationError } from '@enginelens/core';
import {
  EngineClosedError,
  EngineIOError,
  HandshakeError,
  ProtocolViolationError,
  SpawnError,
  toError,
  UciClientError,
} from '@enginelens/uci/errors';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid position or move given on the command line
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Engine could not be started or stopped working
 */
export class EngineError extends CliError {
  constructor(
    public readonly enginePath: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion, 2);
    this.name = 'EngineError';
  }

  override format(): string {
    const lines = [`Error [${this.enginePath}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Translate an engine-side failure into an EngineError with a suggestion
 */
export function createEngineError(enginePath: string, error: unknown): Error {
  if (error instanceof SpawnError) {
    return new EngineError(
      enginePath,
      error.message,
      'Install a UCI engine or point engine.path (ENGINELENS_ENGINE_PATH, --engine) at one',
    );
  }
  if (error instanceof HandshakeError) {
    const suggestion =
      error.reason === 'timeout'
        ? 'Raise engine.handshakeTimeoutMs if the engine is slow to start'
        : 'Check that the executable speaks UCI';
    return new EngineError(enginePath, error.message, suggestion);
  }
  if (error instanceof ProtocolViolationError || error instanceof EngineIOError) {
    return new EngineError(enginePath, `Analysis unavailable: ${error.message}`);
  }
  if (error instanceof EngineClosedError || error instanceof UciClientError) {
    return new EngineError(enginePath, error.message);
  }
  if (error instanceof EvaluationError) {
    return new EngineError(enginePath, error.message, 'Try a greater depth or another position');
  }
  return toError(error);
}
