/**
 * Error classes for UCI client operations
 */

/**
 * Machine-readable error codes
 */
export type UciErrorCode =
  | 'UCI_ERROR'
  | 'SPAWN_FAILED'
  | 'HANDSHAKE_FAILED'
  | 'PROTOCOL_VIOLATION'
  | 'ENGINE_IO'
  | 'ENGINE_CLOSED'
  | 'INVALID_ARGUMENT';

/**
 * Base error class for UCI client errors
 */
export class UciClientError extends Error {
  constructor(
    message: string,
    public readonly code: UciErrorCode = 'UCI_ERROR',
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'UciClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The engine could not be brought into a state ready for analysis
 */
export class StartupError extends UciClientError {
  constructor(message: string, code: UciErrorCode = 'HANDSHAKE_FAILED', cause?: unknown) {
    super(message, code, cause);
    this.name = 'StartupError';
  }
}

/**
 * The engine executable could not be started
 */
export class SpawnError extends StartupError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to start engine '${enginePath}'${cause ? `: ${cause.message}` : ''}`,
      'SPAWN_FAILED',
      cause,
    );
    this.name = 'SpawnError';
  }
}

export type HandshakeFailure = 'unexpected-message' | 'timeout' | 'stream-closed';

/**
 * The startup sequence did not complete
 */
export class HandshakeError extends StartupError {
  constructor(
    public readonly reason: HandshakeFailure,
    message: string,
    public readonly received?: string,
    cause?: unknown,
  ) {
    super(message, 'HANDSHAKE_FAILED', cause);
    this.name = 'HandshakeError';
  }
}

/**
 * An inbound message arrived that the current phase does not allow
 */
export class ProtocolViolationError extends UciClientError {
  constructor(public readonly received: string) {
    super(`Unexpected engine message during analysis: '${received}'`, 'PROTOCOL_VIOLATION');
    this.name = 'ProtocolViolationError';
  }
}

/**
 * Reading from or writing to the engine failed (EOF, broken pipe)
 */
export class EngineIOError extends UciClientError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ENGINE_IO', cause);
    this.name = 'EngineIOError';
  }
}

/**
 * The client was shut down, or its engine stream is no longer usable
 */
export class EngineClosedError extends UciClientError {
  constructor(reason?: string, cause?: unknown) {
    super(`Engine is closed${reason ? `: ${reason}` : ''}`, 'ENGINE_CLOSED', cause);
    this.name = 'EngineClosedError';
  }
}

/**
 * Error thrown when invalid arguments are provided
 */
export class InvalidArgumentError extends UciClientError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
