/**
 * Logging hook for engine traffic and recoverable problems
 */

export interface EngineLogger {
  /** Protocol traffic and state changes */
  debug(message: string): void;
  /** Conditions the caller may want to know about */
  warn(message: string): void;
}

/**
 * Default logger: debug output is dropped, warnings go to stderr
 */
export const defaultLogger: EngineLogger = {
  debug: () => undefined,
  warn: (message) => console.warn(`[uci] ${message}`),
};

/**
 * Logger that discards everything
 */
export const silentLogger: EngineLogger = {
  debug: () => undefined,
  warn: () => undefined,
};
