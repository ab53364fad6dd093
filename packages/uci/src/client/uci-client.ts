/**
 * UCI engine client: process lifecycle, startup and analysis sessions
 */

import type { AnalysisEvent, PositionSource } from '@enginelens/types';

import { EngineClosedError, InvalidArgumentError, toError } from '../errors.js';
import { defaultLogger, type EngineLogger } from '../logger.js';
import { EngineHandle, type EngineTransport } from '../process/engine-handle.js';
import { EngineProcess, type EngineSpawnConfig } from '../process/engine-process.js';

import { AnalysisStream } from './analysis-stream.js';
import { initialize } from './handshake.js';
import { runReaderLoop } from './reader-loop.js';

/**
 * Client configuration
 */
export interface UciClientOptions {
  /** Engine search threads */
  threads?: number;
  /** Number of principal variations reported in parallel */
  multiPv?: number;
  /** Upper bound for the startup handshake (ms) */
  handshakeTimeoutMs?: number;
  /** Receives protocol traffic and warnings */
  logger?: EngineLogger;
}

/**
 * Default configuration for the UCI client
 */
export const DEFAULT_UCI_OPTIONS: Required<Omit<UciClientOptions, 'logger'>> = {
  threads: 1,
  multiPv: 3,
  handshakeTimeoutMs: 10000,
};

export interface AnalyzeOptions {
  /** Aborting cancels the session, as if the consumer had called `cancel()` */
  signal?: AbortSignal;
}

/**
 * One search on the engine, consumed as an async iterable of events.
 *
 * The stream is finite: it always ends with a `bestmove` event unless it is
 * cancelled or fails. Leaving a `for await` loop early cancels it.
 */
export class AnalysisSession implements AsyncIterable<AnalysisEvent> {
  constructor(
    private readonly stream: AnalysisStream,
    /** Resolves once the engine has been drained for this session */
    public readonly finished: Promise<void>,
  ) {}

  /**
   * Stop consuming. The engine is told to stop and drained in the background.
   */
  cancel(): void {
    this.stream.cancel();
  }

  get cancelled(): boolean {
    return this.stream.cancelled;
  }

  /**
   * Drain the session and return every event, `bestmove` last
   */
  async collect(): Promise<AnalysisEvent[]> {
    const events: AnalysisEvent[] = [];
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }

  [Symbol.asyncIterator](): AsyncIterator<AnalysisEvent, undefined> {
    return this.stream[Symbol.asyncIterator]();
  }
}

function toFen(position: PositionSource): string {
  return typeof position === 'string' ? position : position.fen();
}

/**
 * Client for a UCI chess engine.
 *
 * Sessions on one client are queued: a session's `position` and `go` are only
 * written once the previous session has read its `bestmove`, so at most one
 * search is ever in flight.
 */
export class UciClient {
  private queue: Promise<void> = Promise.resolve();
  private readonly active = new Set<AnalysisStream>();
  private closed = false;

  private constructor(
    private readonly transport: EngineTransport,
    private readonly handle: EngineHandle,
    private readonly logger: EngineLogger,
    public readonly options: Readonly<Required<Omit<UciClientOptions, 'logger'>>>,
  ) {}

  /**
   * Spawn an engine executable and complete the handshake
   *
   * @throws SpawnError if the executable cannot be started
   * @throws HandshakeError if the engine does not reach the ready state
   */
  static async start(config: EngineSpawnConfig & UciClientOptions): Promise<UciClient> {
    const logger = config.logger ?? defaultLogger;
    const engine = await EngineProcess.spawn(config, logger);
    return UciClient.connect(engine, config);
  }

  /**
   * Complete the handshake over an already running engine
   *
   * The transport is terminated if the handshake fails.
   */
  static async connect(
    transport: EngineTransport,
    options: UciClientOptions = {},
  ): Promise<UciClient> {
    const logger = options.logger ?? defaultLogger;
    const resolved = {
      threads: options.threads ?? DEFAULT_UCI_OPTIONS.threads,
      multiPv: options.multiPv ?? DEFAULT_UCI_OPTIONS.multiPv,
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? DEFAULT_UCI_OPTIONS.handshakeTimeoutMs,
    };
    const handle = new EngineHandle(transport, logger);

    try {
      await initialize(
        handle,
        {
          threads: resolved.threads,
          multiPv: resolved.multiPv,
          timeoutMs: resolved.handshakeTimeoutMs,
        },
        logger,
      );
    } catch (error) {
      handle.close();
      await transport.terminate();
      throw error;
    }

    logger.debug('engine ready');
    return new UciClient(transport, handle, logger, resolved);
  }

  /**
   * Start a search on `position` after playing `extraMoves`
   *
   * @param position - Base position (FEN string or an object with `fen()`)
   * @param extraMoves - Moves in UCI notation applied to the base position
   * @param depthLimit - Fixed search depth; omitted means an infinite search
   *   that only ends when the session is cancelled
   * @throws EngineClosedError after shutdown or once the engine stream broke
   */
  analyze(
    position: PositionSource,
    extraMoves: readonly string[] = [],
    depthLimit?: number,
    options: AnalyzeOptions = {},
  ): AnalysisSession {
    if (this.closed) {
      throw new EngineClosedError('client has been shut down');
    }
    const broken = this.handle.brokenBy;
    if (broken) {
      throw new EngineClosedError(broken.message, broken);
    }
    if (depthLimit !== undefined && (!Number.isInteger(depthLimit) || depthLimit < 1)) {
      throw new InvalidArgumentError(`Depth limit must be a positive integer, got ${depthLimit}`);
    }

    const fen = toFen(position);
    const moves = [...extraMoves];
    const stream = new AnalysisStream();
    const { signal } = options;

    const onAbort = (): void => stream.cancel();

    if (signal?.aborted) {
      stream.cancel();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.active.add(stream);
    const run = this.queue
      .then(() => this.runSession(stream, fen, moves, depthLimit))
      .finally(() => {
        this.active.delete(stream);
        signal?.removeEventListener('abort', onAbort);
      });
    this.queue = run;
    return new AnalysisSession(stream, run);
  }

  /**
   * Quit the engine and release its streams. Open and queued sessions are cancelled.
   */
  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const stream of this.active) {
      stream.cancel();
    }

    if (!this.handle.brokenBy) {
      try {
        this.handle.send({ type: 'quit' });
      } catch (error) {
        this.logger.debug(`could not send quit: ${toError(error).message}`);
      }
    }
    this.handle.markBroken(new EngineClosedError('client has been shut down'));
    this.handle.close();
    await this.transport.terminate();
  }

  private async runSession(
    stream: AnalysisStream,
    fen: string,
    moves: string[],
    depthLimit: number | undefined,
  ): Promise<void> {
    // Cancelled while queued: nothing was sent, nothing to drain
    if (stream.cancelled) {
      return;
    }

    try {
      this.handle.send({ type: 'position', fen, moves });
      this.handle.send(
        depthLimit === undefined ? { type: 'go', infinite: true } : { type: 'go', depth: depthLimit },
      );
    } catch (error) {
      stream.fail(toError(error));
      return;
    }

    await runReaderLoop(this.handle, stream, this.logger);
  }
}
