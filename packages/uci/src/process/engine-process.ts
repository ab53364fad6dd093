/**
 * Engine subprocess lifecycle
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';

import { SpawnError, toError } from '../errors.js';
import { defaultLogger, type EngineLogger } from '../logger.js';

import type { EngineTransport } from './engine-handle.js';

/**
 * How to launch an engine executable
 */
export interface EngineSpawnConfig {
  /** Path to the engine executable */
  enginePath: string;
  /** Command line arguments */
  args?: string[];
  /** Working directory */
  cwd?: string;
  /** Time to wait for a clean exit before killing the process (ms) */
  terminateGraceMs?: number;
}

const DEFAULT_TERMINATE_GRACE_MS = 2000;

/**
 * A running engine subprocess. Owns the child exclusively for its lifetime.
 */
export class EngineProcess implements EngineTransport {
  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly graceMs: number,
  ) {}

  /**
   * Start the engine and wait until the OS reports it running
   *
   * @throws SpawnError if the executable cannot be started
   */
  static async spawn(
    config: EngineSpawnConfig,
    logger: EngineLogger = defaultLogger,
  ): Promise<EngineProcess> {
    const child = spawn(config.enginePath, config.args ?? [], {
      cwd: config.cwd,
      windowsHide: true,
    });

    try {
      await once(child, 'spawn');
    } catch (error) {
      throw new SpawnError(config.enginePath, toError(error));
    }

    logger.debug(`spawned ${config.enginePath} (pid ${child.pid ?? 'unknown'})`);

    child.on('error', (error) => {
      logger.warn(`engine process error: ${error.message}`);
    });

    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => {
      logger.debug(`[stderr] ${chunk.trimEnd()}`);
    });
    child.on('exit', (code, signal) => {
      logger.debug(`engine exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
    });

    return new EngineProcess(child, config.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS);
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  /**
   * Whether the process has exited
   */
  get exited(): boolean {
    return this.child.exitCode !== null || this.child.signalCode !== null;
  }

  /**
   * Close the engine's input and wait for it to exit, killing it after the grace period
   */
  async terminate(): Promise<void> {
    if (this.exited) {
      return;
    }

    const exited = once(this.child, 'exit');
    if (this.child.stdin.writable) {
      this.child.stdin.end();
    }

    const timer = setTimeout(() => {
      this.child.kill('SIGKILL');
    }, this.graceMs);

    try {
      await exited;
    } finally {
      clearTimeout(timer);
    }
  }
}
