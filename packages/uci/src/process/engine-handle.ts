/**
 * Engine handle: the command writer and message reader shared by the
 * handshake and every analysis session of one engine process
 */

import type { Readable, Writable } from 'node:stream';

import { EngineClosedError, EngineIOError, toError } from '../errors.js';
import type { EngineLogger } from '../logger.js';
import { decodeLine, encodeCommand, type UciCommand, type UciMessage } from '../protocol/index.js';

import { LineReader } from './line-reader.js';

/**
 * The two byte streams of an engine subprocess
 */
export interface EngineStreams {
  /** Engine input; commands are written here */
  stdin: Writable;
  /** Engine output; protocol lines are read from here */
  stdout: Readable;
}

/**
 * Something that owns engine streams and can tear them down
 */
export interface EngineTransport extends EngineStreams {
  terminate(): Promise<void>;
}

export class EngineHandle {
  private readonly reader: LineReader;
  private failure: Error | null = null;

  constructor(
    private readonly streams: EngineStreams,
    private readonly logger: EngineLogger,
  ) {
    this.reader = new LineReader(streams.stdout);
    streams.stdin.on('error', (error) => {
      this.markBroken(new EngineIOError(`Engine input stream failed: ${error.message}`, error));
    });
  }

  /**
   * Write one command to the engine
   *
   * @throws EngineClosedError if the handle is broken
   */
  send(command: UciCommand): void {
    if (this.failure) {
      throw new EngineClosedError(this.failure.message, this.failure);
    }
    if (!this.streams.stdin.writable) {
      this.markBroken(new EngineIOError('Engine input stream is not writable'));
      throw new EngineClosedError('engine input stream is not writable');
    }

    const line = encodeCommand(command);
    this.logger.debug(`> ${line}`);
    this.streams.stdin.write(`${line}\n`);
  }

  /**
   * Read the next raw line from the engine
   *
   * @throws EngineIOError when the output stream has ended or failed
   */
  async receiveLine(): Promise<string> {
    try {
      const line = await this.reader.read();
      this.logger.debug(`< ${line}`);
      return line;
    } catch (error) {
      const failure =
        error instanceof EngineIOError ? error : new EngineIOError(toError(error).message, error);
      this.markBroken(failure);
      throw failure;
    }
  }

  /**
   * Read and decode the next message from the engine
   */
  async receive(): Promise<UciMessage> {
    return decodeLine(await this.receiveLine());
  }

  /**
   * Mark the handle unusable; later sends fail fast
   */
  markBroken(error: Error): void {
    if (!this.failure) {
      this.failure = error;
      this.logger.debug(`engine handle unusable: ${error.message}`);
    }
  }

  /**
   * The error that made this handle unusable, if any
   */
  get brokenBy(): Error | null {
    return this.failure;
  }

  /**
   * Stop consuming engine output
   */
  close(): void {
    this.reader.close();
  }
}
