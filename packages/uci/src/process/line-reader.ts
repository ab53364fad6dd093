/**
 * Pull-based line reader over the engine's stdout
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';

import { EngineIOError, UciClientError } from '../errors.js';

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Buffers complete lines from a stream and hands them out one `read()` at a time.
 *
 * Only one read may be outstanding. Lines that arrived before the stream
 * closed are still delivered; after that every read rejects with the
 * close reason.
 */
export class LineReader {
  private readonly lines: string[] = [];
  private readonly rl: Interface;
  private pending: PendingRead | null = null;
  private closedWith: Error | null = null;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.rl.on('line', (line) => this.deliver(line));
    this.rl.on('close', () => this.fail(new EngineIOError('Engine output stream closed')));
    input.on('error', (error) =>
      this.fail(new EngineIOError(`Engine output stream failed: ${error.message}`, error)),
    );
  }

  /**
   * Resolve with the next line, waiting for the engine if none is buffered
   */
  read(): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    if (this.pending) {
      return Promise.reject(new UciClientError('Concurrent reads on the engine output'));
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /**
   * Whether the underlying stream has ended or failed
   */
  get closed(): boolean {
    return this.closedWith !== null;
  }

  /**
   * Stop reading from the stream
   */
  close(): void {
    this.rl.close();
  }

  private deliver(line: string): void {
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve(line);
      return;
    }
    this.lines.push(line);
  }

  private fail(error: Error): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = error;
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }
}
