/**
 * Single-producer, single-consumer event channel for one analysis session
 */

import type { AnalysisEvent } from '@enginelens/types';

import { InvalidArgumentError } from '../errors.js';

type StreamState = 'open' | 'ended' | 'failed' | 'cancelled';

interface PendingNext {
  resolve: (result: IteratorResult<AnalysisEvent, undefined>) => void;
  reject: (error: Error) => void;
}

/**
 * The producer (the reader loop) calls `push`, `end` or `fail`; the consumer
 * iterates or calls `cancel`. A cancelled stream refuses further events, which
 * is how the producer learns the consumer has gone.
 */
export class AnalysisStream implements AsyncIterable<AnalysisEvent> {
  private readonly buffer: AnalysisEvent[] = [];
  private readonly cancelListeners: Array<() => void> = [];
  private pending: PendingNext | null = null;
  private state: StreamState = 'open';
  private failure: Error | null = null;

  /**
   * Publish an event
   *
   * @returns false when the consumer has cancelled or the stream is closed
   */
  push(event: AnalysisEvent): boolean {
    if (this.state !== 'open') {
      return false;
    }
    if (this.pending) {
      const { resolve } = this.pending;
      this.pending = null;
      resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
    return true;
  }

  /**
   * Close the stream normally; buffered events are still delivered
   */
  end(): void {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'ended';
    this.settlePending();
  }

  /**
   * Close the stream with an error, surfaced after buffered events
   */
  fail(error: Error): void {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'failed';
    this.failure = error;
    this.settlePending();
  }

  /**
   * Consumer side: stop receiving events. Buffered events are discarded.
   */
  cancel(): void {
    if (this.state !== 'open') {
      return;
    }
    this.state = 'cancelled';
    this.buffer.length = 0;
    this.settlePending();
    for (const listener of this.cancelListeners.splice(0)) {
      listener();
    }
  }

  /**
   * Run `listener` once if the consumer cancels while the stream is open
   */
  onCancel(listener: () => void): void {
    if (this.state === 'open') {
      this.cancelListeners.push(listener);
    }
  }

  get cancelled(): boolean {
    return this.state === 'cancelled';
  }

  get closed(): boolean {
    return this.state !== 'open';
  }

  next(): Promise<IteratorResult<AnalysisEvent, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve({ value: buffered, done: false });
    }
    if (this.state === 'failed' && this.failure) {
      const failure = this.failure;
      // Report the failure once, then behave as an ended stream
      this.failure = null;
      return Promise.reject(failure);
    }
    if (this.state !== 'open') {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.pending) {
      return Promise.reject(
        new InvalidArgumentError('Analysis session is already being read by another consumer'),
      );
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<AnalysisEvent, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.cancel();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private settlePending(): void {
    if (!this.pending) {
      return;
    }
    const { resolve, reject } = this.pending;
    this.pending = null;
    if (this.state === 'failed' && this.failure) {
      const failure = this.failure;
      this.failure = null;
      reject(failure);
    } else {
      resolve({ value: undefined, done: true });
    }
  }
}
