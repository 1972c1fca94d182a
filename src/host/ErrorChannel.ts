/**
 * Unbounded async error queue. `push` never blocks; `receive` waits for the
 * next error and resolves `undefined` once the channel is closed and empty.
 */

import type { Logger } from 'pino';
import { createLogger } from '../logging/logger.ts';

export class ErrorChannel implements AsyncIterable<Error> {
  private readonly buffer: Error[] = [];
  private readonly waiters: Array<(err: Error | undefined) => void> = [];
  private closed = false;
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('error-channel');
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the channel is closed and the error was dropped. */
  push(err: Error): boolean {
    if (this.closed) {
      this.log.warn({ err }, 'error reported after channel close; dropped');
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter !== undefined) waiter(err);
    else this.buffer.push(err);
    return true;
  }

  receive(): Promise<Error | undefined> {
    const next = this.buffer.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Take everything buffered without waiting. */
  drain(): Error[] {
    return this.buffer.splice(0);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Error> {
    for (;;) {
      const err = await this.receive();
      if (err === undefined) return;
      yield err;
    }
  }
}
