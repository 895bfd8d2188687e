/**
 * Signal Channel - The engine's only wait point
 *
 * Transport callbacks (socket data, command replies, child processes, POSIX
 * signals) push here and return; none of them call into the engine. The run
 * loop awaits next(), then empties the queue with tryNext() before draining
 * the coalesced actions.
 *
 * Only one consumer may wait at a time.
 */

import type { Signal } from '../types/signals';

interface Waiter {
  resolve: (signal: Signal | null) => void;
  timeout: NodeJS.Timeout | null;
}

export class SignalChannel {
  private readonly queue: Signal[] = [];
  private waiter: Waiter | null = null;
  private closed = false;

  push(signal: Signal): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      if (waiter.timeout) clearTimeout(waiter.timeout);
      waiter.resolve(signal);
      return;
    }

    this.queue.push(signal);
  }

  /**
   * Queue a shutdown signal and refuse everything pushed after it.
   */
  close(reason: string): void {
    if (this.closed) return;
    this.push({ kind: 'shutdown', reason });
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Next queued signal without waiting */
  tryNext(): Signal | undefined {
    return this.queue.shift();
  }

  size(): number {
    return this.queue.length;
  }

  /**
   * Wait for the next signal. Resolves null once timeoutMs elapses;
   * a null timeout waits indefinitely.
   */
  next(timeoutMs: number | null): Promise<Signal | null> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.waiter) {
      return Promise.reject(new Error('SignalChannel already has a waiting consumer'));
    }

    if (timeoutMs !== null && timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      const waiter: Waiter = { resolve, timeout: null };
      if (timeoutMs !== null) {
        waiter.timeout = setTimeout(() => {
          if (this.waiter === waiter) {
            this.waiter = null;
          }
          resolve(null);
        }, timeoutMs);
      }
      this.waiter = waiter;
    });
  }
}

export default SignalChannel;
