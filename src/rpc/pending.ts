/**
 * Pending request table.
 *
 * The single owner of request bookkeeping for one multiplexer: identifier
 * allocation, the id → PendingRequest map, and the timers and abort
 * listeners attached to each entry. Every path that settles an entry
 * (response, timeout, cancellation, closure) goes through take(), so an
 * entry is settled at most once and never leaks its timer.
 */

import { CancelledError, TimeoutError } from './errors.js';
import type { JsonRpcId } from './types.js';
import { errors } from '../strings/index.js';

/**
 * Bookkeeping for one outstanding request
 */
export interface PendingRequest {
  id: JsonRpcId;
  method: string;
  /** Epoch milliseconds at registration */
  createdAt: number;
  timeoutMs: number;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
  signal?: AbortSignal;
  abortHandler?: () => void;
}

export interface RegisterOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export class PendingRequests {
  private entries = new Map<JsonRpcId, PendingRequest>();
  private nextId = 1;

  /**
   * Next request id. Starts at 1 and is never reused.
   */
  allocateId(): number {
    return this.nextId++;
  }

  /**
   * Register a request and return the promise its caller awaits.
   *
   * The timeout starts now. If `signal` aborts first, the entry is removed
   * and the promise rejects with CancelledError.
   */
  register(id: JsonRpcId, method: string, options: RegisterOptions): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        const entry = this.take(id);
        entry?.reject(
          new TimeoutError(
            errors.call.timedOut(id, method, options.timeoutMs),
            id,
            method,
            options.timeoutMs,
          ),
        );
      }, options.timeoutMs);

      const entry: PendingRequest = {
        id,
        method,
        createdAt: Date.now(),
        timeoutMs: options.timeoutMs,
        resolve,
        reject,
        timer,
      };

      if (options.signal) {
        const abortHandler = (): void => {
          this.take(id)?.reject(new CancelledError(errors.call.cancelled(id, method), method));
        };
        entry.signal = options.signal;
        entry.abortHandler = abortHandler;
        options.signal.addEventListener('abort', abortHandler, { once: true });
      }

      this.entries.set(id, entry);
    });
  }

  /**
   * Remove an entry and detach its timer and abort listener.
   * Returns undefined when no request with that id is pending.
   */
  take(id: JsonRpcId): PendingRequest | undefined {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(id);
    clearTimeout(entry.timer);
    if (entry.signal && entry.abortHandler) {
      entry.signal.removeEventListener('abort', entry.abortHandler);
    }
    return entry;
  }

  /**
   * Settle every pending request with an error built per entry.
   *
   * @returns how many requests were rejected
   */
  rejectAll(makeError: (entry: PendingRequest) => Error): number {
    const ids = Array.from(this.entries.keys());
    for (const id of ids) {
      const entry = this.take(id);
      entry?.reject(makeError(entry));
    }
    return ids.length;
  }

  has(id: JsonRpcId): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
