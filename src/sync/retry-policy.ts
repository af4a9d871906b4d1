import { setTimeout as sleep } from 'node:timers/promises';
import { SyncError } from '../common/errors.js';

export interface RetryPolicyOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  backoffMs: number | ((attempt: number) => number);
}

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void | Promise<void>;
}

/**
 * Bounded retry around one unit of work, independent of the task queue.
 * Errors from the sync taxonomy carry their own `retryable` flag; anything
 * else is assumed transient.
 */
export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {}

  isRetryable(error: unknown): boolean {
    if (error instanceof SyncError) return error.retryable;
    return true;
  }

  delayFor(attempt: number): number {
    const { backoffMs } = this.options;
    return typeof backoffMs === 'function' ? backoffMs(attempt) : backoffMs;
  }

  async run<T>(fn: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error: unknown) {
        const exhausted = attempt >= this.options.maxAttempts;
        if (exhausted || hooks.signal?.aborted || !this.isRetryable(error)) throw error;

        const delayMs = this.delayFor(attempt);
        await hooks.onRetry?.(error, attempt, delayMs);
        if (delayMs > 0) await sleep(delayMs, undefined, { signal: hooks.signal });
      }
    }
  }
}
