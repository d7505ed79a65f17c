/**
 * Timeouts, cancellation and retry for calls that cross a service boundary.
 *
 * Every external call in the pipeline (embedding, index queries, reranking)
 * runs through `withTimeout`, which races the call against its allowance and
 * an AbortSignal. `withRetry` adds exponential backoff with a predicate that
 * decides which errors are worth another attempt.
 */

import { CancelledError, TimeoutError } from './errors.js';

/** Retry options */
export interface RetryOptions {
  /** Maximum number of retries. Default: 3 */
  maxRetries?: number;
  /** Initial delay in ms. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 10000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: all errors */
  retryOn?: (error: Error) => boolean;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Abort retries (and the backoff sleep) */
  signal?: AbortSignal;
}

/**
 * Calculate exponential backoff delay.
 */
export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt);
  return Math.min(delay, maxDelayMs);
}

/**
 * Sleep for a duration. Rejects with CancelledError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Error to reject with when a signal aborts. Kbrank errors set as the abort
 * reason (TimeoutError for deadlines, CancelledError for callers) pass through.
 */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof TimeoutError || reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError('Operation aborted', reason);
}

/**
 * Run `fn` with a timeout. The function receives a signal that aborts when
 * the timeout elapses or the parent signal aborts, so well-behaved callees
 * stop their own I/O.
 *
 * @param label - Used in the timeout message
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.max(0, timeoutMs));

    if (parent) {
      onParentAbort = () => {
        const error = abortReason(parent);
        controller.abort(error);
        reject(error);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    backoffFactor = 2,
    retryOn = () => true,
    onRetry,
    signal,
  } = options;

  let lastError: Error = new Error('withRetry: no attempt made');

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffFactor);
      onRetry?.(attempt, lastError, delay);
      await sleep(delay, signal);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxRetries || !retryOn(lastError) || signal?.aborted) {
        throw lastError;
      }
    }
  }

  throw lastError;
}

/**
 * End-to-end deadline shared by all stages of one request.
 *
 * The signal aborts with a `DEADLINE_EXCEEDED` TimeoutError when the deadline
 * elapses, or with the caller's reason when the caller's signal aborts.
 */
export class Deadline {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly expiresAt: number;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onParentAbort: () => void;

  constructor(
    readonly budgetMs: number,
    private readonly parent?: AbortSignal,
    private readonly now: () => number = Date.now,
  ) {
    this.signal = this.controller.signal;
    this.expiresAt = this.now() + budgetMs;
    this.timer = setTimeout(() => {
      this.controller.abort(this.exceededError());
    }, budgetMs);

    this.onParentAbort = () => {
      this.controller.abort(new CancelledError('Request cancelled by caller', parent?.reason));
    };
    if (parent?.aborted) {
      this.onParentAbort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  /** Milliseconds left before the deadline (never negative). */
  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  /** Allowance for one call: its own timeout, capped by what is left. */
  allowance(callTimeoutMs: number): number {
    return Math.min(callTimeoutMs, this.remainingMs());
  }

  /**
   * Run one call under `allowance(callTimeoutMs)`. A timeout caused by the
   * deadline rather than the call's own limit rejects with `DEADLINE_EXCEEDED`.
   */
  async run<T>(label: string, callTimeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const allowanceMs = this.allowance(callTimeoutMs);
    try {
      return await withTimeout(label, allowanceMs, fn, this.signal);
    } catch (error) {
      if (allowanceMs < callTimeoutMs && error instanceof TimeoutError && error.code === 'TIMEOUT') {
        throw this.exceededError();
      }
      throw error;
    }
  }

  /** True when the caller (not the deadline) cancelled. */
  get cancelledByCaller(): boolean {
    return this.parent?.aborted === true;
  }

  private exceededError(): TimeoutError {
    return new TimeoutError(`Request deadline of ${this.budgetMs}ms exceeded`, 'DEADLINE_EXCEEDED', this.budgetMs);
  }

  /** Stop the timer and detach from the caller's signal. */
  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}
