/**
 * Retry and timeout policy for calls to indices and the embedding service.
 *
 * A failed call is retried up to `retries` times with exponential backoff,
 * except when retrying cannot help: the error code is critical (missing
 * index, lost connection, bad credentials), the request deadline has passed,
 * or the caller cancelled.
 */

import type { FailurePolicyConfig } from '../config/retrieval-config.js';
import { withRetry, type Deadline } from '../utils/async-utils.js';
import { errorCode, errorMessage, isCancelledError, isErrorWithCode } from '../utils/errors.js';
import type { EventRecorder } from './pipeline-events.js';

export function isCriticalError(error: unknown, policy: FailurePolicyConfig): boolean {
  return policy.criticalErrorCodes.includes(errorCode(error));
}

/**
 * Whether another attempt may succeed.
 */
export function shouldRetry(error: unknown, policy: FailurePolicyConfig, deadline?: Deadline): boolean {
  if (isCancelledError(error) || isErrorWithCode(error, 'DEADLINE_EXCEEDED')) return false;
  if (deadline && (deadline.signal.aborted || deadline.remainingMs() <= 0)) return false;
  return !isCriticalError(error, policy);
}

export interface PolicyCallOptions {
  policy: FailurePolicyConfig;
  deadline: Deadline;
  /** The call's own timeout; capped by what is left of the deadline */
  timeoutMs: number;
  events?: EventRecorder;
  kbId?: string;
}

/**
 * Run one external call under the failure policy. Each attempt gets
 * `min(timeoutMs, remaining deadline)` and a signal that aborts with the
 * deadline or the caller.
 */
export function callWithPolicy<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: PolicyCallOptions,
): Promise<T> {
  const { policy, deadline, timeoutMs, events, kbId } = options;

  return withRetry(() => deadline.run(label, timeoutMs, fn), {
    maxRetries: policy.retries,
    initialDelayMs: policy.retryIntervalMs,
    maxDelayMs: Number.POSITIVE_INFINITY,
    backoffFactor: policy.backoffFactor,
    retryOn: (error) => shouldRetry(error, policy, deadline),
    onRetry: (attempt, error, delayMs) => {
      events?.record({
        kind: 'retry',
        reason: errorCode(error),
        kbId,
        message: `Retrying ${label} (attempt ${attempt + 1}) in ${delayMs}ms: ${errorMessage(error)}`,
      });
    },
    signal: deadline.signal,
  });
}
