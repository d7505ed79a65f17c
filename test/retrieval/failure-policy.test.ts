/**
 * Tests for the retry and timeout policy.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { callWithPolicy, isCriticalError, shouldRetry } from '../../src/retrieval/failure-policy.js';
import { PipelineEvents } from '../../src/retrieval/pipeline-events.js';
import type { FailurePolicyConfig } from '../../src/config/retrieval-config.js';
import { Deadline } from '../../src/utils/async-utils.js';
import { CancelledError, RetrievalError, TimeoutError } from '../../src/utils/errors.js';

const policy: FailurePolicyConfig = {
  retries: 2,
  retryIntervalMs: 1,
  backoffFactor: 2,
  criticalErrorCodes: ['INDEX_NOT_FOUND', 'CONNECTION_FAILED', 'AUTH_FAILED'],
};

describe('failure-policy', () => {
  const deadlines: Deadline[] = [];
  const newDeadline = (budgetMs: number = 5000, parent?: AbortSignal): Deadline => {
    const deadline = new Deadline(budgetMs, parent);
    deadlines.push(deadline);
    return deadline;
  };

  afterEach(() => {
    for (const deadline of deadlines.splice(0)) deadline.dispose();
  });

  describe('isCriticalError', () => {
    it('matches configured codes', () => {
      expect(isCriticalError(new RetrievalError('no index', 'INDEX_NOT_FOUND'), policy)).toBe(true);
      expect(isCriticalError(new RetrievalError('slow', 'VECTOR_SEARCH_FAILED'), policy)).toBe(false);
      expect(isCriticalError(new Error('plain'), policy)).toBe(false);
    });
  });

  describe('shouldRetry', () => {
    it('retries transient failures', () => {
      expect(shouldRetry(new RetrievalError('flaky', 'KEYWORD_SEARCH_FAILED'), policy)).toBe(true);
      expect(shouldRetry(new TimeoutError('slow', 'TIMEOUT', 10), policy)).toBe(true);
    });

    it('does not retry critical, cancelled or deadline failures', () => {
      expect(shouldRetry(new RetrievalError('denied', 'AUTH_FAILED'), policy)).toBe(false);
      expect(shouldRetry(new CancelledError(), policy)).toBe(false);
      expect(shouldRetry(new TimeoutError('late', 'DEADLINE_EXCEEDED', 10), policy)).toBe(false);
    });

    it('does not retry once the deadline is spent', () => {
      const deadline = newDeadline(0);
      expect(shouldRetry(new RetrievalError('flaky', 'KEYWORD_SEARCH_FAILED'), policy, deadline)).toBe(false);
    });
  });

  describe('callWithPolicy', () => {
    it('retries up to the configured count and records each retry', async () => {
      const events = new PipelineEvents();
      let attempts = 0;

      const result = await callWithPolicy(
        'keyword search legal',
        async () => {
          attempts++;
          if (attempts < 3) throw new RetrievalError('flaky', 'KEYWORD_SEARCH_FAILED');
          return 'ok';
        },
        { policy, deadline: newDeadline(), timeoutMs: 1000, events, kbId: 'legal' },
      );

      expect(result).toBe('ok');
      expect(attempts).toBe(3);
      expect(events.count('retry', 'KEYWORD_SEARCH_FAILED')).toBe(2);
      expect(events.recent()[0]).toMatchObject({ kind: 'retry', kbId: 'legal', severity: 'info' });
    });

    it('gives up after retries are exhausted', async () => {
      let attempts = 0;

      await expect(
        callWithPolicy(
          'vector search',
          async () => {
            attempts++;
            throw new RetrievalError('flaky', 'VECTOR_SEARCH_FAILED');
          },
          { policy, deadline: newDeadline(), timeoutMs: 1000 },
        ),
      ).rejects.toMatchObject({ code: 'VECTOR_SEARCH_FAILED' });
      expect(attempts).toBe(3);
    });

    it('does not retry a critical error', async () => {
      let attempts = 0;

      await expect(
        callWithPolicy(
          'vector search',
          async () => {
            attempts++;
            throw new RetrievalError('no index', 'INDEX_NOT_FOUND');
          },
          { policy, deadline: newDeadline(), timeoutMs: 1000 },
        ),
      ).rejects.toMatchObject({ code: 'INDEX_NOT_FOUND' });
      expect(attempts).toBe(1);
    });

    it('times out each attempt', async () => {
      let attempts = 0;

      await expect(
        callWithPolicy(
          'embed query',
          () => {
            attempts++;
            return new Promise<never>(() => {});
          },
          { policy: { ...policy, retries: 1 }, deadline: newDeadline(), timeoutMs: 10 },
        ),
      ).rejects.toMatchObject({ code: 'TIMEOUT' });
      expect(attempts).toBe(2);
    });

    it('stops at the request deadline', async () => {
      let attempts = 0;

      await expect(
        callWithPolicy(
          'embed query',
          () => {
            attempts++;
            return new Promise<never>(() => {});
          },
          { policy: { ...policy, retries: 5 }, deadline: newDeadline(0), timeoutMs: 1000 },
        ),
      ).rejects.toMatchObject({ code: 'DEADLINE_EXCEEDED' });
      expect(attempts).toBe(1);
    });

    it('propagates caller cancellation without retrying', async () => {
      const controller = new AbortController();
      const deadline = newDeadline(5000, controller.signal);
      let attempts = 0;

      const call = callWithPolicy(
        'keyword search',
        () => {
          attempts++;
          return new Promise<never>(() => {});
        },
        { policy, deadline, timeoutMs: 1000 },
      );
      controller.abort();

      await expect(call).rejects.toBeInstanceOf(CancelledError);
      expect(attempts).toBe(1);
    });
  });
});
