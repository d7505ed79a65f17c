/**
 * Cross-encoder reranking of one KB's fused candidates, with fallback.
 *
 * Reranking refines an already usable ordering, so it never fails a request:
 * if the reranker errors, times out or answers with something that does not
 * line up with what was sent, the fused order is kept (truncated to the same
 * size) and a `rerank-fallback` event is recorded.
 */

import type { Candidate, RerankScore, RerankerClient, RetrievalResult } from './types.js';
import type { EventRecorder } from './pipeline-events.js';
import { compareIds } from './score-fusion.js';
import { withTimeout, type Deadline } from '../utils/async-utils.js';
import { RerankError, errorCode, errorMessage, isCancelledError } from '../utils/errors.js';

export interface RerankIntegrationOptions {
  /** Candidates kept after reranking (M) */
  topN: number;
  /** Absent: reranking is skipped */
  client?: RerankerClient;
  timeoutMs: number;
  /** Caller's signal, used when no deadline is given */
  signal?: AbortSignal;
  /** Request deadline; caps `timeoutMs` and supplies the signal */
  deadline?: Deadline;
  events?: EventRecorder;
}

export interface RerankOutcome {
  result: RetrievalResult;
  /** True when the reranker failed and the fused order was kept */
  fallback: boolean;
}

/**
 * Check that the reranker scored every submitted text exactly once.
 *
 * @throws RerankError `RERANK_BAD_RESPONSE`
 */
export function validateRerankScores(scores: readonly RerankScore[], expected: number): void {
  if (scores.length !== expected) {
    throw new RerankError(
      `Reranker returned ${scores.length} results for ${expected} candidates`,
      'RERANK_BAD_RESPONSE',
    );
  }
  const seen = new Set<number>();
  for (const { index, score } of scores) {
    if (!Number.isInteger(index) || index < 0 || index >= expected) {
      throw new RerankError(`Reranker returned out-of-range index ${index}`, 'RERANK_BAD_RESPONSE');
    }
    if (seen.has(index)) {
      throw new RerankError(`Reranker returned index ${index} twice`, 'RERANK_BAD_RESPONSE');
    }
    if (!Number.isFinite(score)) {
      throw new RerankError(`Reranker returned a non-finite score for index ${index}`, 'RERANK_BAD_RESPONSE');
    }
    seen.add(index);
  }
}

/**
 * Rerank a fused result and keep the best `topN`.
 *
 * Inputs with fewer than two candidates, or no client, pass through with
 * origin unchanged. Caller cancellation propagates; every other failure falls
 * back to the fused order.
 */
export async function rerankResult(
  query: string,
  fused: RetrievalResult,
  options: RerankIntegrationOptions,
): Promise<RerankOutcome> {
  const { topN, client, timeoutMs, signal, deadline, events } = options;
  const start = Date.now();
  const keepFused = (): RetrievalResult => ({
    ...fused,
    candidates: fused.candidates.slice(0, topN),
    durationMs: fused.durationMs + (Date.now() - start),
  });

  if (!client || fused.candidates.length <= 1) {
    return { result: keepFused(), fallback: false };
  }

  const candidates = fused.candidates;
  try {
    const label = `rerank ${fused.kbId}`;
    const call = (callSignal: AbortSignal): Promise<RerankScore[]> =>
      client.rerank(
        query,
        candidates.map((c) => c.document.content),
        { topN: candidates.length, signal: callSignal },
      );
    const scores = deadline
      ? await deadline.run(label, timeoutMs, call)
      : await withTimeout(label, timeoutMs, call, signal);
    validateRerankScores(scores, candidates.length);

    const reranked: Candidate[] = scores.map(({ index, score }) => ({
      ...candidates[index],
      score,
      origin: 'reranked',
    }));
    reranked.sort((a, b) => b.score - a.score || compareIds(a.document.id, b.document.id));

    return {
      result: {
        kbId: fused.kbId,
        origin: 'reranked',
        candidates: reranked.slice(0, topN),
        durationMs: fused.durationMs + (Date.now() - start),
      },
      fallback: false,
    };
  } catch (error) {
    if (isCancelledError(error)) throw error;

    events?.record({
      kind: 'rerank-fallback',
      reason: errorCode(error),
      kbId: fused.kbId,
      message: `Reranking "${fused.kbId}" failed, keeping fused order: ${errorMessage(error)}`,
    });
    return { result: keepFused(), fallback: true };
  }
}
