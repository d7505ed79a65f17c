/**
 * Merge per-KB results into one global top-K.
 *
 * Raw scores from different KBs are not comparable (different corpora,
 * different reranker calibration), so each KB's list is min-max normalized
 * before the global sort. Rank within the KB breaks ties, which interleaves
 * KBs whose leaders all normalize to 1.0.
 */

import type { KbOutcome, KbSummary, MergedCandidate } from './types.js';
import { compareIds, minMaxNormalize } from './score-fusion.js';
import { NoResultsError, errorCode, errorMessage, type KbOmission } from '../utils/errors.js';

export interface MergeOptions {
  topK: number;
}

export interface MergeResult {
  candidates: MergedCandidate[];
  omissions: KbOmission[];
  knowledgeBases: KbSummary[];
}

export function toOmission(kbId: string, error: unknown): KbOmission {
  return { kbId, code: errorCode(error), reason: errorMessage(error) };
}

/**
 * Merge KB outcomes. Failed KBs become omissions; KBs that succeeded with no
 * candidates are summarised as `empty`.
 *
 * @throws NoResultsError when no KB contributes a candidate
 */
export function mergeKnowledgeBases(outcomes: readonly KbOutcome[], options: MergeOptions): MergeResult {
  const omissions: KbOmission[] = [];
  const knowledgeBases: KbSummary[] = [];
  const pool: MergedCandidate[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      omissions.push(toOmission(outcome.kbId, outcome.error));
      knowledgeBases.push({
        kbId: outcome.kbId,
        status: 'omitted',
        candidateCount: 0,
        rerankFallback: false,
        partial: false,
        durationMs: 0,
      });
      continue;
    }

    const { result } = outcome;
    const normalized = minMaxNormalize(result.candidates.map((c) => c.score));
    result.candidates.forEach((candidate, i) => {
      pool.push({
        ...candidate,
        score: normalized[i],
        kbId: result.kbId,
        normalizedScore: normalized[i],
        localScore: candidate.score,
        localRank: i + 1,
      });
    });
    knowledgeBases.push({
      kbId: result.kbId,
      status: result.candidates.length > 0 ? 'ok' : 'empty',
      candidateCount: 0,
      origin: result.origin,
      rerankFallback: false,
      partial: false,
      durationMs: result.durationMs,
    });
  }

  pool.sort(
    (a, b) =>
      b.normalizedScore - a.normalizedScore ||
      a.localRank - b.localRank ||
      compareIds(a.kbId, b.kbId) ||
      compareIds(a.document.id, b.document.id),
  );
  const candidates = pool.slice(0, options.topK);

  if (candidates.length === 0) {
    throw new NoResultsError(
      omissions.length > 0
        ? `No knowledge base returned results (${omissions.length} omitted)`
        : 'No knowledge base returned results',
      omissions,
    );
  }

  for (const summary of knowledgeBases) {
    summary.candidateCount = candidates.filter((c) => c.kbId === summary.kbId).length;
  }

  return { candidates, omissions, knowledgeBases };
}
