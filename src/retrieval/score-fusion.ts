/**
 * Weighted min-max fusion of vector and keyword results for one KB.
 *
 * Each list is min-max normalized to [0, 1] on its own, then combined:
 *   fused = w·v + (1 − w)·k
 * A document found by only one retriever gets that retriever's term alone,
 * so it is never discarded, only ranked lower than one both retrievers agree on.
 */

import type { Candidate, RetrieverKind } from './types.js';
import { ConfigError } from '../utils/errors.js';

export interface FusionOptions {
  /** Vector weight in [0, 1]; keyword weight is 1 − weight */
  weight: number;
  /** Maximum candidates returned */
  limit: number;
}

/**
 * Min-max normalize scores to [0, 1]. A list of size ≤ 1, or one whose scores
 * are all equal, normalizes to 1.0 throughout.
 */
export function minMaxNormalize(scores: readonly number[]): number[] {
  if (scores.length <= 1) return scores.map(() => 1);

  let min = Infinity;
  let max = -Infinity;
  for (const s of scores) {
    if (s < min) min = s;
    if (s > max) max = s;
  }
  const range = max - min;
  if (range === 0) return scores.map(() => 1);

  return scores.map((s) => (s - min) / range);
}

/** Locale-independent string order. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Normalize a list and keep the best normalized score per document id.
 */
function normalizeById(candidates: readonly Candidate[]): Map<string, { candidate: Candidate; score: number }> {
  const normalized = minMaxNormalize(candidates.map((c) => c.score));
  const best = new Map<string, { candidate: Candidate; score: number }>();
  candidates.forEach((candidate, i) => {
    const existing = best.get(candidate.document.id);
    if (!existing || normalized[i] > existing.score) {
      best.set(candidate.document.id, { candidate, score: normalized[i] });
    }
  });
  return best;
}

export function validateFusionWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
    throw new ConfigError(`Fusion weight must be between 0 and 1, got ${weight}`, 'INVALID_VALUE');
  }
}

/**
 * Fuse vector and keyword candidates into one ranking.
 *
 * Ordering: fused score descending, then number of retrievers that found the
 * document (more first), then document id ascending. Deterministic for equal
 * inputs.
 *
 * @throws ConfigError `INVALID_VALUE` when the weight is outside [0, 1] or the
 *   limit is not a non-negative integer
 */
export function fuseScores(
  vector: readonly Candidate[],
  keyword: readonly Candidate[],
  options: FusionOptions,
): Candidate[] {
  const { weight, limit } = options;
  validateFusionWeight(weight);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ConfigError(`Fusion limit must be a non-negative integer, got ${limit}`, 'INVALID_VALUE');
  }

  const vectorById = normalizeById(vector);
  const keywordById = normalizeById(keyword);

  const ids = new Set<string>([...vectorById.keys(), ...keywordById.keys()]);
  const fused: Candidate[] = [];

  for (const id of ids) {
    const v = vectorById.get(id);
    const k = keywordById.get(id);
    const sources: RetrieverKind[] = [];
    let score = 0;
    if (v) {
      score += weight * v.score;
      sources.push('vector');
    }
    if (k) {
      score += (1 - weight) * k.score;
      sources.push('keyword');
    }

    const document = (v ?? k)?.candidate.document;
    if (!document) continue;
    fused.push({ document, score, origin: 'fused', sources });
  }

  fused.sort(
    (a, b) =>
      b.score - a.score || b.sources.length - a.sources.length || compareIds(a.document.id, b.document.id),
  );

  return fused.slice(0, limit);
}
