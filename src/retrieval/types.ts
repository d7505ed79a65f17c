/**
 * Types shared by the retrieval pipeline stages.
 *
 * @module retrieval/types
 */

import type { IndexHit, KbDocument } from '../storage/types.js';
import type { KbOmission } from '../utils/errors.js';
import type { PipelineEvent } from './pipeline-events.js';

export type { EmbeddingClient } from '../models/embedder.js';
export type { RerankerClient, RerankScore, RerankOptions } from '../models/reranker.js';

/**
 * Which stage produced a candidate's current score.
 */
export type ScoreOrigin = 'vector' | 'keyword' | 'fused' | 'reranked';

/** First-pass retrievers. */
export type RetrieverKind = 'vector' | 'keyword';

/**
 * A document scored by one stage. Higher scores are better.
 */
export interface Candidate {
  document: KbDocument;
  score: number;
  origin: ScoreOrigin;
  /** First-pass retrievers that found this document */
  sources: readonly RetrieverKind[];
}

/**
 * One stage's ordered output for one knowledge base.
 *
 * Scores are non-increasing and document ids unique.
 */
export interface RetrievalResult {
  kbId: string;
  origin: ScoreOrigin;
  candidates: Candidate[];
  durationMs: number;
}

/**
 * A candidate in the cross-KB ranking.
 */
export interface MergedCandidate extends Candidate {
  kbId: string;
  /** Score after per-KB min-max normalization, in [0, 1]; equals `score` */
  normalizedScore: number;
  /** Score as produced by the KB's last stage */
  localScore: number;
  /** 1-based rank within its KB */
  localRank: number;
}

export type KbStatus = 'ok' | 'empty' | 'omitted';

/**
 * Per-KB outcome of one request.
 */
export interface KbSummary {
  kbId: string;
  status: KbStatus;
  /** Candidates the KB contributed to the merge */
  candidateCount: number;
  /** Origin of the KB's final ordering (absent when omitted) */
  origin?: ScoreOrigin;
  /** True when reranking failed and the fused order was used */
  rerankFallback: boolean;
  /** True when only one of vector or keyword retrieval succeeded */
  partial: boolean;
  durationMs: number;
}

/**
 * Everything answer generation needs from retrieval.
 */
export interface MergedAnswerContext {
  query: string;
  candidates: MergedCandidate[];
  topK: number;
  omissions: KbOmission[];
  degradations: PipelineEvent[];
  knowledgeBases: KbSummary[];
  durationMs: number;
}

/**
 * Outcome of one KB's retrieval, as the merger sees it.
 */
export type KbOutcome =
  | { status: 'ok'; result: RetrievalResult }
  | { status: 'failed'; kbId: string; error: unknown };

/** Nearest-neighbour search over a KB's embeddings. */
export interface VectorIndex {
  search(kbId: string, embedding: readonly number[], limit: number): Promise<IndexHit[]>;
}

/** BM25 full-text search over a KB. */
export interface KeywordIndex {
  search(kbId: string, query: string, limit: number): Promise<IndexHit[]>;
}

/** Resolves index hits to documents. Missing ids are absent from the map. */
export interface DocumentLookup {
  getDocuments(kbId: string, ids: readonly string[]): Promise<Map<string, KbDocument>>;
}
