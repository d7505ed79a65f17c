/**
 * Sparse retrieval: BM25 search over a KB's full-text index, hydrate.
 */

import type { DocumentLookup, KeywordIndex, RetrievalResult } from './types.js';
import type { IndexHit } from '../storage/types.js';
import { hydrateHits } from './hydrate.js';
import { RetrievalError, isCancelledError, isTimeoutError } from '../utils/errors.js';
import { abortReason } from '../utils/async-utils.js';

export interface KeywordRetrieveRequest {
  kbId: string;
  query: string;
  limit: number;
  signal?: AbortSignal;
}

export class KeywordRetriever {
  constructor(
    private readonly index: KeywordIndex,
    private readonly documents: DocumentLookup,
  ) {}

  /**
   * Up to `limit` candidates by BM25 score, origin `keyword`.
   * No internal retry; the caller's failure policy decides.
   */
  async retrieve(request: KeywordRetrieveRequest): Promise<RetrievalResult> {
    const { kbId, query, limit, signal } = request;
    const start = Date.now();
    if (signal?.aborted) throw abortReason(signal);

    let hits: IndexHit[];
    try {
      hits = await this.index.search(kbId, query, limit);
    } catch (error) {
      if (error instanceof RetrievalError || isCancelledError(error) || isTimeoutError(error)) throw error;
      throw new RetrievalError(`Keyword search failed for "${kbId}"`, 'KEYWORD_SEARCH_FAILED', error, kbId);
    }
    if (signal?.aborted) throw abortReason(signal);

    const candidates = await hydrateHits(kbId, hits, 'keyword', this.documents);
    return {
      kbId,
      origin: 'keyword',
      candidates: candidates.slice(0, limit),
      durationMs: Date.now() - start,
    };
  }
}
