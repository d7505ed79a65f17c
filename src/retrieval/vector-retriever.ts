/**
 * Dense retrieval: embed the query, search a KB's vector index, hydrate.
 */

import type { DocumentLookup, EmbeddingClient, RetrievalResult, VectorIndex } from './types.js';
import type { IndexHit } from '../storage/types.js';
import { hydrateHits } from './hydrate.js';
import { RetrievalError, isCancelledError, isTimeoutError } from '../utils/errors.js';
import { abortReason } from '../utils/async-utils.js';
import { isFiniteVector } from '../utils/embedding-utils.js';

export interface VectorRetrieveRequest {
  kbId: string;
  query: string;
  limit: number;
  /** Precomputed query embedding; embedded on demand when absent */
  embedding?: readonly number[];
  signal?: AbortSignal;
}

function passThrough(error: unknown): boolean {
  return error instanceof RetrievalError || isCancelledError(error) || isTimeoutError(error);
}

export class VectorRetriever {
  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly index: VectorIndex,
    private readonly documents: DocumentLookup,
  ) {}

  /**
   * Embed query text.
   *
   * @throws RetrievalError `EMBEDDING_FAILED`
   */
  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    if (signal?.aborted) throw abortReason(signal);

    let embedding: number[];
    try {
      embedding = await this.embedder.embed(query, { signal });
    } catch (error) {
      if (passThrough(error)) throw error;
      throw new RetrievalError('Query embedding failed', 'EMBEDDING_FAILED', error);
    }

    if (!isFiniteVector(embedding)) {
      throw new RetrievalError('Embedding client returned an empty or non-finite vector', 'EMBEDDING_FAILED');
    }
    return embedding;
  }

  /**
   * Up to `limit` candidates by cosine similarity, origin `vector`.
   * No internal retry; the caller's failure policy decides.
   */
  async retrieve(request: VectorRetrieveRequest): Promise<RetrievalResult> {
    const { kbId, query, limit, signal } = request;
    const start = Date.now();

    const embedding = request.embedding ?? (await this.embedQuery(query, signal));
    if (signal?.aborted) throw abortReason(signal);

    let hits: IndexHit[];
    try {
      hits = await this.index.search(kbId, embedding, limit);
    } catch (error) {
      if (passThrough(error)) throw error;
      throw new RetrievalError(`Vector search failed for "${kbId}"`, 'VECTOR_SEARCH_FAILED', error, kbId);
    }
    if (signal?.aborted) throw abortReason(signal);

    const candidates = await hydrateHits(kbId, hits, 'vector', this.documents);
    return {
      kbId,
      origin: 'vector',
      candidates: candidates.slice(0, limit),
      durationMs: Date.now() - start,
    };
  }
}
