/**
 * Cross-encoder reranking over HTTP.
 *
 * Speaks the DashScope text-rerank format:
 *
 * ```
 * POST { model, input: { query, documents }, parameters: { return_documents: false, top_n } }
 * 200  { output: { results: [{ index, relevance_score }] } }
 * ```
 */

import { RerankError, isCancelledError, isTimeoutError } from '../utils/errors.js';
import { abortReason } from '../utils/async-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reranker');

/** One reranker judgement: position in the submitted list and its score. */
export interface RerankScore {
  index: number;
  score: number;
}

export interface RerankOptions {
  /** How many results the service should return; 0 or absent means all. */
  topN?: number;
  signal?: AbortSignal;
}

/**
 * Scores (query, passage) pairs. Results may come back in any order.
 */
export interface RerankerClient {
  rerank(query: string, texts: readonly string[], options?: RerankOptions): Promise<RerankScore[]>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpRerankerClientOptions {
  endpoint: string;
  model: string;
  apiKey: string;
  /** Override fetch (tests). */
  fetch?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract `{ index, score }` pairs from a response body.
 *
 * @throws RerankError `RERANK_BAD_RESPONSE` when the body has the wrong shape
 */
export function parseRerankResponse(body: unknown): RerankScore[] {
  const output = isRecord(body) ? body.output : undefined;
  const results = isRecord(output) ? output.results : undefined;
  if (!Array.isArray(results)) {
    throw new RerankError('Rerank response has no output.results array', 'RERANK_BAD_RESPONSE');
  }

  return results.map((item: unknown, position) => {
    if (!isRecord(item) || typeof item.index !== 'number' || typeof item.relevance_score !== 'number') {
      throw new RerankError(`Rerank result ${position} is missing index or relevance_score`, 'RERANK_BAD_RESPONSE');
    }
    return { index: item.index, score: item.relevance_score };
  });
}

export class HttpRerankerClient implements RerankerClient {
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: HttpRerankerClientOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async rerank(query: string, texts: readonly string[], options: RerankOptions = {}): Promise<RerankScore[]> {
    const { signal } = options;
    if (texts.length === 0) return [];
    if (signal?.aborted) throw abortReason(signal);

    const topN = options.topN && options.topN > 0 ? Math.min(options.topN, texts.length) : texts.length;
    let response: Response;
    try {
      response = await this.fetchFn(this.options.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          input: { query, documents: texts },
          parameters: { return_documents: false, top_n: topN },
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal);
      if (isCancelledError(error) || isTimeoutError(error)) throw error;
      throw new RerankError(`Rerank request to ${this.options.endpoint} failed`, 'RERANK_FAILED', error);
    }

    if (response.status === 401 || response.status === 403) {
      throw new RerankError(`Reranker rejected credentials (HTTP ${response.status})`, 'AUTH_FAILED');
    }
    if (!response.ok) {
      throw new RerankError(`Reranker returned HTTP ${response.status}`, 'RERANK_FAILED');
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RerankError('Rerank response is not JSON', 'RERANK_BAD_RESPONSE', error);
    }

    const scores = parseRerankResponse(body);
    log.debug('Reranked', { model: this.options.model, documents: texts.length, results: scores.length });
    return scores;
  }
}
