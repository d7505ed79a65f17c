/**
 * Embedding client for the DashScope text-embedding endpoint.
 *
 * ```
 * POST { model, input: { texts }, parameters: { text_type: 'query' | 'document' } }
 * 200  { output: { embeddings: [{ text_index, embedding }] } }
 * ```
 *
 * Queries and passages are embedded with different `text_type`s, so one
 * client serves one side: the orchestrator holds a query client, ingest a
 * document client.
 */

import { getModel, type ModelConfig } from './model-registry.js';
import type { FetchLike } from './reranker.js';
import { RetrievalError, isCancelledError, isTimeoutError } from '../utils/errors.js';
import { abortReason } from '../utils/async-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

/**
 * Turns text into a dense vector. Implementations must honour the signal
 * where they can; the caller also bounds each call with a timeout.
 */
export interface EmbeddingClient {
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
  /** Embed several texts at once, results in input order. */
  embedBatch?(texts: readonly string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

export type TextType = 'query' | 'document';

export interface HttpEmbeddingClientOptions {
  endpoint: string;
  /** Model id from the registry. Default: 'text-embedding-v2' */
  modelId?: string;
  /** Absent: every call fails with `AUTH_FAILED` without a request. */
  apiKey?: string;
  /** Embed as documents rather than queries. */
  asDocument?: boolean;
  /** Override fetch (tests). */
  fetch?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract embeddings from a response body, in input order.
 *
 * @throws RetrievalError `EMBEDDING_FAILED` when the body has the wrong shape,
 *   misses or repeats an input, or carries vectors of the wrong size
 */
export function parseEmbeddingResponse(body: unknown, expected: number, dims: number): number[][] {
  const output = isRecord(body) ? body.output : undefined;
  const items = isRecord(output) ? output.embeddings : undefined;
  if (!Array.isArray(items)) {
    throw new RetrievalError('Embedding response has no output.embeddings array', 'EMBEDDING_FAILED');
  }
  if (items.length !== expected) {
    throw new RetrievalError(`Embedding response has ${items.length} vectors for ${expected} texts`, 'EMBEDDING_FAILED');
  }

  const vectors: Array<number[] | undefined> = new Array<number[] | undefined>(expected).fill(undefined);
  items.forEach((item: unknown, position) => {
    const index = isRecord(item) ? item.text_index : undefined;
    const embedding = isRecord(item) ? item.embedding : undefined;
    if (typeof index !== 'number' || !Number.isInteger(index) || index < 0 || index >= expected) {
      throw new RetrievalError(`Embedding ${position} has no valid text_index`, 'EMBEDDING_FAILED');
    }
    if (vectors[index]) {
      throw new RetrievalError(`Embedding response repeats text_index ${index}`, 'EMBEDDING_FAILED');
    }
    if (
      !Array.isArray(embedding) ||
      embedding.length !== dims ||
      !embedding.every((v: unknown) => typeof v === 'number' && Number.isFinite(v))
    ) {
      throw new RetrievalError(`Embedding ${index} is not a finite vector of ${dims} dims`, 'EMBEDDING_FAILED');
    }
    vectors[index] = embedding.map(Number);
  });

  return vectors.map((vector) => vector ?? []);
}

export class HttpEmbeddingClient implements EmbeddingClient {
  readonly config: ModelConfig;
  readonly textType: TextType;
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: HttpEmbeddingClientOptions) {
    this.config = getModel(options.modelId ?? 'text-embedding-v2');
    this.textType = options.asDocument ? 'document' : 'query';
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const [embedding] = await this.request([text], options.signal);
    return embedding;
  }

  /**
   * Embed `texts`, split into requests of at most the model's batch size.
   */
  async embedBatch(texts: readonly string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let start = 0; start < texts.length; start += this.config.maxBatchSize) {
      embeddings.push(...(await this.request(texts.slice(start, start + this.config.maxBatchSize), options.signal)));
    }
    return embeddings;
  }

  private async request(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (signal?.aborted) throw abortReason(signal);
    if (!this.options.apiKey) {
      throw new RetrievalError('No API key configured for the embedding service', 'AUTH_FAILED');
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.options.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.id,
          input: { texts },
          parameters: { text_type: this.textType },
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw abortReason(signal);
      if (isCancelledError(error) || isTimeoutError(error)) throw error;
      throw new RetrievalError(`Embedding request to ${this.options.endpoint} failed`, 'EMBEDDING_FAILED', error);
    }

    if (response.status === 401 || response.status === 403) {
      throw new RetrievalError(`Embedding service rejected credentials (HTTP ${response.status})`, 'AUTH_FAILED');
    }
    if (!response.ok) {
      throw new RetrievalError(`Embedding service returned HTTP ${response.status}`, 'EMBEDDING_FAILED');
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RetrievalError('Embedding response is not JSON', 'EMBEDDING_FAILED', error);
    }

    const embeddings = parseEmbeddingResponse(body, texts.length, this.config.dims);
    log.debug('Embedded', { model: this.config.id, textType: this.textType, texts: texts.length });
    return embeddings;
  }
}
