/**
 * Tests for the HTTP reranker client.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpRerankerClient, parseRerankResponse, type FetchLike } from '../../src/models/reranker.js';
import { CancelledError, RerankError } from '../../src/utils/errors.js';

const ENDPOINT = 'https://rerank.test/v1/rerank';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function clientWith(fetch: FetchLike): HttpRerankerClient {
  return new HttpRerankerClient({ endpoint: ENDPOINT, model: 'gte-rerank', apiKey: 'test-secret', fetch });
}

describe('HttpRerankerClient', () => {
  it('posts the query and documents and returns scores', async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      jsonResponse({
        output: {
          results: [
            { index: 1, relevance_score: 0.9 },
            { index: 0, relevance_score: 0.1 },
          ],
        },
      }),
    );

    const scores = await clientWith(fetch).rerank('notice period', ['a', 'b'], { topN: 5 });

    expect(scores).toEqual([
      { index: 1, score: 0.9 },
      { index: 0, score: 0.1 },
    ]);
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'content-type': 'application/json', authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'gte-rerank',
      input: { query: 'notice period', documents: ['a', 'b'] },
      parameters: { return_documents: false, top_n: 2 },
    });
  });

  it('asks for every document without a topN', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ output: { results: [] } }));

    await clientWith(fetch).rerank('q', ['a', 'b', 'c']);

    expect(JSON.parse(String(fetch.mock.calls[0][1].body)).parameters.top_n).toBe(3);
  });

  it('skips the call for no documents', async () => {
    const fetch = vi.fn<FetchLike>();

    expect(await clientWith(fetch).rerank('q', [])).toEqual([]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it.each([401, 403])('maps HTTP %i to AUTH_FAILED', async (status) => {
    const client = clientWith(async () => jsonResponse({ message: 'denied' }, status));

    await expect(client.rerank('q', ['a'])).rejects.toMatchObject({ code: 'AUTH_FAILED' });
  });

  it('maps other HTTP errors to RERANK_FAILED', async () => {
    const client = clientWith(async () => jsonResponse({ message: 'busy' }, 503));

    await expect(client.rerank('q', ['a'])).rejects.toMatchObject({
      code: 'RERANK_FAILED',
      message: 'Reranker returned HTTP 503',
    });
  });

  it('maps network failures to RERANK_FAILED', async () => {
    const client = clientWith(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await client.rerank('q', ['a']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RerankError);
    expect(error).toMatchObject({ code: 'RERANK_FAILED' });
  });

  it('rejects a body that is not JSON', async () => {
    const client = clientWith(async () => new Response('<html>', { status: 200 }));

    await expect(client.rerank('q', ['a'])).rejects.toMatchObject({ code: 'RERANK_BAD_RESPONSE' });
  });

  it('reports cancellation instead of a network failure', async () => {
    const controller = new AbortController();
    const client = clientWith(async () => {
      controller.abort();
      throw new DOMException('aborted', 'AbortError');
    });

    await expect(client.rerank('q', ['a'], { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('parseRerankResponse', () => {
  it('reads index and relevance_score', () => {
    expect(parseRerankResponse({ output: { results: [{ index: 0, relevance_score: 0.5, extra: true }] } })).toEqual([
      { index: 0, score: 0.5 },
    ]);
  });

  it.each([null, 'text', {}, { output: {} }, { output: { results: 'x' } }])('rejects %j', (body) => {
    expect(() => parseRerankResponse(body)).toThrow(RerankError);
  });

  it('rejects an entry without a numeric score', () => {
    expect(() => parseRerankResponse({ output: { results: [{ index: 0, relevance_score: '0.5' }] } })).toThrow(
      'Rerank result 0 is missing index or relevance_score',
    );
  });
});
