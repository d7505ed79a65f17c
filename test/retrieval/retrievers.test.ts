/**
 * Tests for the vector and keyword retrievers and hit hydration.
 */

import { describe, it, expect } from 'vitest';
import { VectorRetriever } from '../../src/retrieval/vector-retriever.js';
import { KeywordRetriever } from '../../src/retrieval/keyword-retriever.js';
import { hydrateHits } from '../../src/retrieval/hydrate.js';
import { CancelledError, RetrievalError } from '../../src/utils/errors.js';
import { FakeDocumentLookup, FakeEmbeddingClient, FakeKeywordIndex, FakeVectorIndex } from './fakes.js';

describe('hydrateHits', () => {
  it('keeps the best score per id and orders by score then id', async () => {
    const candidates = await hydrateHits(
      'legal',
      [
        { id: 'b', score: 0.5 },
        { id: 'a', score: 0.5 },
        { id: 'c', score: 0.9 },
        { id: 'b', score: 0.7 },
      ],
      'vector',
      new FakeDocumentLookup(),
    );

    expect(candidates.map((c) => [c.document.id, c.score])).toEqual([
      ['c', 0.9],
      ['b', 0.7],
      ['a', 0.5],
    ]);
    expect(candidates[0]).toMatchObject({ origin: 'vector', sources: ['vector'] });
    expect(candidates[0].document.kbId).toBe('legal');
  });

  it('drops hits whose document no longer exists', async () => {
    const candidates = await hydrateHits(
      'legal',
      [
        { id: 'kept', score: 2 },
        { id: 'gone', score: 3 },
      ],
      'keyword',
      new FakeDocumentLookup(new Set(['gone'])),
    );

    expect(candidates.map((c) => c.document.id)).toEqual(['kept']);
  });

  it('returns empty for no hits', async () => {
    expect(await hydrateHits('legal', [], 'keyword', new FakeDocumentLookup())).toEqual([]);
  });
});

describe('VectorRetriever', () => {
  it('embeds the query and returns scored candidates', async () => {
    const index = new FakeVectorIndex({
      legal: [
        { id: 'd1', score: 0.9 },
        { id: 'd2', score: 0.4 },
      ],
    });
    const retriever = new VectorRetriever(new FakeEmbeddingClient({ vector: [0.1, 0.2] }), index, new FakeDocumentLookup());

    const result = await retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5 });

    expect(result.kbId).toBe('legal');
    expect(result.origin).toBe('vector');
    expect(result.candidates.map((c) => [c.document.id, c.score])).toEqual([
      ['d1', 0.9],
      ['d2', 0.4],
    ]);
    expect(index.calls).toEqual([{ kbId: 'legal', embedding: [0.1, 0.2], limit: 5 }]);
  });

  it('uses a precomputed embedding', async () => {
    const embedder = new FakeEmbeddingClient();
    const index = new FakeVectorIndex({ legal: [] });
    const retriever = new VectorRetriever(embedder, index, new FakeDocumentLookup());

    await retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5, embedding: [0, 0, 1] });

    expect(embedder.calls).toBe(0);
    expect(index.calls[0].embedding).toEqual([0, 0, 1]);
  });

  it('wraps embedding failures', async () => {
    const retriever = new VectorRetriever(
      new FakeEmbeddingClient({ failures: [new Error('model crashed')] }),
      new FakeVectorIndex(),
      new FakeDocumentLookup(),
    );

    await expect(retriever.embedQuery('q')).rejects.toMatchObject({ code: 'EMBEDDING_FAILED' });
  });

  it('rejects an empty or non-finite embedding', async () => {
    const empty = new VectorRetriever(new FakeEmbeddingClient({ vector: [] }), new FakeVectorIndex(), new FakeDocumentLookup());
    const nan = new VectorRetriever(
      new FakeEmbeddingClient({ vector: [Number.NaN] }),
      new FakeVectorIndex(),
      new FakeDocumentLookup(),
    );

    await expect(empty.embedQuery('q')).rejects.toMatchObject({ code: 'EMBEDDING_FAILED' });
    await expect(nan.embedQuery('q')).rejects.toMatchObject({ code: 'EMBEDDING_FAILED' });
  });

  it('wraps index failures with the knowledge base id', async () => {
    const retriever = new VectorRetriever(
      new FakeEmbeddingClient(),
      new FakeVectorIndex({ legal: new Error('disk error') }),
      new FakeDocumentLookup(),
    );

    await expect(retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5 })).rejects.toMatchObject({
      code: 'VECTOR_SEARCH_FAILED',
      kbId: 'legal',
    });
  });

  it('passes retrieval errors through unchanged', async () => {
    const missing = new RetrievalError('no index', 'INDEX_NOT_FOUND', undefined, 'legal');
    const retriever = new VectorRetriever(
      new FakeEmbeddingClient(),
      new FakeVectorIndex({ legal: missing }),
      new FakeDocumentLookup(),
    );

    await expect(retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5 })).rejects.toBe(missing);
  });

  it('stops on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const retriever = new VectorRetriever(new FakeEmbeddingClient(), new FakeVectorIndex(), new FakeDocumentLookup());

    await expect(
      retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('KeywordRetriever', () => {
  it('returns scored candidates', async () => {
    const index = new FakeKeywordIndex({
      legal: [
        { id: 'd2', score: 12 },
        { id: 'd3', score: 8 },
      ],
    });
    const retriever = new KeywordRetriever(index, new FakeDocumentLookup());

    const result = await retriever.retrieve({ kbId: 'legal', query: 'notice period', limit: 1 });

    expect(result.origin).toBe('keyword');
    expect(result.candidates.map((c) => [c.document.id, c.score, c.origin])).toEqual([['d2', 12, 'keyword']]);
    expect(index.calls).toEqual([{ kbId: 'legal', query: 'notice period', limit: 1 }]);
  });

  it('wraps index failures', async () => {
    const retriever = new KeywordRetriever(
      new FakeKeywordIndex({ legal: new Error('fts corrupt') }),
      new FakeDocumentLookup(),
    );

    const error = await retriever.retrieve({ kbId: 'legal', query: 'q', limit: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({ code: 'KEYWORD_SEARCH_FAILED', kbId: 'legal' });
  });
});
