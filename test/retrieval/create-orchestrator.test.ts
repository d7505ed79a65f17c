/**
 * Tests for wiring an orchestrator from config.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import {
  createEmbedderFromConfig,
  createOrchestrator,
  createRerankerFromConfig,
} from '../../src/retrieval/create-orchestrator.js';
import { HttpRerankerClient } from '../../src/models/reranker.js';
import { DEFAULT_CONFIG, type RetrievalConfig } from '../../src/config/retrieval-config.js';
import { setLogLevel, getLogLevel } from '../../src/utils/logger.js';
import { createTestDb, seedKnowledgeBase, teardownTestDb } from '../storage/test-utils.js';
import { FakeEmbeddingClient } from './fakes.js';

const level = getLogLevel();

beforeEach(() => {
  setLogLevel('silent');
});

afterEach(() => {
  setLogLevel(level);
});

describe('createEmbedderFromConfig', () => {
  it('builds a query client for the configured model', () => {
    const embedder = createEmbedderFromConfig(DEFAULT_CONFIG, { DASHSCOPE_API_KEY: 'test-secret' });

    expect(embedder.config.id).toBe('text-embedding-v2');
    expect(embedder.textType).toBe('query');
  });

  it('builds a document client on request', () => {
    expect(createEmbedderFromConfig(DEFAULT_CONFIG, {}, true).textType).toBe('document');
  });

  it('builds a client that refuses to call out without a key', async () => {
    const embedder = createEmbedderFromConfig(DEFAULT_CONFIG, {});

    await expect(embedder.embed('q')).rejects.toMatchObject({ code: 'AUTH_FAILED' });
  });
});

describe('createRerankerFromConfig', () => {
  it('returns an HTTP client when the key is set', () => {
    const reranker = createRerankerFromConfig(DEFAULT_CONFIG, { DASHSCOPE_API_KEY: 'test-secret' });

    expect(reranker).toBeInstanceOf(HttpRerankerClient);
  });

  it('returns undefined without a key', () => {
    expect(createRerankerFromConfig(DEFAULT_CONFIG, {})).toBeUndefined();
  });

  it('returns undefined when reranking is disabled', () => {
    const config: RetrievalConfig = { ...DEFAULT_CONFIG, rerank: { ...DEFAULT_CONFIG.rerank, enabled: false } };

    expect(createRerankerFromConfig(config, { DASHSCOPE_API_KEY: 'test-secret' })).toBeUndefined();
  });

  it('reads the key from the configured variable', () => {
    const config: RetrievalConfig = { ...DEFAULT_CONFIG, rerank: { ...DEFAULT_CONFIG.rerank, apiKeyEnv: 'MY_KEY' } };

    expect(createRerankerFromConfig(config, { MY_KEY: 'test-secret' })).toBeInstanceOf(HttpRerankerClient);
  });
});

describe('createOrchestrator', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('answers from the SQLite store', async () => {
    seedKnowledgeBase(db, 'legal', [
      { id: 'd1', content: 'The notice period is thirty days.', embedding: [1, 0, 0] },
      { id: 'd2', content: 'Overtime pay rules.', embedding: [0, 1, 0] },
    ]);
    const orchestrator = createOrchestrator(DEFAULT_CONFIG, {
      db,
      embedder: new FakeEmbeddingClient({ vector: [1, 0, 0] }),
      env: {},
    });

    const response = await orchestrator.answerContext({
      sessionId: 's1',
      query: 'notice period',
      kbIds: ['legal'],
    });

    expect(response.context.candidates.map((c) => c.document.id)).toEqual(['d1', 'd2']);
    expect(response.context.knowledgeBases).toHaveLength(1);
    expect(response.context.knowledgeBases[0]).toMatchObject({
      kbId: 'legal',
      status: 'ok',
      candidateCount: 2,
      origin: 'fused',
      rerankFallback: false,
      partial: false,
    });
  });

  it('falls back to keyword retrieval without an embedding key', async () => {
    seedKnowledgeBase(db, 'legal', [
      { id: 'd1', content: 'The notice period is thirty days.' },
      { id: 'd2', content: 'Overtime pay rules.' },
    ]);
    const orchestrator = createOrchestrator(DEFAULT_CONFIG, { db, env: {} });

    const response = await orchestrator.answerContext({
      sessionId: 's1',
      query: 'notice period',
      kbIds: ['legal'],
    });

    expect(response.context.candidates.map((c) => c.document.id)).toEqual(['d1']);
    expect(response.context.knowledgeBases[0]).toMatchObject({ kbId: 'legal', partial: true });
    expect(response.context.degradations.map((e) => `${e.kind}:${e.reason}`)).toEqual([
      'retrieval-partial:AUTH_FAILED',
    ]);
  });
});
