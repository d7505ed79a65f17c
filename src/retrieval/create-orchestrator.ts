/**
 * Wire an orchestrator to the SQLite store, the HTTP embedding service and
 * the HTTP reranker, as configured.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { RetrievalOrchestrator } from './orchestrator.js';
import type { EmbeddingClient, RerankerClient } from './types.js';
import { PipelineEvents } from './pipeline-events.js';
import { DocumentStore } from '../storage/document-store.js';
import { KeywordStore } from '../storage/keyword-store.js';
import { VectorStore } from '../storage/vector-store.js';
import { getDb } from '../storage/db.js';
import { HttpEmbeddingClient } from '../models/embedder.js';
import { HttpRerankerClient } from '../models/reranker.js';
import type { RetrievalConfig } from '../config/retrieval-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('create-orchestrator');

export interface CreateOrchestratorOptions {
  /** Database to use instead of the configured path */
  db?: Database.Database;
  /** Replace the HTTP embedding client */
  embedder?: EmbeddingClient;
  /** Replace the HTTP reranker */
  reranker?: RerankerClient;
  events?: PipelineEvents;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the query-side embedding client from config. Without an API key the
 * client fails every call with `AUTH_FAILED`, so retrieval runs on keywords
 * alone; the missing key is logged once here.
 */
export function createEmbedderFromConfig(
  config: RetrievalConfig,
  env: NodeJS.ProcessEnv = process.env,
  asDocument: boolean = false,
): HttpEmbeddingClient {
  const apiKey = env[config.embedding.apiKeyEnv] || undefined;
  if (!apiKey) {
    log.warn(`Vector retrieval unavailable: ${config.embedding.apiKeyEnv} is not set`);
  }
  return new HttpEmbeddingClient({
    endpoint: config.embedding.endpoint,
    modelId: config.embedding.model,
    apiKey,
    asDocument,
  });
}

/**
 * Build the reranker client from config. Returns undefined, with a warning,
 * when reranking is enabled but no API key is set.
 */
export function createRerankerFromConfig(
  config: RetrievalConfig,
  env: NodeJS.ProcessEnv = process.env,
): RerankerClient | undefined {
  if (!config.rerank.enabled) return undefined;

  const apiKey = env[config.rerank.apiKeyEnv];
  if (!apiKey) {
    log.warn(`Reranking disabled: ${config.rerank.apiKeyEnv} is not set`);
    return undefined;
  }
  return new HttpRerankerClient({
    endpoint: config.rerank.endpoint,
    model: config.rerank.model,
    apiKey,
  });
}

export function createOrchestrator(
  config: RetrievalConfig,
  options: CreateOrchestratorOptions = {},
): RetrievalOrchestrator {
  const db = options.db ?? getDb(config.dbPath, config.dbKey);

  return new RetrievalOrchestrator({
    config,
    embedder: options.embedder ?? createEmbedderFromConfig(config, options.env),
    vectorIndex: new VectorStore(db),
    keywordIndex: new KeywordStore(db),
    documents: new DocumentStore(db),
    reranker: options.reranker ?? createRerankerFromConfig(config, options.env),
    events: options.events,
  });
}
