/**
 * kbrank
 *
 * Hybrid vector and keyword retrieval across knowledge bases, with score
 * fusion, cross-encoder reranking and conversational context.
 *
 * @packageDocumentation
 */

// Configuration
export { DEFAULT_CONFIG, DEFAULT_CRITICAL_ERROR_CODES, getConfig, resolvePath } from './config/retrieval-config.js';
export type {
  RetrievalConfig,
  FailurePolicyConfig,
  TimeoutConfig,
  RerankConfig,
  ConversationMemoryConfig,
} from './config/retrieval-config.js';
export { loadConfig, loadEnvConfig, validateExternalConfig, toRuntimeConfig, EXTERNAL_DEFAULTS } from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions } from './config/loader.js';

// Storage
export * from './storage/index.js';

// Bulk import
export { importDocuments, parseDocuments, readDocumentFile, formatForPath } from './ingest/import-documents.js';
export type { DocumentFileFormat, ImportOptions, ImportProgress, ImportResult } from './ingest/import-documents.js';

// Models
export { HttpEmbeddingClient, parseEmbeddingResponse } from './models/embedder.js';
export type { EmbeddingClient, HttpEmbeddingClientOptions, TextType } from './models/embedder.js';
export { HttpRerankerClient, parseRerankResponse } from './models/reranker.js';
export type { RerankerClient, RerankScore, RerankOptions, HttpRerankerClientOptions, FetchLike } from './models/reranker.js';
export { MODEL_REGISTRY, getModel, getAllModelIds } from './models/model-registry.js';
export type { ModelConfig } from './models/model-registry.js';

// Retrieval
export * from './retrieval/index.js';

// Conversation memory
export { ConversationMemory } from './memory/conversation-memory.js';
export type {
  ConversationTurn,
  ConversationSession,
  ConversationMemoryOptions,
  NewTurn,
  TurnRole,
} from './memory/conversation-memory.js';

// Errors
export * from './utils/errors.js';

// Logging
export { logger, createLogger, setLogLevel, getLogLevel, setJsonMode } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
