/**
 * Centralized runtime configuration for the retrieval pipeline.
 *
 * The fusion weight, top-K and idle timeout below are starting points;
 * deployments tune them through the config loader.
 */

/**
 * Retry behaviour for retrieval calls.
 */
export interface FailurePolicyConfig {
  /** Retries after the first attempt (0 = no retry) */
  retries: number;
  /** Delay before the first retry, in ms */
  retryIntervalMs: number;
  /** Multiplier applied to the delay after each retry */
  backoffFactor: number;
  /** Error codes that are never retried */
  criticalErrorCodes: string[];
}

export interface TimeoutConfig {
  embeddingMs: number;
  vectorSearchMs: number;
  keywordSearchMs: number;
  rerankMs: number;
  /** End-to-end deadline for one answerContext call */
  deadlineMs: number;
}

export interface RerankConfig {
  enabled: boolean;
  /** Candidates kept per knowledge base after reranking (M) */
  topN: number;
  /** Text-rerank HTTP endpoint */
  endpoint: string;
  model: string;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
}

export interface EmbeddingConfig {
  /** Text-embedding HTTP endpoint */
  endpoint: string;
  /** Model id from the model registry */
  model: string;
  /** Environment variable holding the API key */
  apiKeyEnv: string;
}

export interface ConversationMemoryConfig {
  /** Maximum turns kept per session */
  windowSize: number;
  /** Sessions idle longer than this are evicted */
  idleTimeoutMs: number;
  /** Minimum gap between sweeps of other idle sessions */
  sweepIntervalMs: number;
  /** Maximum live sessions (0 = unlimited) */
  maxSessions: number;
}

/**
 * Complete retrieval configuration.
 */
export interface RetrievalConfig {
  // Fusion
  /** Weight of the vector side in [0,1]; keyword side gets 1 - weight */
  fusionWeight: number;
  /** Cap on the fused list per knowledge base (N) */
  fusionLimit: number;

  // First-pass retrieval
  /** Nearest neighbours requested per knowledge base */
  vectorSearchLimit: number;
  /** Keyword hits requested per knowledge base */
  keywordSearchLimit: number;

  /** Size of the merged answer context */
  topK: number;

  rerank: RerankConfig;
  timeouts: TimeoutConfig;
  failurePolicy: FailurePolicyConfig;
  memory: ConversationMemoryConfig;

  embedding: EmbeddingConfig;

  /** Token budget for assembled prompt context */
  contextMaxTokens: number;

  /** Path to the SQLite knowledge-base store */
  dbPath: string;
  /** Encryption key for the store; absent means plain SQLite */
  dbKey?: string;
}

export const DEFAULT_CRITICAL_ERROR_CODES = ['INDEX_NOT_FOUND', 'CONNECTION_FAILED', 'AUTH_FAILED'];

/**
 * Default configuration values.
 * Timeouts: 3s per index query, 5s per rerank round trip, 10s per answer.
 */
export const DEFAULT_CONFIG: RetrievalConfig = {
  fusionWeight: 0.5,
  fusionLimit: 10,

  vectorSearchLimit: 10,
  keywordSearchLimit: 10,

  topK: 5,

  rerank: {
    enabled: true,
    topN: 5,
    endpoint: 'https://dashscope.aliyuncs.com/api/v1/services/rerank/text-rerank/text-rerank',
    model: 'gte-rerank',
    apiKeyEnv: 'DASHSCOPE_API_KEY',
  },

  timeouts: {
    embeddingMs: 3000,
    vectorSearchMs: 3000,
    keywordSearchMs: 3000,
    rerankMs: 5000,
    deadlineMs: 10_000,
  },

  failurePolicy: {
    retries: 2,
    retryIntervalMs: 250,
    backoffFactor: 2,
    criticalErrorCodes: DEFAULT_CRITICAL_ERROR_CODES,
  },

  memory: {
    windowSize: 10,
    idleTimeoutMs: 30 * 60 * 1000,
    sweepIntervalMs: 60 * 1000,
    maxSessions: 1000,
  },

  embedding: {
    endpoint: 'https://dashscope.aliyuncs.com/api/v1/services/embeddings/text-embedding/text-embedding',
    model: 'text-embedding-v2',
    apiKeyEnv: 'DASHSCOPE_API_KEY',
  },

  contextMaxTokens: 2000,

  // Storage - defaults to ~/.kbrank/
  dbPath: '~/.kbrank/knowledge.db',
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<RetrievalConfig> = {}): RetrievalConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}
