/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (KBRANK_*)
 * 3. Project config file (./kbrank.config.json)
 * 4. User config file (~/.kbrank/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, type RetrievalConfig } from './retrieval-config.js';
import { getAllModelIds } from '../models/model-registry.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  fusion?: {
    /** Vector-side weight in [0,1] */
    weight?: number;
    /** Fused candidates kept per knowledge base */
    limit?: number;
  };
  retrieval?: {
    vectorLimit?: number;
    keywordLimit?: number;
    topK?: number;
  };
  rerank?: {
    enabled?: boolean;
    topN?: number;
    endpoint?: string;
    model?: string;
    apiKeyEnv?: string;
  };
  timeouts?: {
    embeddingMs?: number;
    vectorSearchMs?: number;
    keywordSearchMs?: number;
    rerankMs?: number;
    deadlineMs?: number;
  };
  retry?: {
    retries?: number;
    intervalMs?: number;
    backoffFactor?: number;
    criticalErrors?: string[];
  };
  memory?: {
    windowSize?: number;
    idleTimeoutMinutes?: number;
    maxSessions?: number;
  };
  embedding?: {
    endpoint?: string;
    /** Model id from the model registry */
    model?: string;
    apiKeyEnv?: string;
  };
  context?: {
    maxTokens?: number;
  };
  storage?: {
    dbPath?: string;
    /** Encryption key; usually supplied as KBRANK_DB_KEY */
    key?: string;
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  fusion: {
    weight: DEFAULT_CONFIG.fusionWeight,
    limit: DEFAULT_CONFIG.fusionLimit,
  },
  retrieval: {
    vectorLimit: DEFAULT_CONFIG.vectorSearchLimit,
    keywordLimit: DEFAULT_CONFIG.keywordSearchLimit,
    topK: DEFAULT_CONFIG.topK,
  },
  rerank: { ...DEFAULT_CONFIG.rerank },
  timeouts: { ...DEFAULT_CONFIG.timeouts },
  retry: {
    retries: DEFAULT_CONFIG.failurePolicy.retries,
    intervalMs: DEFAULT_CONFIG.failurePolicy.retryIntervalMs,
    backoffFactor: DEFAULT_CONFIG.failurePolicy.backoffFactor,
    criticalErrors: [...DEFAULT_CONFIG.failurePolicy.criticalErrorCodes],
  },
  memory: {
    windowSize: DEFAULT_CONFIG.memory.windowSize,
    idleTimeoutMinutes: DEFAULT_CONFIG.memory.idleTimeoutMs / 60_000,
    maxSessions: DEFAULT_CONFIG.memory.maxSessions,
  },
  embedding: { ...DEFAULT_CONFIG.embedding },
  context: {
    maxTokens: DEFAULT_CONFIG.contextMaxTokens,
  },
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
  },
};

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      log.warn(`Ignoring config file ${path}: not a JSON object`);
      return null;
    }
    return parsed as ExternalConfig;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envFloat(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  return raw ? parseFloat(raw) : undefined;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  return raw ? raw === 'true' : undefined;
}

/**
 * Drop keys whose value is undefined so they don't shadow lower-priority sources.
 */
function defined<T extends object>(section: T): T | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return undefined;
  return Object.fromEntries(entries) as T;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with KBRANK_ and use underscores for nesting.
 * Examples:
 *   KBRANK_FUSION_WEIGHT=0.7
 *   KBRANK_RETRIEVAL_TOP_K=8
 *   KBRANK_STORAGE_DB_PATH=~/.kbrank/knowledge.db
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ExternalConfig {
  const config: ExternalConfig = {
    fusion: defined({
      weight: envFloat(env, 'KBRANK_FUSION_WEIGHT'),
      limit: envInt(env, 'KBRANK_FUSION_LIMIT'),
    }),
    retrieval: defined({
      vectorLimit: envInt(env, 'KBRANK_RETRIEVAL_VECTOR_LIMIT'),
      keywordLimit: envInt(env, 'KBRANK_RETRIEVAL_KEYWORD_LIMIT'),
      topK: envInt(env, 'KBRANK_RETRIEVAL_TOP_K'),
    }),
    rerank: defined({
      enabled: envBool(env, 'KBRANK_RERANK_ENABLED'),
      topN: envInt(env, 'KBRANK_RERANK_TOP_N'),
      endpoint: env.KBRANK_RERANK_ENDPOINT || undefined,
      model: env.KBRANK_RERANK_MODEL || undefined,
    }),
    timeouts: defined({
      rerankMs: envInt(env, 'KBRANK_TIMEOUTS_RERANK_MS'),
      deadlineMs: envInt(env, 'KBRANK_TIMEOUTS_DEADLINE_MS'),
    }),
    retry: defined({
      retries: envInt(env, 'KBRANK_RETRY_RETRIES'),
      intervalMs: envInt(env, 'KBRANK_RETRY_INTERVAL_MS'),
    }),
    memory: defined({
      windowSize: envInt(env, 'KBRANK_MEMORY_WINDOW_SIZE'),
      idleTimeoutMinutes: envFloat(env, 'KBRANK_MEMORY_IDLE_TIMEOUT_MINUTES'),
    }),
    embedding: defined({
      endpoint: env.KBRANK_EMBEDDING_ENDPOINT || undefined,
      model: env.KBRANK_EMBEDDING_MODEL || undefined,
    }),
    storage: defined({
      dbPath: env.KBRANK_STORAGE_DB_PATH || undefined,
      key: env.KBRANK_DB_KEY || undefined,
    }),
  };

  return defined(config) ?? {};
}

/**
 * Deep merge two config objects, with source overriding target one section
 * deep. Arrays are replaced, not concatenated.
 */
function deepMerge<T extends ExternalConfig>(target: T, source: ExternalConfig): T {
  const result: ExternalConfig = { ...target };
  const keys = Object.keys(source) as (keyof ExternalConfig)[];

  for (const key of keys) {
    const sourceValue = source[key];
    if (sourceValue === undefined) {
      continue;
    }
    // Each section is a flat object, so a spread merge is a full merge.
    Object.assign(result, { [key]: { ...target[key], ...sourceValue } });
  }

  return result as T;
}

function checkRange(
  errors: string[],
  path: string,
  value: number | undefined,
  min: number,
  max: number = Number.POSITIVE_INFINITY,
): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < min || value > max) {
    const bound = max === Number.POSITIVE_INFINITY ? `at least ${min}` : `between ${min} and ${max} (inclusive)`;
    errors.push(`${path} must be ${bound}`);
  }
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  checkRange(errors, 'fusion.weight', config.fusion?.weight, 0, 1);
  checkRange(errors, 'fusion.limit', config.fusion?.limit, 1);

  checkRange(errors, 'retrieval.vectorLimit', config.retrieval?.vectorLimit, 1);
  checkRange(errors, 'retrieval.keywordLimit', config.retrieval?.keywordLimit, 1);
  checkRange(errors, 'retrieval.topK', config.retrieval?.topK, 1);

  checkRange(errors, 'rerank.topN', config.rerank?.topN, 1);
  if (config.rerank?.endpoint !== undefined && !/^https?:\/\//.test(config.rerank.endpoint)) {
    errors.push('rerank.endpoint must be an http(s) URL');
  }

  if (config.embedding?.endpoint !== undefined && !/^https?:\/\//.test(config.embedding.endpoint)) {
    errors.push('embedding.endpoint must be an http(s) URL');
  }
  if (config.embedding?.model !== undefined && !getAllModelIds().includes(config.embedding.model)) {
    errors.push(`embedding.model must be one of: ${getAllModelIds().join(', ')}`);
  }

  checkRange(errors, 'timeouts.embeddingMs', config.timeouts?.embeddingMs, 1);
  checkRange(errors, 'timeouts.vectorSearchMs', config.timeouts?.vectorSearchMs, 1);
  checkRange(errors, 'timeouts.keywordSearchMs', config.timeouts?.keywordSearchMs, 1);
  checkRange(errors, 'timeouts.rerankMs', config.timeouts?.rerankMs, 1);
  checkRange(errors, 'timeouts.deadlineMs', config.timeouts?.deadlineMs, 1);

  checkRange(errors, 'retry.retries', config.retry?.retries, 0, 10);
  checkRange(errors, 'retry.intervalMs', config.retry?.intervalMs, 0);
  checkRange(errors, 'retry.backoffFactor', config.retry?.backoffFactor, 1);

  checkRange(errors, 'memory.windowSize', config.memory?.windowSize, 1);
  checkRange(errors, 'memory.idleTimeoutMinutes', config.memory?.idleTimeoutMinutes, 0.001);
  checkRange(errors, 'memory.maxSessions', config.memory?.maxSessions, 0);

  checkRange(errors, 'context.maxTokens', config.context?.maxTokens, 100);

  // The merged list is built from reranked per-KB lists; reranking more than
  // the fused cap would ask for candidates that do not exist.
  const fusionLimit = config.fusion?.limit;
  const topN = config.rerank?.topN;
  if (fusionLimit !== undefined && topN !== undefined && topN > fusionLimit) {
    errors.push('rerank.topN must not exceed fusion.limit');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config: Required<ExternalConfig> = { ...EXTERNAL_DEFAULTS };

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.kbrank/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'kbrank.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert the loaded external config into the runtime RetrievalConfig.
 *
 * @throws ConfigError when validation fails
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): RetrievalConfig {
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const d = DEFAULT_CONFIG;
  const idleMinutes = external.memory.idleTimeoutMinutes;

  return {
    fusionWeight: external.fusion.weight ?? d.fusionWeight,
    fusionLimit: external.fusion.limit ?? d.fusionLimit,

    vectorSearchLimit: external.retrieval.vectorLimit ?? d.vectorSearchLimit,
    keywordSearchLimit: external.retrieval.keywordLimit ?? d.keywordSearchLimit,
    topK: external.retrieval.topK ?? d.topK,

    rerank: {
      enabled: external.rerank.enabled ?? d.rerank.enabled,
      topN: external.rerank.topN ?? d.rerank.topN,
      endpoint: external.rerank.endpoint ?? d.rerank.endpoint,
      model: external.rerank.model ?? d.rerank.model,
      apiKeyEnv: external.rerank.apiKeyEnv ?? d.rerank.apiKeyEnv,
    },

    timeouts: {
      embeddingMs: external.timeouts.embeddingMs ?? d.timeouts.embeddingMs,
      vectorSearchMs: external.timeouts.vectorSearchMs ?? d.timeouts.vectorSearchMs,
      keywordSearchMs: external.timeouts.keywordSearchMs ?? d.timeouts.keywordSearchMs,
      rerankMs: external.timeouts.rerankMs ?? d.timeouts.rerankMs,
      deadlineMs: external.timeouts.deadlineMs ?? d.timeouts.deadlineMs,
    },

    failurePolicy: {
      retries: external.retry.retries ?? d.failurePolicy.retries,
      retryIntervalMs: external.retry.intervalMs ?? d.failurePolicy.retryIntervalMs,
      backoffFactor: external.retry.backoffFactor ?? d.failurePolicy.backoffFactor,
      criticalErrorCodes: external.retry.criticalErrors ?? d.failurePolicy.criticalErrorCodes,
    },

    memory: {
      windowSize: external.memory.windowSize ?? d.memory.windowSize,
      idleTimeoutMs: idleMinutes !== undefined ? Math.round(idleMinutes * 60_000) : d.memory.idleTimeoutMs,
      sweepIntervalMs: d.memory.sweepIntervalMs,
      maxSessions: external.memory.maxSessions ?? d.memory.maxSessions,
    },

    embedding: {
      endpoint: external.embedding.endpoint ?? d.embedding.endpoint,
      model: external.embedding.model ?? d.embedding.model,
      apiKeyEnv: external.embedding.apiKeyEnv ?? d.embedding.apiKeyEnv,
    },
    contextMaxTokens: external.context.maxTokens ?? d.contextMaxTokens,
    dbPath: resolvePath(external.storage.dbPath ?? d.dbPath),
    dbKey: external.storage.key || undefined,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
