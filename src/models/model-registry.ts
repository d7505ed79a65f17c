/**
 * Embedding models served by the DashScope text-embedding endpoint.
 */

import { ConfigError } from '../utils/errors.js';

export interface ModelConfig {
  /** Model name sent to the service. */
  id: string;
  /** Embedding dimensions. */
  dims: number;
  /** Texts accepted per request. */
  maxBatchSize: number;
  /** Input limit per text, in tokens. */
  maxInputTokens: number;
  /** Notes about the model. */
  notes: string;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'text-embedding-v2': {
    id: 'text-embedding-v2',
    dims: 1536,
    maxBatchSize: 25,
    maxInputTokens: 2048,
    notes: 'Default. Multilingual, tuned for Chinese and English retrieval.',
  },
  'text-embedding-v1': {
    id: 'text-embedding-v1',
    dims: 1536,
    maxBatchSize: 25,
    maxInputTokens: 2048,
    notes: 'Previous generation. Stores built with it must keep using it.',
  },
  'text-embedding-v3': {
    id: 'text-embedding-v3',
    dims: 1024,
    maxBatchSize: 10,
    maxInputTokens: 8192,
    notes: 'Longer inputs, smaller vectors, smaller batches.',
  },
};

export function getModel(id: string): ModelConfig {
  const config = MODEL_REGISTRY[id];
  if (!config) {
    throw new ConfigError(
      `Unknown model: ${id}. Available: ${Object.keys(MODEL_REGISTRY).join(', ')}`,
      'INVALID_VALUE',
    );
  }
  return config;
}

export function getAllModelIds(): string[] {
  return Object.keys(MODEL_REGISTRY);
}
