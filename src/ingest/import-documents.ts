/**
 * Bulk import of documents into a knowledge base.
 *
 * Reads a JSON array or JSON Lines file of `{ id, content, metadata? }`
 * records, embeds each passage as a document and writes them in batches,
 * one transaction per batch.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { DocumentStore } from '../storage/document-store.js';
import type { DocumentMetadata, NewDocument } from '../storage/types.js';
import type { EmbeddingClient } from '../models/embedder.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('import-documents');

export type DocumentFileFormat = 'json' | 'jsonl';

/**
 * Progress information passed to callback.
 */
export interface ImportProgress {
  /** Documents written so far */
  done: number;
  total: number;
}

export interface ImportOptions {
  /** Embeds passages; absent means keyword-only documents. */
  embedder?: EmbeddingClient;
  /** Documents per write transaction. Default: 32 */
  batchSize?: number;
  /** Display name when the knowledge base is created. */
  name?: string;
  /** Called after each batch is written. */
  progressCallback?: (progress: ImportProgress) => void;
}

export interface ImportResult {
  kbId: string;
  /** True when the import registered the knowledge base */
  created: boolean;
  documentCount: number;
  embeddedCount: number;
  durationMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMetadata(value: unknown, where: string): DocumentMetadata {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new StorageError(`${where}: metadata must be an object`, 'DOCUMENT_INVALID');
  }
  const metadata: DocumentMetadata = {};
  for (const [key, field] of Object.entries(value)) {
    if (typeof field === 'string') {
      metadata[key] = field;
    } else if (typeof field === 'number' || typeof field === 'boolean') {
      metadata[key] = String(field);
    }
  }
  return metadata;
}

function toDocument(value: unknown, where: string): NewDocument {
  if (!isRecord(value)) {
    throw new StorageError(`${where}: expected an object`, 'DOCUMENT_INVALID');
  }
  const { id, content } = value;
  if (typeof id !== 'string' && typeof id !== 'number') {
    throw new StorageError(`${where}: id must be a string`, 'DOCUMENT_INVALID');
  }
  if (typeof content !== 'string') {
    throw new StorageError(`${where}: content must be a string`, 'DOCUMENT_INVALID');
  }
  return { id: String(id), content, metadata: toMetadata(value.metadata, where) };
}

/**
 * Parse document records from file text.
 *
 * @throws StorageError `DOCUMENT_INVALID` naming the first bad record
 */
export function parseDocuments(text: string, format: DocumentFileFormat): NewDocument[] {
  if (format === 'jsonl') {
    const documents: NewDocument[] = [];
    text.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      const where = `line ${index + 1}`;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new StorageError(`${where}: not valid JSON`, 'DOCUMENT_INVALID', error);
      }
      documents.push(toDocument(parsed, where));
    });
    return documents;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StorageError('Document file is not valid JSON', 'DOCUMENT_INVALID', error);
  }
  if (!Array.isArray(parsed)) {
    throw new StorageError('Document file must hold a JSON array', 'DOCUMENT_INVALID');
  }
  return parsed.map((item: unknown, index) => toDocument(item, `record ${index + 1}`));
}

/**
 * Format implied by a file name: `.jsonl` or `.ndjson` is JSON Lines,
 * anything else a JSON array.
 */
export function formatForPath(path: string): DocumentFileFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.jsonl' || ext === '.ndjson' ? 'jsonl' : 'json';
}

/**
 * Read and parse a document file.
 */
export async function readDocumentFile(path: string): Promise<NewDocument[]> {
  return parseDocuments(await readFile(path, 'utf-8'), formatForPath(path));
}

/**
 * Attach embeddings, in one request per batch when the client supports it.
 */
async function embedDocuments(embedder: EmbeddingClient, docs: readonly NewDocument[]): Promise<NewDocument[]> {
  if (embedder.embedBatch) {
    const embeddings = await embedder.embedBatch(docs.map((doc) => doc.content));
    if (embeddings.length !== docs.length) {
      throw new StorageError(`Embedder returned ${embeddings.length} vectors for ${docs.length} documents`, 'DOCUMENT_INVALID');
    }
    return docs.map((doc, i) => ({ ...doc, embedding: embeddings[i] }));
  }

  const embedded: NewDocument[] = [];
  for (const doc of docs) {
    embedded.push({ ...doc, embedding: await embedder.embed(doc.content) });
  }
  return embedded;
}

/**
 * Index documents into `kbId`, registering the knowledge base if needed.
 * Batches written before a failure stay written.
 */
export async function importDocuments(
  store: DocumentStore,
  kbId: string,
  documents: readonly NewDocument[],
  options: ImportOptions = {},
): Promise<ImportResult> {
  const { embedder, batchSize = 32, name, progressCallback } = options;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new StorageError(`batchSize must be a positive integer, got ${batchSize}`, 'INVALID_VALUE');
  }

  const startTime = performance.now();
  const created = store.getKnowledgeBase(kbId) === null;
  if (created) {
    store.createKnowledgeBase({ id: kbId, name });
  }

  let done = 0;
  let embeddedCount = 0;
  for (let start = 0; start < documents.length; start += batchSize) {
    const slice = documents.slice(start, start + batchSize);
    const batch = embedder ? await embedDocuments(embedder, slice) : slice;
    if (embedder) embeddedCount += batch.length;
    done += store.addDocuments(kbId, batch);
    progressCallback?.({ done, total: documents.length });
  }

  const durationMs = performance.now() - startTime;
  log.info(`Imported ${done} documents into ${kbId}`, { embedded: embeddedCount, durationMs: Math.round(durationMs) });
  return { kbId, created, documentCount: done, embeddedCount, durationMs };
}
