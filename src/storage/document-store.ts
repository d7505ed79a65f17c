/**
 * Documents and knowledge-base registry.
 *
 * Writes keep three structures in step inside one transaction: the document
 * row, its FTS5 entry (via triggers on `search_text`), and its vector. Every
 * write bumps the knowledge base's `revision` so the in-memory vector index
 * can tell when to reload.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import type {
  DocumentMetadata,
  KbDocument,
  KnowledgeBaseHealth,
  KnowledgeBaseInfo,
  NewDocument,
} from './types.js';
import { StorageError } from '../utils/errors.js';
import { deserializeEmbedding, isFiniteVector, serializeEmbedding } from '../utils/embedding-utils.js';
import { segmentCjk } from '../utils/text-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('document-store');

/** Knowledge-base ids are used in logs and CLI flags; keep them simple. */
const KB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

interface DocumentRow {
  kb_id: string;
  id: string;
  content: string;
  source_type: string | null;
  source_name: string | null;
  created_at: string | null;
  metadata: string | null;
}

interface KnowledgeBaseRow {
  id: string;
  name: string;
  description: string | null;
  embedding_dims: number | null;
  revision: number;
  created_at: string;
}

function rowToKnowledgeBase(row: KnowledgeBaseRow): KnowledgeBaseInfo {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    embeddingDims: row.embedding_dims,
    revision: row.revision,
    createdAt: row.created_at,
  };
}

function parseExtraMetadata(raw: string | null): DocumentMetadata {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return {};
    const extra: DocumentMetadata = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') extra[key] = value;
    }
    return extra;
  } catch {
    log.warn('Ignoring unparseable document metadata');
    return {};
  }
}

function rowToDocument(row: DocumentRow): KbDocument {
  const metadata: DocumentMetadata = parseExtraMetadata(row.metadata);
  if (row.source_type !== null) metadata.sourceType = row.source_type;
  if (row.source_name !== null) metadata.sourceName = row.source_name;
  if (row.created_at !== null) metadata.createdAt = row.created_at;
  return Object.freeze({
    id: row.id,
    kbId: row.kb_id,
    content: row.content,
    metadata: Object.freeze(metadata),
  });
}

function splitMetadata(metadata: DocumentMetadata = {}): {
  sourceType: string | null;
  sourceName: string | null;
  createdAt: string | null;
  extra: string | null;
} {
  const { sourceType, sourceName, createdAt, ...rest } = metadata;
  const extraEntries = Object.entries(rest).filter(([, v]) => v !== undefined);
  return {
    sourceType: sourceType ?? null,
    sourceName: sourceName ?? null,
    createdAt: createdAt ?? null,
    extra: extraEntries.length > 0 ? JSON.stringify(Object.fromEntries(extraEntries)) : null,
  };
}

export interface CreateKnowledgeBaseOptions {
  id: string;
  name?: string;
  description?: string;
}

export class DocumentStore {
  constructor(private db?: Database.Database) {}

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Register a knowledge base.
   *
   * @throws StorageError `KB_EXISTS` if the id is taken, `INVALID_VALUE` for a malformed id
   */
  createKnowledgeBase(options: CreateKnowledgeBaseOptions): KnowledgeBaseInfo {
    if (!KB_ID_PATTERN.test(options.id)) {
      throw new StorageError(`Invalid knowledge base id "${options.id}"`, 'INVALID_VALUE');
    }
    if (this.getKnowledgeBase(options.id)) {
      throw new StorageError(`Knowledge base "${options.id}" already exists`, 'KB_EXISTS');
    }

    this.getDatabase()
      .prepare('INSERT INTO knowledge_bases (id, name, description) VALUES (?, ?, ?)')
      .run(options.id, options.name ?? options.id, options.description ?? null);

    log.info('Created knowledge base', { kbId: options.id });
    const created = this.getKnowledgeBase(options.id);
    if (!created) {
      throw new StorageError(`Knowledge base "${options.id}" vanished after insert`, 'DB_QUERY_FAILED');
    }
    return created;
  }

  getKnowledgeBase(kbId: string): KnowledgeBaseInfo | null {
    const row = this.getDatabase()
      .prepare('SELECT * FROM knowledge_bases WHERE id = ?')
      .get(kbId) as KnowledgeBaseRow | undefined;
    return row ? rowToKnowledgeBase(row) : null;
  }

  listKnowledgeBases(): KnowledgeBaseInfo[] {
    const rows = this.getDatabase()
      .prepare('SELECT * FROM knowledge_bases ORDER BY id')
      .all() as KnowledgeBaseRow[];
    return rows.map(rowToKnowledgeBase);
  }

  /**
   * Delete a knowledge base with its documents and vectors.
   * Returns false if it did not exist.
   */
  deleteKnowledgeBase(kbId: string): boolean {
    const db = this.getDatabase();
    const remove = db.transaction(() => {
      // Explicit deletes so FTS triggers fire for every row
      db.prepare('DELETE FROM document_vectors WHERE kb_id = ?').run(kbId);
      db.prepare('DELETE FROM documents WHERE kb_id = ?').run(kbId);
      return db.prepare('DELETE FROM knowledge_bases WHERE id = ?').run(kbId).changes > 0;
    });
    const removed = remove();
    if (removed) log.info('Deleted knowledge base', { kbId });
    return removed;
  }

  /**
   * Add or replace documents in a knowledge base.
   *
   * Replacing a document without an embedding drops its old vector, since
   * the vector no longer describes the content.
   *
   * @returns number of documents written
   * @throws StorageError `KB_NOT_FOUND`, or `DOCUMENT_INVALID` for empty ids or
   *   content, non-finite embeddings, or embeddings whose dimensions differ
   *   from the knowledge base's
   */
  addDocuments(kbId: string, documents: NewDocument[]): number {
    const db = this.getDatabase();
    const kb = this.getKnowledgeBase(kbId);
    if (!kb) {
      throw new StorageError(`Knowledge base "${kbId}" does not exist`, 'KB_NOT_FOUND');
    }

    let dims = kb.embeddingDims;
    for (const doc of documents) {
      if (!doc.id.trim() || !doc.content.trim()) {
        throw new StorageError(`Document "${doc.id}" has an empty id or content`, 'DOCUMENT_INVALID');
      }
      if (doc.embedding) {
        if (!isFiniteVector(doc.embedding)) {
          throw new StorageError(`Document "${doc.id}" has a non-finite embedding`, 'DOCUMENT_INVALID');
        }
        dims ??= doc.embedding.length;
        if (doc.embedding.length !== dims) {
          throw new StorageError(
            `Document "${doc.id}" embedding has ${doc.embedding.length} dims, expected ${dims}`,
            'DOCUMENT_INVALID',
          );
        }
      }
    }

    const upsertDocument = db.prepare(`
      INSERT INTO documents (kb_id, id, content, search_text, source_type, source_name, created_at, metadata)
      VALUES (@kbId, @id, @content, @searchText, @sourceType, @sourceName, @createdAt, @extra)
      ON CONFLICT (kb_id, id) DO UPDATE SET
        content = excluded.content,
        search_text = excluded.search_text,
        source_type = excluded.source_type,
        source_name = excluded.source_name,
        created_at = excluded.created_at,
        metadata = excluded.metadata
    `);
    const upsertVector = db.prepare(`
      INSERT INTO document_vectors (kb_id, doc_id, embedding) VALUES (?, ?, ?)
      ON CONFLICT (kb_id, doc_id) DO UPDATE SET embedding = excluded.embedding
    `);
    const deleteVector = db.prepare('DELETE FROM document_vectors WHERE kb_id = ? AND doc_id = ?');

    const write = db.transaction((docs: NewDocument[]) => {
      for (const doc of docs) {
        upsertDocument.run({
          kbId,
          id: doc.id,
          content: doc.content,
          searchText: segmentCjk(doc.content),
          ...splitMetadata(doc.metadata),
        });
        if (doc.embedding) {
          upsertVector.run(kbId, doc.id, serializeEmbedding(doc.embedding));
        } else {
          deleteVector.run(kbId, doc.id);
        }
      }
      db.prepare(
        'UPDATE knowledge_bases SET revision = revision + 1, embedding_dims = COALESCE(embedding_dims, ?) WHERE id = ?',
      ).run(dims, kbId);
    });

    write(documents);
    log.debug('Indexed documents', { kbId, count: documents.length });
    return documents.length;
  }

  /**
   * Fetch documents by id. Missing ids are absent from the map.
   */
  async getDocuments(kbId: string, ids: readonly string[]): Promise<Map<string, KbDocument>> {
    const found = new Map<string, KbDocument>();
    if (ids.length === 0) return found;

    const db = this.getDatabase();
    const unique = [...new Set(ids)];
    // Stay well below SQLite's bound-parameter limit
    for (let i = 0; i < unique.length; i += 500) {
      const batch = unique.slice(i, i + 500);
      const placeholders = batch.map(() => '?').join(',');
      const rows = db
        .prepare(`SELECT * FROM documents WHERE kb_id = ? AND id IN (${placeholders})`)
        .all(kbId, ...batch) as DocumentRow[];
      for (const row of rows) {
        found.set(row.id, rowToDocument(row));
      }
    }
    return found;
  }

  /**
   * Fetch one document, optionally with its embedding.
   */
  getDocument(kbId: string, id: string, withEmbedding: boolean = false): KbDocument | null {
    const db = this.getDatabase();
    const row = db
      .prepare('SELECT * FROM documents WHERE kb_id = ? AND id = ?')
      .get(kbId, id) as DocumentRow | undefined;
    if (!row) return null;

    const doc = rowToDocument(row);
    if (!withEmbedding) return doc;

    const vector = db
      .prepare('SELECT embedding FROM document_vectors WHERE kb_id = ? AND doc_id = ?')
      .get(kbId, id) as { embedding: Buffer } | undefined;
    return vector ? { ...doc, embedding: deserializeEmbedding(vector.embedding) } : doc;
  }

  countDocuments(kbId: string): number {
    const row = this.getDatabase()
      .prepare('SELECT COUNT(*) AS count FROM documents WHERE kb_id = ?')
      .get(kbId) as { count: number };
    return row.count;
  }

  countVectors(kbId: string): number {
    const row = this.getDatabase()
      .prepare('SELECT COUNT(*) AS count FROM document_vectors WHERE kb_id = ?')
      .get(kbId) as { count: number };
    return row.count;
  }

  /**
   * Report existence and index sizes for each knowledge base.
   */
  checkKnowledgeBases(kbIds: readonly string[]): KnowledgeBaseHealth[] {
    return kbIds.map((kbId) => {
      const exists = this.getKnowledgeBase(kbId) !== null;
      return {
        kbId,
        exists,
        documentCount: exists ? this.countDocuments(kbId) : 0,
        vectorCount: exists ? this.countVectors(kbId) : 0,
      };
    });
  }

  /**
   * Stored embeddings of a knowledge base, for the vector index.
   */
  loadEmbeddings(kbId: string): Array<{ id: string; embedding: number[] }> {
    const rows = this.getDatabase()
      .prepare('SELECT doc_id, embedding FROM document_vectors WHERE kb_id = ? ORDER BY doc_id')
      .all(kbId) as Array<{ doc_id: string; embedding: Buffer }>;
    return rows.map((r) => ({ id: r.doc_id, embedding: deserializeEmbedding(r.embedding) }));
  }
}
