/**
 * In-memory vector index with SQLite persistence.
 *
 * Embeddings are stored as Float32 blobs in `document_vectors` and loaded
 * into memory per knowledge base on first search for brute-force cosine
 * similarity. Each cached index remembers the KB `revision` it was loaded
 * at; a later write bumps the revision and the next search reloads.
 *
 * ## Usage
 *
 * ```typescript
 * const store = new VectorStore(db);
 * const hits = await store.search('legal', queryEmbedding, 10);
 * // [{ id: 'doc-7', score: 0.82 }, ...]
 * ```
 *
 * ## Performance Notes
 *
 * - Load: O(n) to deserialize a KB's vectors
 * - Search: O(n·d) brute force, fine for tens of thousands of passages
 * - Memory: ~2KB per 512-dim vector
 *
 * @module storage/vector-store
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import type { IndexHit } from './types.js';
import { cosineSimilarity } from '../utils/similarity.js';
import { deserializeEmbedding, isFiniteVector } from '../utils/embedding-utils.js';
import { RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-store');

interface CachedIndex {
  revision: number;
  dims: number | null;
  vectors: Map<string, number[]>;
}

export class VectorStore {
  private indexes: Map<string, CachedIndex> = new Map();

  constructor(private db?: Database.Database) {}

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Return the KB's index, loading it if absent or stale.
   *
   * @throws RetrievalError `INDEX_NOT_FOUND` when the KB is not registered
   */
  private load(kbId: string): CachedIndex {
    const db = this.getDatabase();
    const kb = db
      .prepare('SELECT revision, embedding_dims FROM knowledge_bases WHERE id = ?')
      .get(kbId) as { revision: number; embedding_dims: number | null } | undefined;

    if (!kb) {
      this.indexes.delete(kbId);
      throw new RetrievalError(`Knowledge base "${kbId}" has no vector index`, 'INDEX_NOT_FOUND', undefined, kbId);
    }

    const cached = this.indexes.get(kbId);
    if (cached && cached.revision === kb.revision) return cached;

    const rows = db
      .prepare('SELECT doc_id, embedding FROM document_vectors WHERE kb_id = ?')
      .all(kbId) as Array<{ doc_id: string; embedding: Buffer }>;

    const vectors = new Map<string, number[]>();
    for (const row of rows) {
      vectors.set(row.doc_id, deserializeEmbedding(row.embedding));
    }

    const index: CachedIndex = { revision: kb.revision, dims: kb.embedding_dims, vectors };
    this.indexes.set(kbId, index);
    log.debug('Loaded vector index', { kbId, vectors: vectors.size, revision: kb.revision });
    return index;
  }

  /**
   * Nearest passages by cosine similarity, best first; ties by id.
   *
   * @throws RetrievalError `INDEX_NOT_FOUND` for an unknown KB, `MALFORMED_QUERY`
   *   when the embedding is non-finite or its dimensions differ from the index
   */
  async search(kbId: string, embedding: readonly number[], limit: number): Promise<IndexHit[]> {
    const index = this.load(kbId);

    if (!isFiniteVector(embedding)) {
      throw new RetrievalError('Query embedding contains non-finite values', 'MALFORMED_QUERY', undefined, kbId);
    }
    if (index.dims !== null && embedding.length !== index.dims) {
      throw new RetrievalError(
        `Query embedding has ${embedding.length} dims, "${kbId}" stores ${index.dims}`,
        'MALFORMED_QUERY',
        undefined,
        kbId,
      );
    }
    if (limit <= 0) return [];

    const results: IndexHit[] = [];
    for (const [id, vector] of index.vectors) {
      results.push({ id, score: cosineSimilarity(embedding, vector) });
    }

    results.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return results.slice(0, limit);
  }

  /**
   * Number of vectors in a KB's index.
   */
  async count(kbId: string): Promise<number> {
    return this.load(kbId).vectors.size;
  }

  /**
   * Drop cached indexes (all, or one KB's).
   */
  reset(kbId?: string): void {
    if (kbId === undefined) {
      this.indexes.clear();
    } else {
      this.indexes.delete(kbId);
    }
  }
}
