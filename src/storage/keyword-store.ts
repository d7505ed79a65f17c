/**
 * FTS5-backed keyword search over a knowledge base.
 *
 * BM25-ranked full-text search using SQLite FTS5 with porter stemming.
 * CJK text has no spaces between words, so both indexed text and queries are
 * segmented into one token per ideograph before they reach the tokenizer.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import type { IndexHit } from './types.js';
import { RetrievalError, errorMessage } from '../utils/errors.js';
import { segmentCjk } from '../utils/text-utils.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('keyword-store');

/**
 * Sanitize a query string for FTS5 MATCH syntax.
 *
 * Strips FTS5 operators and special characters, segments CJK text, and
 * quotes every term. Terms are OR-ed so a passage matching part of the
 * query still ranks, with BM25 rewarding passages that match more.
 */
export function sanitizeQuery(query: string): string {
  if (!query || !query.trim()) return '';

  const sanitized = segmentCjk(
    query
      // Boolean operators as full words
      .replace(/\b(AND|OR|NOT|NEAR)\b/g, ' ')
      // Characters with meaning in FTS5 syntax, plus CJK punctuation
      .replace(/[*"(){}^~\-:+,.;!?'\u3000-\u303f\uff01-\uff0f\uff1a-\uff20]/g, ' '),
  );

  if (!sanitized) return '';

  const terms = [...new Set(sanitized.split(' ').filter(Boolean))];
  return terms.map((t) => `"${t}"`).join(' OR ');
}

export class KeywordStore {
  constructor(private db?: Database.Database) {}

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Full-text search within one knowledge base, best match first.
   *
   * @throws RetrievalError `INDEX_NOT_FOUND` when the KB is not registered,
   *   `KEYWORD_SEARCH_FAILED` when the query fails
   */
  async search(kbId: string, query: string, limit: number): Promise<IndexHit[]> {
    const db = this.getDatabase();

    const kb = db.prepare('SELECT 1 FROM knowledge_bases WHERE id = ?').get(kbId);
    if (!kb) {
      throw new RetrievalError(`Knowledge base "${kbId}" has no keyword index`, 'INDEX_NOT_FOUND', undefined, kbId);
    }

    const match = sanitizeQuery(query);
    if (!match || limit <= 0) return [];

    try {
      const rows = db
        .prepare(
          `
        SELECT documents.id AS id, bm25(documents_fts) AS score
        FROM documents_fts
        JOIN documents ON documents.rowid = documents_fts.rowid
        WHERE documents_fts MATCH ?
          AND documents.kb_id = ?
        ORDER BY bm25(documents_fts), documents.id
        LIMIT ?
      `,
        )
        .all(match, kbId, limit) as Array<{ id: string; score: number }>;

      // bm25() is negative (lower = better); negate for higher-is-better scores
      return rows.map((r) => ({ id: r.id, score: -r.score }));
    } catch (error) {
      log.warn('Keyword search failed', { kbId, error: errorMessage(error) });
      throw new RetrievalError(`Keyword search failed for "${kbId}"`, 'KEYWORD_SEARCH_FAILED', error, kbId);
    }
  }
}
