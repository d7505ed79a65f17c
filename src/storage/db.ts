/**
 * SQLite connection for the knowledge-base store.
 *
 * Uses better-sqlite3-multiple-ciphers so a store can be encrypted at rest
 * with a key from `storage.key` in config or KBRANK_DB_KEY.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath, DEFAULT_CONFIG } from '../config/retrieval-config.js';
import { runMigrations } from './migrations.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

export interface OpenDatabaseOptions {
  /** Encryption key; when set the database is opened with ChaCha20 */
  key?: string;
  /** Skip schema creation (read-only inspection) */
  skipMigrations?: boolean;
}

/**
 * Open a database at `path` (':memory:' for an in-memory store), apply
 * encryption and pragmas, and create the schema.
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(path);

  if (options.key) {
    // Cipher must be chosen before the key is applied
    database.pragma(`cipher = 'chacha20'`);
    database.pragma(`key = '${options.key.replace(/'/g, "''")}'`);
    log.debug('Database opened with chacha20 encryption', { path });
  }

  database.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  if (!options.skipMigrations) {
    runMigrations(database);
  }

  return database;
}

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` will return this instance instead of opening one.
 * Use `resetDb()` to clear it.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   setDb(openDatabase(':memory:'));
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Clear any custom database and close the singleton connection.
 */
export function resetDb(): void {
  customDb = null;
  closeDb();
}

/**
 * Return the shared connection.
 *
 * Returns (in priority order):
 * 1. Custom database set via `setDb()` (for testing)
 * 2. Existing singleton connection
 * 3. New connection to `dbPath` (default: the configured store path),
 *    encrypted with `key` when one is given
 */
export function getDb(dbPath?: string, key?: string): Database.Database {
  if (customDb) {
    return customDb;
  }

  if (db) {
    return db;
  }

  db = openDatabase(resolvePath(dbPath ?? DEFAULT_CONFIG.dbPath), { key });
  return db;
}

/**
 * Close the singleton connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
