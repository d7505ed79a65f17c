/**
 * Storage layer exports.
 */

// Database
export { openDatabase, getDb, setDb, resetDb, closeDb } from './db.js';
export type { OpenDatabaseOptions } from './db.js';
export { getSchemaVersion, runMigrations, SCHEMA_VERSION } from './migrations.js';

// Types
export type {
  DocumentMetadata,
  KbDocument,
  NewDocument,
  KnowledgeBaseInfo,
  KnowledgeBaseHealth,
  IndexHit,
} from './types.js';

// Stores
export { DocumentStore } from './document-store.js';
export type { CreateKnowledgeBaseOptions } from './document-store.js';
export { KeywordStore, sanitizeQuery } from './keyword-store.js';
export { VectorStore } from './vector-store.js';
