/**
 * Tests for database connection handling.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDatabase, getDb, setDb, resetDb } from '../../src/storage/db.js';
import { getSchemaVersion, SCHEMA_VERSION } from '../../src/storage/migrations.js';

describe('db', () => {
  describe('openDatabase', () => {
    it('creates the schema in a new database', () => {
      const db = openDatabase(':memory:');

      const tables = db
        .prepare("SELECT name FROM sqlite_master WHERE type IN ('table') AND name NOT LIKE 'documents_fts_%' ORDER BY name")
        .all() as Array<{ name: string }>;
      expect(tables.map((t) => t.name)).toEqual([
        'document_vectors',
        'documents',
        'documents_fts',
        'knowledge_bases',
        'schema_version',
      ]);
      expect(getSchemaVersion(db)).toBe(SCHEMA_VERSION);
      db.close();
    });

    it('enables foreign keys', () => {
      const db = openDatabase(':memory:');

      expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
      db.close();
    });

    it('can skip schema creation', () => {
      const db = openDatabase(':memory:', { skipMigrations: true });

      expect(getSchemaVersion(db)).toBe(0);
      db.close();
    });
  });

  describe('shared connection', () => {
    afterEach(() => {
      resetDb();
    });

    it('returns the database set for tests', () => {
      const db = openDatabase(':memory:');
      setDb(db);

      expect(getDb()).toBe(db);
      db.close();
    });

    it('stops returning the test database after reset', () => {
      const dir = mkdtempSync(join(tmpdir(), 'kbrank-db-'));
      const db = openDatabase(':memory:');
      setDb(db);
      resetDb();

      const shared = getDb(join(dir, 'store.db'));
      expect(shared).not.toBe(db);
      expect(getDb()).toBe(shared);

      resetDb();
      db.close();
      rmSync(dir, { recursive: true, force: true });
    });
  });

  describe('encryption', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'kbrank-cipher-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reopens an encrypted store with its key only', () => {
      const path = join(dir, 'nested', 'store.db');
      const db = openDatabase(path, { key: 'test-secret' });
      db.prepare("INSERT INTO knowledge_bases (id, name) VALUES ('legal', 'Legal')").run();
      db.close();

      const reopened = openDatabase(path, { key: 'test-secret' });
      expect(reopened.prepare('SELECT name FROM knowledge_bases').all()).toEqual([{ name: 'Legal' }]);
      reopened.close();

      expect(() => {
        const plain = openDatabase(path);
        try {
          plain.prepare('SELECT name FROM knowledge_bases').all();
        } finally {
          plain.close();
        }
      }).toThrow();
    });

    it('opens the shared connection with the configured key', () => {
      const path = join(dir, 'store.db');
      getDb(path, 'test-secret').prepare("INSERT INTO knowledge_bases (id, name) VALUES ('hr', 'HR')").run();
      resetDb();

      const reopened = openDatabase(path, { key: 'test-secret' });
      expect(reopened.prepare('SELECT id FROM knowledge_bases').all()).toEqual([{ id: 'hr' }]);
      reopened.close();

      expect(() => {
        const plain = openDatabase(path, { skipMigrations: true });
        try {
          plain.prepare('SELECT id FROM knowledge_bases').all();
        } finally {
          plain.close();
        }
      }).toThrow();
    });
  });
});
