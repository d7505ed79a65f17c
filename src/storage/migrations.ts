/**
 * Schema creation and versioning for the knowledge-base store.
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { loadSchemaStatements } from './schema-loader.js';
import { StorageError } from '../utils/errors.js';

/** Schema version written by this build */
export const SCHEMA_VERSION = 1;

/**
 * Read the recorded schema version (0 for a fresh database).
 */
export function getSchemaVersion(database: Database.Database): number {
  try {
    const row = database.prepare('SELECT MAX(version) AS version FROM schema_version').get() as
      | { version: number | null }
      | undefined;
    return row?.version ?? 0;
  } catch {
    // schema_version missing: nothing has been created yet
    return 0;
  }
}

/**
 * Create every table, index and trigger that does not exist yet and record
 * the schema version.
 *
 * @throws StorageError when the database was written by a newer build
 */
export function runMigrations(database: Database.Database): void {
  const currentVersion = getSchemaVersion(database);
  if (currentVersion > SCHEMA_VERSION) {
    throw new StorageError(
      `Database schema v${currentVersion} is newer than supported v${SCHEMA_VERSION}`,
      'SCHEMA_TOO_NEW',
    );
  }

  const apply = database.transaction((statements: string[]) => {
    for (const statement of statements) {
      try {
        database.exec(statement);
      } catch (error) {
        throw new StorageError(
          `Schema statement failed: ${statement.split('\n')[0]}`,
          'DB_QUERY_FAILED',
          error,
        );
      }
    }
    database.prepare('INSERT OR IGNORE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  });

  apply(loadSchemaStatements());
}
