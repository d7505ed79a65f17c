/**
 * Loads schema.sql and splits it into executable statements.
 *
 * better-sqlite3's `exec` runs a whole script, but executing statement by
 * statement lets migrations tolerate objects that already exist and report
 * the exact statement that failed.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const SCHEMA_PATH = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');

/**
 * Read the schema file beside this module and split it.
 */
export function loadSchemaStatements(path: string = SCHEMA_PATH): string[] {
  return splitStatements(readFileSync(path, 'utf-8'));
}

/**
 * Split SQL text into statements.
 *
 * A semicolon at the end of a line ends a statement, except inside a
 * trigger body (from a line ending in BEGIN to a line starting with END;).
 * Full-line `--` comments are dropped.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let buffer: string[] = [];
  let inTrigger = false;

  const flush = (): void => {
    const stmt = buffer.join('\n').trim().replace(/;$/, '').trim();
    if (stmt) statements.push(stmt);
    buffer = [];
  };

  for (const line of sql.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('--') || (!trimmed && buffer.length === 0)) continue;

    buffer.push(line);

    if (/\bBEGIN$/i.test(trimmed)) {
      inTrigger = true;
      continue;
    }

    if (inTrigger) {
      if (/^END\s*;$/i.test(trimmed)) {
        inTrigger = false;
        // Trigger bodies keep their inner semicolons; only the final one goes.
        flush();
      }
      continue;
    }

    if (trimmed.endsWith(';')) flush();
  }

  flush();
  return statements;
}
