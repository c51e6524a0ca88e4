/**
 * Database Schema Runner for the Revision Tutor
 *
 * Applies schema.sql to the configured SQLite database. Every statement in
 * the file is idempotent, so the script can be run any number of times.
 *
 * Usage:
 *   npm run db:migrate                          # Uses default database path
 *   DATABASE_URL=/path/to/db npm run db:migrate  # Custom database path
 */

import { getDatabaseURL } from '../config';
import { openDatabase } from './db';

const dbPath = getDatabaseURL();

console.log(`[migrate] Database path: ${dbPath}`);
console.log('[migrate] Applying schema...');

try {
  // openDatabase applies schema.sql on every connection
  const { sqlite } = openDatabase(dbPath);

  console.log('[migrate] Schema applied successfully.');

  const tables = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name NOT LIKE 'content_chunks_fts_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }

  sqlite.close();
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exit(1);
}
