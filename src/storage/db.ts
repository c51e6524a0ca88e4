/**
 * Database Connection Factory for the Revision Tutor
 *
 * This module opens SQLite databases through better-sqlite3 and wraps them
 * with Drizzle ORM. Every connection it creates has the schema in
 * schema.sql applied, so a fresh file or ':memory:' database is immediately
 * usable.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase('./revision-tutor.db');
 *
 *   // In tests
 *   const { db, sqlite } = openDatabase(':memory:');
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Applies schema.sql to a raw connection. Safe to run repeatedly.
 *
 * @param sqlite - An open better-sqlite3 connection
 */
export function applySchema(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(SCHEMA_SQL_PATH, 'utf8'));
}

/**
 * Opens a database and returns both the Drizzle instance and the raw
 * connection (needed to close it, or to inspect it in tests).
 *
 * @param dbPath - Path to the SQLite file, or ':memory:'
 */
export function openDatabase(dbPath: string) {
  const sqlite = new Database(dbPath);

  // WAL keeps readers unblocked while a turn is being written
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  applySchema(sqlite);

  return { db: drizzle(sqlite, { schema }), sqlite };
}

/**
 * Creates a Drizzle ORM database instance for the given SQLite file.
 *
 * @param dbPath - Path to the SQLite database file.
 *                 Use ':memory:' for an in-memory database.
 * @returns A Drizzle ORM database instance with full schema awareness
 */
export function createDatabase(dbPath: string) {
  return openDatabase(dbPath).db;
}

/**
 * Type alias for the Drizzle database instance.
 *
 * @example
 * function countChunks(database: AppDatabase) {
 *   return database.select().from(contentChunks);
 * }
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
