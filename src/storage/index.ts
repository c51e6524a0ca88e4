/**
 * Storage Module - Barrel Export
 *
 * This file serves as the public API for the storage module.
 * It re-exports schema definitions, row types, and database utilities.
 *
 * Usage:
 *   import { createDatabase, revisionSessions } from '@/storage';
 *   const db = createDatabase('./revision-tutor.db');
 *   const rows = await db.select().from(revisionSessions);
 */

// Database connection factories
export { createDatabase, openDatabase, applySchema } from './db';
export type { AppDatabase } from './db';

// Table definitions
export { contentChunks, revisionSessions, revisionTurns } from './schema';

// Inferred row types
export type {
  ContentChunkRow,
  NewContentChunkRow,
  RevisionSessionRow,
  NewRevisionSessionRow,
  RevisionTurnRow,
  NewRevisionTurnRow,
} from './schema';
