/**
 * Repository Layer - Barrel Export
 *
 * This module re-exports all repository classes and their input types
 * for convenient importing. The session flow depends on the interfaces in
 * base.ts; the classes here are their SQLite implementations.
 *
 * @example
 * ```typescript
 * import {
 *   ContentChunkRepository,
 *   RevisionSessionRepository,
 *   RevisionTurnRepository,
 * } from '@/storage/repositories';
 *
 * const contentRepo = new ContentChunkRepository(db);
 * const sessionRepo = new RevisionSessionRepository(db);
 * const turnRepo = new RevisionTurnRepository(db);
 * ```
 */

// Base repository interfaces
export type { SnapshotRepository, AppendOnlyRepository } from './base';

// Content corpus
export {
  ContentChunkRepository,
  toFtsQuery,
  type CreateContentChunkInput,
} from './content-chunk.repository';

// Session snapshots
export { RevisionSessionRepository } from './revision-session.repository';

// Turn log
export { RevisionTurnRepository } from './revision-turn.repository';
