/**
 * Core Domain Models - Barrel Export
 *
 * This module re-exports all domain types for convenient importing.
 *
 * @example
 * ```typescript
 * import type { RevisionSession, ContentChunk, Stage } from '@/core/models';
 * ```
 */

// Session record and turn log entries
export type {
  RecapMode,
  RevisionSession,
  NewRevisionSession,
  TurnRecord,
  NewTurnRecord,
  SessionStats,
} from './session';
export { createRevisionSession } from './session';

// Topic material
export type { ContentChunk, TopicSummary } from './content';

// Stage labels
export type { Stage, CompletionStage, StageLabel } from './stage';
export { STAGES } from './stage';
