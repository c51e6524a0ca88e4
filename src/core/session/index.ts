/**
 * Session Module - Barrel Export
 *
 * This module provides the RevisionEngine and the pieces it is built
 * from: the session store and its cache, the stage classifier, the stage
 * handlers and the per-session turn queue.
 *
 * @example
 * ```typescript
 * import { RevisionEngine, SessionStore, SessionCache } from '@/core/session';
 *
 * const store = new SessionStore({
 *   sessionRepo: new RevisionSessionRepository(db),
 *   turnRepo: new RevisionTurnRepository(db),
 *   cache: new SessionCache({ ttlMs: 7_200_000, maxEntries: 500 }),
 * });
 *
 * const engine = new RevisionEngine({
 *   store,
 *   content: new ContentService(new ContentChunkRepository(db)),
 *   generator: new AnthropicClient(),
 * });
 * ```
 */

// Lifecycle manager
export {
  RevisionEngine,
  defaultRevisionEngineConfig,
  fallbackSummary,
  GENERIC_CONTINUATION_MESSAGE,
  SESSION_NOT_FOUND_MESSAGE,
  NEXT_SUGGESTED_ACTION,
} from './revision-engine';

// State store
export { SessionStore, type PersistResult, type SessionStoreDependencies } from './session-store';
export { SessionCache, type SessionCacheOptions } from './session-cache';
export { SessionTurnQueue } from './turn-queue';

// Classification and handlers
export {
  classifyStage,
  resolveStage,
  isQuestion,
  isEndSessionRequest,
  detectRecapMode,
  STAGE_RULES,
  QUESTION_INDICATORS,
  END_SESSION_PHRASES,
  QUICK_RECAP_KEYWORDS,
  type StageRule,
  type ClassificationInput,
} from './stage-classifier';
export {
  StageHandlers,
  selectDifficulty,
  progressPercentage,
  type Difficulty,
  type StageHandlerOptions,
} from './stage-handlers';
export { extractConceptName, addConcept } from './concepts';

// Errors and types
export { RevisionError, type RevisionErrorCode } from './errors';
export { startSessionInputSchema } from './schemas';
export type {
  StageOutcome,
  RevisionEngineConfig,
  RevisionEngineDependencies,
  StartSessionInput,
  RevisionResponse,
} from './types';
