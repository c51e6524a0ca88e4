/**
 * Revision Session Types
 *
 * Types shared by the stage handlers, the session store and the revision
 * engine: the engine's dependencies and configuration, the outcome a stage
 * handler reports, and the response document returned to callers.
 */

import type { ContentService } from '../content';
import type { TopicConfig } from '../topics';
import type { SessionStats, Stage, StageLabel } from '../models';
import type { TextGenerator } from '../../llm/types';
import type { SessionStore } from './session-store';

/**
 * What a stage handler produced for one turn.
 *
 * - 'reply': a normal answer for the stage that ran (which may differ from
 *   the classified stage when a handler delegated)
 * - 'complete': the handler decided the session is finished; the engine
 *   runs completion
 */
export type StageOutcome =
  | { kind: 'reply'; stage: Stage; response: string; sources: string[] }
  | { kind: 'complete' };

/**
 * Settings the engine reads on every turn.
 */
export interface RevisionEngineConfig {
  /** Limits for topics with no table entry */
  defaultTopicConfig: TopicConfig;

  /** Temperature for every generation call */
  temperature: number;

  /** Maximum tokens for every generation call */
  maxTokens: number;
}

/**
 * Collaborators the engine is built from.
 *
 * @example
 * ```typescript
 * const deps: RevisionEngineDependencies = {
 *   store: new SessionStore({ sessionRepo, turnRepo, cache }),
 *   content: new ContentService(new ContentChunkRepository(db)),
 *   generator: new AnthropicClient(),
 * };
 * ```
 */
export interface RevisionEngineDependencies {
  store: SessionStore;
  content: ContentService;
  generator: TextGenerator;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Input for opening a session.
 */
export interface StartSessionInput {
  topic: string;
  studentId: string;
  sessionId: string;
}

/**
 * Response document returned for every start and continuation call.
 * Keys are snake_case to match the document callers receive.
 */
export interface RevisionResponse {
  response: string;
  topic: string;
  session_id: string;
  conversation_count: number;
  is_session_complete: boolean;
  session_summary: string | null;
  sources: string[];
  current_stage: StageLabel;
  max_conversations: number;
  completion_threshold: number;
  next_suggested_action?: string;
  session_stats?: SessionStats;
  /** ISO-8601 time the response was produced */
  timestamp: string;
}
