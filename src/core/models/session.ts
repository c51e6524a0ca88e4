/**
 * Revision Session Domain Types
 *
 * A RevisionSession is one continuous tutoring interaction between a student
 * and the tutor on a single topic. Each continuation call is a turn; the
 * session record carries every piece of progress the stage handlers read or
 * write (chunk cursor, covered concepts, quiz and question flags), so a
 * snapshot of this record is enough to resume after a restart.
 *
 * Every field is present from construction. Optional data is modelled as
 * `null` or an empty array rather than a missing property.
 *
 * This module contains only pure TypeScript types and one factory with no
 * runtime dependencies.
 */

import type { ContentChunk } from './content';
import type { StageLabel } from './stage';

/**
 * How the student asked to revise, chosen during the kickoff turn.
 *
 * - 'quick_recap': brief explanations, fast pace
 * - 'deep_dive': step-by-step breakdown of each concept
 */
export type RecapMode = 'quick_recap' | 'deep_dive';

/**
 * RevisionSession is the canonical, mutable session record owned by the
 * session store.
 *
 * @example
 * ```typescript
 * const session: RevisionSession = {
 *   id: 'sess_001',
 *   topic: 'photosynthesis',
 *   studentId: 'student_42',
 *   conversationCount: 3,
 *   startedAt: new Date('2024-03-01T09:00:00Z'),
 *   lastInteraction: new Date('2024-03-01T09:04:00Z'),
 *   isComplete: false,
 *   conceptsCovered: ['Plants make food', 'Chlorophyll absorbs light'],
 *   understandingLevel: 'beginner',
 *   maxConversations: 30,
 *   completionThreshold: 20,
 *   currentChunkIndex: 1,
 *   conceptChunks: [],
 *   recapMode: 'deep_dive',
 *   quizInProgress: false,
 *   quizConcepts: [],
 *   awaitingAnswer: true,
 *   awaitingAnswerConcept: 'Chlorophyll absorbs light',
 * };
 * ```
 */
export interface RevisionSession {
  /** Session identifier supplied by the caller on start */
  id: string;

  /** Topic being revised, exactly as given on start */
  topic: string;

  /** Identifier of the student who owns the session */
  studentId: string;

  /** Number of continuation turns so far; grows by exactly one per turn */
  conversationCount: number;

  /** When the session was created */
  startedAt: Date;

  /** When the last turn was processed */
  lastInteraction: Date;

  /** Set once when the session completes; never reset */
  isComplete: boolean;

  /** Concept labels covered so far, in first-seen order, without duplicates */
  conceptsCovered: string[];

  /** Free-form understanding label; starts at 'beginner' */
  understandingLevel: string;

  /** Turn cap for this session, or null to fall back to the topic configuration */
  maxConversations: number | null;

  /** Completion target for this session, or null to fall back to the topic configuration */
  completionThreshold: number | null;

  /** Cursor into conceptChunks; stays below conceptChunks.length whenever chunks exist */
  currentChunkIndex: number;

  /** Ordered chunks delivered one by one during progressive recap */
  conceptChunks: ContentChunk[];

  /** Recap pace chosen at kickoff, or null before the kickoff turn */
  recapMode: RecapMode | null;

  /** True while a mini quiz waits for the student's answers */
  quizInProgress: boolean;

  /** Concepts the open quiz covers (empty when no quiz is open) */
  quizConcepts: string[];

  /** True while an engaging question waits for an answer */
  awaitingAnswer: boolean;

  /** Concept the pending question refers to */
  awaitingAnswerConcept: string | null;
}

/**
 * Fields a caller provides to open a session. Everything else starts from
 * its initial value.
 */
export interface NewRevisionSession {
  id: string;
  topic: string;
  studentId: string;
  maxConversations?: number | null;
  completionThreshold?: number | null;
  startedAt?: Date;
}

/**
 * Builds a fresh session with the cursor and counter at zero.
 */
export function createRevisionSession(input: NewRevisionSession): RevisionSession {
  const startedAt = input.startedAt ?? new Date();

  return {
    id: input.id,
    topic: input.topic,
    studentId: input.studentId,
    conversationCount: 0,
    startedAt,
    lastInteraction: startedAt,
    isComplete: false,
    conceptsCovered: [],
    understandingLevel: 'beginner',
    maxConversations: input.maxConversations ?? null,
    completionThreshold: input.completionThreshold ?? null,
    currentChunkIndex: 0,
    conceptChunks: [],
    recapMode: null,
    quizInProgress: false,
    quizConcepts: [],
    awaitingAnswer: false,
    awaitingAnswerConcept: null,
  };
}

/**
 * One entry of the append-only turn log.
 * Turn 0 is the kickoff produced by session start and has no user message.
 */
export interface TurnRecord {
  /** Unique identifier of the log entry */
  id: string;

  /** Session this turn belongs to */
  sessionId: string;

  /** Conversation count at the time of the turn */
  turn: number;

  /** What the student said, or null for the opening turn */
  userMessage: string | null;

  /** What the tutor answered */
  assistantMessage: string;

  /** Stage label the turn resolved to */
  stage: StageLabel;

  /** When the turn was recorded */
  timestamp: Date;
}

/**
 * Input for appending a turn; the log assigns the id.
 */
export type NewTurnRecord = Omit<TurnRecord, 'id' | 'timestamp'> & {
  timestamp?: Date;
};

/**
 * Statistics reported when a session completes. Keys are snake_case because
 * they are returned to callers as part of the response document.
 */
export interface SessionStats {
  /** Turns taken, equal to the conversation count */
  total_interactions: number;
  /** Number of distinct concepts covered */
  concepts_covered: number;
  /** The covered concepts, in the order they were first seen */
  concepts_list: string[];
  /** Minutes since the session started, one decimal place */
  session_duration_minutes: number;
  /** Turns relative to the completion threshold, capped at 100, one decimal place */
  completion_rate: number;
}
