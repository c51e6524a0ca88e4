/**
 * Database Schema Definitions for the Revision Tutor
 *
 * This file contains Drizzle ORM schema definitions for SQLite.
 * The DDL that creates these tables (plus the full-text index over chunk
 * text, which Drizzle does not model) lives in schema.sql and must be kept
 * in step with the definitions below.
 *
 * Tables:
 * - Content Chunks: the topic corpus, one row per passage
 * - Revision Sessions: latest snapshot of every session
 * - Revision Turns: append-only log of every turn
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { ContentChunk } from '@/core/models';

/**
 * Content Chunks Table
 *
 * `seq` is the rowid alias. It defines the stable delivery order of chunks
 * within a topic and is the key the FTS5 table `content_chunks_fts` joins on.
 */
export const contentChunks = sqliteTable(
  'content_chunks',
  {
    seq: integer('seq').primaryKey({ autoIncrement: true }),

    // Stable identifier reported back as a response source
    chunkId: text('chunk_id').notNull().unique(),

    topic: text('topic').notNull(),

    text: text('text').notNull(),
  },
  (table) => [index('content_chunks_topic_idx').on(table.topic, table.seq)]
);

/**
 * Revision Sessions Table
 *
 * One row per session, overwritten on every turn. Columns added after the
 * first release are nullable so older snapshots still load; the repository
 * fills in defaults when reading them.
 */
export const revisionSessions = sqliteTable('revision_sessions', {
  id: text('id').primaryKey(),

  topic: text('topic').notNull(),

  studentId: text('student_id').notNull(),

  conversationCount: integer('conversation_count').notNull().default(0),

  startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),

  lastInteraction: integer('last_interaction', { mode: 'timestamp_ms' }),

  isComplete: integer('is_complete', { mode: 'boolean' }).notNull().default(false),

  conceptsCovered: text('concepts_covered', { mode: 'json' }).$type<string[]>(),

  userUnderstandingLevel: text('user_understanding_level'),

  maxConversations: integer('max_conversations'),

  completionThreshold: integer('completion_threshold'),

  currentChunkIndex: integer('current_chunk_index'),

  // Ordered chunks used for progressive recap, stored whole so a restored
  // session keeps the order it started with
  conceptChunks: text('concept_chunks', { mode: 'json' }).$type<ContentChunk[]>(),

  recapMode: text('recap_mode', { enum: ['quick_recap', 'deep_dive'] }),

  quizInProgress: integer('quiz_in_progress', { mode: 'boolean' }),

  quizConcepts: text('quiz_concepts', { mode: 'json' }).$type<string[]>(),

  awaitingAnswer: integer('awaiting_answer', { mode: 'boolean' }),

  awaitingAnswerConcept: text('awaiting_answer_concept'),
});

/**
 * Revision Turns Table
 *
 * Append-only. Deliberately has no foreign key to revision_sessions: a turn
 * is still logged when the snapshot write for the same turn failed.
 */
export const revisionTurns = sqliteTable(
  'revision_turns',
  {
    id: text('id').primaryKey(),

    sessionId: text('session_id').notNull(),

    turn: integer('turn').notNull(),

    userMessage: text('user_message'),

    assistantMessage: text('assistant_message').notNull(),

    stage: text('stage').notNull(),

    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('revision_turns_session_id_idx').on(table.sessionId, table.turn)]
);

/**
 * Type exports for use throughout the storage layer
 */
export type ContentChunkRow = typeof contentChunks.$inferSelect;
export type NewContentChunkRow = typeof contentChunks.$inferInsert;

export type RevisionSessionRow = typeof revisionSessions.$inferSelect;
export type NewRevisionSessionRow = typeof revisionSessions.$inferInsert;

export type RevisionTurnRow = typeof revisionTurns.$inferSelect;
export type NewRevisionTurnRow = typeof revisionTurns.$inferInsert;
