/**
 * Revision Session Repository Implementation
 *
 * Stores the latest snapshot of each revision session. The snapshot is the
 * source of truth after a process restart, so reading it must tolerate rows
 * written before a column existed: every nullable column is defaulted when
 * the row is mapped back to a RevisionSession.
 */

import { eq } from 'drizzle-orm';
import { z } from 'zod';
import type { AppDatabase } from '../db';
import { revisionSessions, type NewRevisionSessionRow, type RevisionSessionRow } from '../schema';
import type { ContentChunk, RevisionSession } from '@/core/models';
import type { SnapshotRepository } from './base';

const chunkListSchema = z
  .array(z.object({ chunkId: z.string(), topic: z.string(), text: z.string() }))
  .catch([]);

const stringListSchema = z.array(z.string()).catch([]);

/**
 * Maps a database row to a RevisionSession, defaulting absent fields.
 *
 * JSON columns go through zod so a malformed or legacy value degrades to an
 * empty list instead of corrupting the session.
 */
export function mapToDomain(row: RevisionSessionRow): RevisionSession {
  const conceptChunks: ContentChunk[] = chunkListSchema.parse(row.conceptChunks ?? []);
  const lastIndex = Math.max(conceptChunks.length - 1, 0);

  return {
    id: row.id,
    topic: row.topic,
    studentId: row.studentId,
    conversationCount: row.conversationCount,
    startedAt: row.startedAt,
    lastInteraction: row.lastInteraction ?? row.startedAt,
    isComplete: row.isComplete,
    conceptsCovered: stringListSchema.parse(row.conceptsCovered ?? []),
    understandingLevel: row.userUnderstandingLevel ?? 'beginner',
    maxConversations: row.maxConversations,
    completionThreshold: row.completionThreshold,
    // Clamp so a snapshot can never put the cursor past the chunk list
    currentChunkIndex: Math.min(Math.max(row.currentChunkIndex ?? 0, 0), lastIndex),
    conceptChunks,
    recapMode: row.recapMode,
    quizInProgress: row.quizInProgress ?? false,
    quizConcepts: stringListSchema.parse(row.quizConcepts ?? []),
    awaitingAnswer: row.awaitingAnswer ?? false,
    awaitingAnswerConcept: row.awaitingAnswerConcept,
  };
}

/**
 * Maps a RevisionSession to the columns of its snapshot row.
 */
function mapToRow(session: RevisionSession): NewRevisionSessionRow {
  return {
    id: session.id,
    topic: session.topic,
    studentId: session.studentId,
    conversationCount: session.conversationCount,
    startedAt: session.startedAt,
    lastInteraction: session.lastInteraction,
    isComplete: session.isComplete,
    conceptsCovered: session.conceptsCovered,
    userUnderstandingLevel: session.understandingLevel,
    maxConversations: session.maxConversations,
    completionThreshold: session.completionThreshold,
    currentChunkIndex: session.currentChunkIndex,
    conceptChunks: session.conceptChunks,
    recapMode: session.recapMode,
    quizInProgress: session.quizInProgress,
    quizConcepts: session.quizConcepts,
    awaitingAnswer: session.awaitingAnswer,
    awaitingAnswerConcept: session.awaitingAnswerConcept,
  };
}

/**
 * Repository for session snapshots.
 *
 * @example
 * ```typescript
 * const repo = new RevisionSessionRepository(db);
 *
 * await repo.upsert(session);
 * const restored = await repo.findById(session.id);
 * ```
 */
export class RevisionSessionRepository implements SnapshotRepository<RevisionSession> {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Retrieves a session snapshot by id.
   *
   * @returns The restored session, or null if no snapshot exists
   */
  async findById(id: string): Promise<RevisionSession | null> {
    const result = await this.db
      .select()
      .from(revisionSessions)
      .where(eq(revisionSessions.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Writes the snapshot, replacing any previous one for the same session.
   */
  async upsert(session: RevisionSession): Promise<void> {
    const { id, ...columns } = mapToRow(session);

    await this.db
      .insert(revisionSessions)
      .values({ id, ...columns })
      .onConflictDoUpdate({ target: revisionSessions.id, set: columns });
  }
}
