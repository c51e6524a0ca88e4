/**
 * Revision Turn Repository Implementation
 *
 * Append-only log of turns. Rows are written once and never updated; the
 * transcript of a session is its rows ordered by turn number.
 */

import { randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import type { AppDatabase } from '../db';
import { revisionTurns, type RevisionTurnRow } from '../schema';
import { STAGES, type NewTurnRecord, type TurnRecord } from '@/core/models';
import type { AppendOnlyRepository } from './base';

const stageLabelSchema = z.enum([...STAGES, 'session_complete']).catch('general');

/**
 * Maps a database row to a TurnRecord. Unknown stage labels read back as
 * 'general'.
 */
function mapToDomain(row: RevisionTurnRow): TurnRecord {
  return {
    id: row.id,
    sessionId: row.sessionId,
    turn: row.turn,
    userMessage: row.userMessage,
    assistantMessage: row.assistantMessage,
    stage: stageLabelSchema.parse(row.stage),
    timestamp: row.timestamp,
  };
}

/**
 * Repository for the turn log.
 *
 * @example
 * ```typescript
 * const repo = new RevisionTurnRepository(db);
 *
 * await repo.append({
 *   sessionId: 'sess_001',
 *   turn: 1,
 *   userMessage: 'quick recap please',
 *   assistantMessage: 'Great, let us start with...',
 *   stage: 'kickoff_response',
 * });
 *
 * const transcript = await repo.findByParentId('sess_001');
 * ```
 */
export class RevisionTurnRepository implements AppendOnlyRepository<TurnRecord, NewTurnRecord> {
  constructor(private readonly db: AppDatabase) {}

  async append(input: NewTurnRecord): Promise<TurnRecord> {
    const row = {
      id: `turn_${randomUUID()}`,
      sessionId: input.sessionId,
      turn: input.turn,
      userMessage: input.userMessage,
      assistantMessage: input.assistantMessage,
      stage: input.stage,
      timestamp: input.timestamp ?? new Date(),
    };

    const result = await this.db.insert(revisionTurns).values(row).returning();
    return mapToDomain(result[0]);
  }

  /**
   * Returns a session's turns, oldest first.
   */
  async findByParentId(sessionId: string): Promise<TurnRecord[]> {
    const rows = await this.db
      .select()
      .from(revisionTurns)
      .where(eq(revisionTurns.sessionId, sessionId))
      .orderBy(asc(revisionTurns.turn), asc(revisionTurns.timestamp));

    return rows.map(mapToDomain);
  }
}
