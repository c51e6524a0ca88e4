/**
 * Session State Store
 *
 * Owns the canonical session records. Reads go to the in-memory cache
 * first and fall back to the durable snapshot; writes go to the cache and
 * then to the snapshot. Durable writes report their outcome as a
 * PersistResult instead of throwing: a failed write is logged, the cached
 * value stays authoritative, and the next successful write reconciles the
 * snapshot.
 */

import type { RevisionSession, NewTurnRecord, TurnRecord } from '../models';
import type { AppendOnlyRepository, SnapshotRepository } from '../../storage/repositories/base';
import type { SessionCache } from './session-cache';

/**
 * Outcome of a durable write.
 */
export type PersistResult = { ok: true } | { ok: false; error: Error };

export interface SessionStoreDependencies {
  sessionRepo: SnapshotRepository<RevisionSession>;
  turnRepo: AppendOnlyRepository<TurnRecord, NewTurnRecord>;
  cache: SessionCache;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class SessionStore {
  private readonly sessionRepo: SnapshotRepository<RevisionSession>;
  private readonly turnRepo: AppendOnlyRepository<TurnRecord, NewTurnRecord>;
  private readonly cache: SessionCache;

  constructor(deps: SessionStoreDependencies) {
    this.sessionRepo = deps.sessionRepo;
    this.turnRepo = deps.turnRepo;
    this.cache = deps.cache;
  }

  /**
   * Resolves a session from the cache, or restores it from its snapshot.
   *
   * @returns The session, or null when neither the cache nor the snapshot
   *   store has it (a failing snapshot read counts as a miss)
   */
  async get(id: string): Promise<RevisionSession | null> {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }

    let restored: RevisionSession | null;
    try {
      restored = await this.sessionRepo.findById(id);
    } catch (error) {
      console.error(`[SessionStore] Failed to restore session ${id}:`, error);
      return null;
    }

    if (restored) {
      this.cache.set(id, restored);
    }
    return restored;
  }

  /**
   * Writes the session through the cache to its durable snapshot.
   */
  async put(session: RevisionSession): Promise<PersistResult> {
    this.cache.set(session.id, session);

    try {
      await this.sessionRepo.upsert(session);
      return { ok: true };
    } catch (error) {
      console.error(`[SessionStore] Failed to persist session ${session.id}:`, error);
      return { ok: false, error: toError(error) };
    }
  }

  /**
   * Appends one turn to the durable log, independently of the snapshot.
   */
  async appendTurn(record: NewTurnRecord): Promise<PersistResult> {
    try {
      await this.turnRepo.append(record);
      return { ok: true };
    } catch (error) {
      console.error(
        `[SessionStore] Failed to log turn ${record.turn} of session ${record.sessionId}:`,
        error
      );
      return { ok: false, error: toError(error) };
    }
  }

  /**
   * Reads a session's turn log, oldest first.
   */
  async getTurns(id: string): Promise<TurnRecord[]> {
    return this.turnRepo.findByParentId(id);
  }

  /**
   * Drops expired sessions from the cache.
   *
   * @returns Number of cache entries removed
   */
  sweepCache(): number {
    return this.cache.sweep();
  }
}
