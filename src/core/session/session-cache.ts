/**
 * Session Cache
 *
 * In-memory overlay over the durable session snapshots. Entries expire
 * after an idle period and the least recently used entry is evicted once
 * the cache is full. An evicted session is not lost: the store restores it
 * from its snapshot on the next read.
 *
 * Map iteration order is insertion order, so re-inserting on every access
 * keeps the least recently used entry first.
 */

import type { RevisionSession } from '../models';

export interface SessionCacheOptions {
  /** Idle time after which an entry is dropped */
  ttlMs: number;
  /** Upper bound on cached sessions */
  maxEntries: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

interface CacheEntry {
  session: RevisionSession;
  lastAccess: number;
}

export class SessionCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: SessionCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = Math.max(1, options.maxEntries);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached session and marks it as recently used, or undefined
   * when it is absent or expired.
   */
  get(id: string): RevisionSession | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;

    const now = this.now();
    if (now - entry.lastAccess > this.ttlMs) {
      this.entries.delete(id);
      return undefined;
    }

    this.entries.delete(id);
    this.entries.set(id, { session: entry.session, lastAccess: now });
    return entry.session;
  }

  set(id: string, session: RevisionSession): void {
    this.entries.delete(id);
    this.entries.set(id, { session, lastAccess: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Drops every expired entry.
   *
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [id, entry] of this.entries) {
      if (now - entry.lastAccess > this.ttlMs) {
        this.entries.delete(id);
        removed++;
      }
    }

    return removed;
  }
}
