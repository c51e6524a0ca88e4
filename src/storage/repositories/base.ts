/**
 * Base Repository Interfaces for the Revision Tutor
 *
 * The core never talks to Drizzle directly. It depends on these narrow
 * interfaces, which the SQLite repositories implement and tests replace
 * with in-process fakes (including ones that fail on purpose).
 *
 * Two shapes cover everything the session flow persists:
 * - a snapshot store holding the latest version of an entity
 * - an append-only log of entries belonging to a parent entity
 */

/**
 * Latest-snapshot store keyed by id.
 *
 * @typeParam T - The domain model stored
 */
export interface SnapshotRepository<T> {
  /**
   * Retrieves the latest snapshot.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Inserts the snapshot or replaces the stored one with the same id.
   */
  upsert(entity: T): Promise<void>;
}

/**
 * Append-only log grouped by a parent id.
 *
 * @typeParam T - The stored entry type
 * @typeParam CreateInput - What a caller supplies to append
 */
export interface AppendOnlyRepository<T, CreateInput> {
  /**
   * Appends one entry. Entries are never updated after this call.
   */
  append(input: CreateInput): Promise<T>;

  /**
   * Returns every entry for the parent, oldest first.
   */
  findByParentId(parentId: string): Promise<T[]>;
}
