/**
 * Test Setup Module
 *
 * Provides utilities for creating isolated test environments with in-memory
 * databases and for wiring a RevisionEngine against them. Every database
 * gets the full schema (including the FTS index) from schema.sql.
 */

import type Database from 'better-sqlite3';
import { openDatabase, type AppDatabase } from '../src/storage/db';
import {
  ContentChunkRepository,
  RevisionSessionRepository,
  RevisionTurnRepository,
} from '../src/storage/repositories';
import { ContentService } from '../src/core/content';
import { RevisionEngine, SessionCache, SessionStore } from '../src/core/session';
import type { RevisionEngineConfig } from '../src/core/session';
import type { TextGenerator } from '../src/llm/types';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Container for test database resources.
 */
export interface TestDatabaseContext {
  /** Drizzle ORM database instance */
  db: AppDatabase;
  /** Raw SQLite connection for cleanup */
  sqlite: Database.Database;
}

export interface TestRepositories {
  contentRepo: ContentChunkRepository;
  sessionRepo: RevisionSessionRepository;
  turnRepo: RevisionTurnRepository;
}

export interface TestContext extends TestDatabaseContext {
  repos: TestRepositories;
  cache: SessionCache;
  store: SessionStore;
  content: ContentService;
}

// ============================================================================
// Database Setup Functions
// ============================================================================

/**
 * Creates a fresh in-memory SQLite database with the schema applied.
 *
 * @example
 * ```typescript
 * const { db, sqlite } = createTestDatabase();
 * // Use db for test operations
 * sqlite.close(); // Cleanup when done
 * ```
 */
export function createTestDatabase(): TestDatabaseContext {
  return openDatabase(':memory:');
}

export function createTestRepositories(db: AppDatabase): TestRepositories {
  return {
    contentRepo: new ContentChunkRepository(db),
    sessionRepo: new RevisionSessionRepository(db),
    turnRepo: new RevisionTurnRepository(db),
  };
}

/**
 * Creates a database, its repositories, and the store and façade built on
 * them.
 */
export function createTestContext(): TestContext {
  const { db, sqlite } = createTestDatabase();
  const repos = createTestRepositories(db);
  const cache = new SessionCache({ ttlMs: 60_000, maxEntries: 100 });
  const store = new SessionStore({
    sessionRepo: repos.sessionRepo,
    turnRepo: repos.turnRepo,
    cache,
  });

  return {
    db,
    sqlite,
    repos,
    cache,
    store,
    content: new ContentService(repos.contentRepo),
  };
}

/**
 * Builds an engine over a test context.
 */
export function createTestEngine(
  context: TestContext,
  generator: TextGenerator,
  options: { now?: () => Date; config?: Partial<RevisionEngineConfig> } = {}
): RevisionEngine {
  return new RevisionEngine(
    {
      store: context.store,
      content: context.content,
      generator,
      now: options.now,
    },
    {
      defaultTopicConfig: { maxConversations: 25, completionThreshold: 15 },
      temperature: 0.7,
      maxTokens: 512,
      ...options.config,
    }
  );
}

/**
 * Cleans up a test database context.
 */
export function cleanupTestDatabase(context: TestDatabaseContext): void {
  if (context.sqlite.open) {
    context.sqlite.close();
  }
}
