/**
 * Revision Tutor - Entry Point
 *
 * Builds a ready-to-use RevisionEngine from configuration: opens the SQLite
 * database, wires the repositories, content façade, session store and text
 * generator, and returns the engine with a close() for the connection.
 *
 * @example
 * ```typescript
 * import { createRevisionTutor } from 'revision-tutor';
 *
 * const { engine, close } = createRevisionTutor();
 * const opening = await engine.startSession({
 *   topic: 'photosynthesis',
 *   studentId: 'student_42',
 *   sessionId: 'sess_001',
 * });
 * close();
 * ```
 */

import { config, getDatabaseURL, validateConfig } from './config';
import { openDatabase } from './storage/db';
import {
  ContentChunkRepository,
  RevisionSessionRepository,
  RevisionTurnRepository,
} from './storage/repositories';
import { ContentService } from './core/content';
import { RevisionEngine, SessionCache, SessionStore } from './core/session';
import type { RevisionEngineConfig } from './core/session';
import { AnthropicClient } from './llm/client';
import type { TextGenerator } from './llm/types';

export interface RevisionTutorOptions {
  /** SQLite file to open; defaults to DATABASE_URL */
  databasePath?: string;
  /** Generator to use instead of the Anthropic client */
  textGenerator?: TextGenerator;
  engineConfig?: Partial<RevisionEngineConfig>;
}

export interface RevisionTutor {
  engine: RevisionEngine;
  /** Closes the database connection */
  close: () => void;
}

/**
 * Creates the engine and everything it depends on.
 *
 * @throws {ConfigValidationError} In production when ANTHROPIC_API_KEY is missing
 */
export function createRevisionTutor(options: RevisionTutorOptions = {}): RevisionTutor {
  validateConfig();

  const { db, sqlite } = openDatabase(options.databasePath ?? getDatabaseURL());

  const store = new SessionStore({
    sessionRepo: new RevisionSessionRepository(db),
    turnRepo: new RevisionTurnRepository(db),
    cache: new SessionCache({
      ttlMs: config.session.cacheTtlMs,
      maxEntries: config.session.cacheMaxEntries,
    }),
  });

  const engine = new RevisionEngine(
    {
      store,
      content: new ContentService(new ContentChunkRepository(db)),
      generator: options.textGenerator ?? new AnthropicClient(),
    },
    options.engineConfig
  );

  return {
    engine,
    close: () => sqlite.close(),
  };
}

export * from './core/models';
export * from './core/session';
export * from './core/topics';
export { ContentService, describeTopic, type ContentStore } from './core/content';
export * from './llm';
export { config, validateConfig, ConfigValidationError } from './config';
