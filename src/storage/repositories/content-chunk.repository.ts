/**
 * Content Chunk Repository Implementation
 *
 * Data access for the topic corpus. Implements the ContentStore contract the
 * content façade consumes: topic listing with counts, ordered retrieval by
 * topic, ranked full-text search (FTS5, bm25 order) and a case-insensitive
 * substring search used as the fallback.
 *
 * Errors are not caught here. The façade decides how faults degrade.
 */

import { asc, count, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { contentChunks } from '../schema';
import type { ContentChunk } from '@/core/models';
import type { ContentStore, TopicChunkCount } from '@/core/content/types';

/**
 * Input for adding chunks to the corpus.
 */
export interface CreateContentChunkInput {
  chunkId: string;
  topic: string;
  text: string;
}

/**
 * Maps a database row to a ContentChunk domain model.
 */
function mapToDomain(row: { chunkId: string; topic: string; text: string }): ContentChunk {
  return {
    chunkId: row.chunkId,
    topic: row.topic,
    text: row.text,
  };
}

/**
 * Turns free text into an FTS5 query that cannot be a syntax error:
 * each word becomes a quoted term and the terms are OR-ed together.
 * Words shorter than three characters are dropped.
 *
 * @returns The MATCH expression, or null when no usable terms remain
 */
export function toFtsQuery(query: string): string | null {
  const terms = query.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  const unique = [...new Set(terms.filter((term) => term.length >= 3))];

  if (unique.length === 0) {
    return null;
  }

  return unique.map((term) => `"${term}"`).join(' OR ');
}

/**
 * Escapes LIKE wildcards so the query is matched literally.
 */
function toLikePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

/**
 * Repository for the content corpus.
 *
 * @example
 * ```typescript
 * const repo = new ContentChunkRepository(db);
 *
 * await repo.createMany([
 *   { chunkId: 'photo_001', topic: 'photosynthesis', text: 'Plants make food...' },
 * ]);
 *
 * const chunks = await repo.findByTopic('photosynthesis', 3);
 * const hits = await repo.rankedSearch('photosynthesis', 'chlorophyll', 3);
 * ```
 */
export class ContentChunkRepository implements ContentStore {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Lists distinct topics with their chunk counts, alphabetically.
   */
  async findTopics(): Promise<TopicChunkCount[]> {
    return await this.db
      .select({ topic: contentChunks.topic, chunkCount: count() })
      .from(contentChunks)
      .groupBy(contentChunks.topic)
      .orderBy(asc(contentChunks.topic));
  }

  /**
   * Returns a topic's chunks in delivery order.
   *
   * @param limit - Maximum number of chunks; omit for all of them
   */
  async findByTopic(topic: string, limit?: number): Promise<ContentChunk[]> {
    const query = this.db
      .select({
        chunkId: contentChunks.chunkId,
        topic: contentChunks.topic,
        text: contentChunks.text,
      })
      .from(contentChunks)
      .where(eq(contentChunks.topic, topic))
      .orderBy(asc(contentChunks.seq));

    const rows = limit === undefined ? await query : await query.limit(limit);
    return rows.map(mapToDomain);
  }

  /**
   * Full-text search within one topic, best match first.
   */
  async rankedSearch(topic: string, query: string, limit: number): Promise<ContentChunk[]> {
    const match = toFtsQuery(query);
    if (match === null) {
      return [];
    }

    const rows = await this.db.all<{ chunkId: string; topic: string; text: string }>(sql`
      SELECT c.chunk_id AS chunkId, c.topic AS topic, c.text AS text
      FROM content_chunks_fts
      JOIN content_chunks c ON c.seq = content_chunks_fts.rowid
      WHERE content_chunks_fts MATCH ${match} AND c.topic = ${topic}
      ORDER BY bm25(content_chunks_fts)
      LIMIT ${limit}
    `);

    return rows.map(mapToDomain);
  }

  /**
   * Case-insensitive substring search within one topic, in delivery order.
   */
  async substringSearch(topic: string, query: string, limit: number): Promise<ContentChunk[]> {
    const pattern = toLikePattern(query);

    const rows = await this.db
      .select({
        chunkId: contentChunks.chunkId,
        topic: contentChunks.topic,
        text: contentChunks.text,
      })
      .from(contentChunks)
      .where(sql`${contentChunks.topic} = ${topic} AND ${contentChunks.text} LIKE ${pattern} ESCAPE '\\'`)
      .orderBy(asc(contentChunks.seq))
      .limit(limit);

    return rows.map(mapToDomain);
  }

  /**
   * Adds chunks in one transaction. Chunks whose id already exists are
   * left untouched, so seeding can be re-run.
   *
   * @returns Number of chunks actually inserted
   */
  async createMany(inputs: CreateContentChunkInput[]): Promise<number> {
    if (inputs.length === 0) return 0;

    const inserted = this.db.transaction((tx) =>
      tx
        .insert(contentChunks)
        .values(inputs)
        .onConflictDoNothing({ target: contentChunks.chunkId })
        .returning({ chunkId: contentChunks.chunkId })
        .all()
    );

    return inserted.length;
  }
}
