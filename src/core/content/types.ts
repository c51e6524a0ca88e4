/**
 * Content Store Contract
 *
 * The narrow interface the content façade reads topic material through.
 * ContentChunkRepository implements it against SQLite; tests supply
 * in-process fakes. Implementations may throw; the façade owns the
 * degradation policy.
 */

import type { ContentChunk } from '../models';

/**
 * A topic name with the number of chunks stored for it.
 */
export interface TopicChunkCount {
  topic: string;
  chunkCount: number;
}

export interface ContentStore {
  /** Distinct topics with chunk counts */
  findTopics(): Promise<TopicChunkCount[]>;

  /** A topic's chunks in delivery order, optionally truncated */
  findByTopic(topic: string, limit?: number): Promise<ContentChunk[]>;

  /** Ranked text search within a topic, best match first */
  rankedSearch(topic: string, query: string, limit: number): Promise<ContentChunk[]>;

  /** Case-insensitive substring search within a topic */
  substringSearch(topic: string, query: string, limit: number): Promise<ContentChunk[]>;
}
