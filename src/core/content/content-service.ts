/**
 * Content Access Façade
 *
 * Wraps a ContentStore for the session flow. Every operation is fail-open:
 * a store fault is logged and the caller receives an empty result, so a
 * tutoring turn never fails because content could not be read. Handlers
 * fall back to generic prompts when they get no content.
 */

import type { ContentChunk, TopicSummary } from '../models';
import type { ContentStore } from './types';

/**
 * Description attached to every listed topic.
 */
export function describeTopic(chunkCount: number): string {
  return `Study material with ${chunkCount} content sections`;
}

/**
 * Read access to topic material with a fail-open error policy.
 *
 * @example
 * ```typescript
 * const content = new ContentService(new ContentChunkRepository(db));
 *
 * const opening = await content.getChunks('photosynthesis', 3);
 * const hits = await content.search('photosynthesis', 'what is chlorophyll?', 3);
 * ```
 */
export class ContentService {
  constructor(private readonly store: ContentStore) {}

  /**
   * Lists every topic with its chunk count and a short description.
   */
  async listTopics(): Promise<TopicSummary[]> {
    return this.failOpen('listTopics', async () => {
      const topics = await this.store.findTopics();
      return topics.map(({ topic, chunkCount }) => ({
        topic,
        chunkCount,
        description: describeTopic(chunkCount),
      }));
    });
  }

  /**
   * Returns the first `limit` chunks of a topic in delivery order.
   */
  async getChunks(topic: string, limit: number): Promise<ContentChunk[]> {
    if (limit <= 0) return [];
    return this.failOpen('getChunks', () => this.store.findByTopic(topic, limit));
  }

  /**
   * Returns every chunk of a topic. This ordering is the one the recap
   * cursor walks through.
   */
  async getAllChunks(topic: string): Promise<ContentChunk[]> {
    return this.failOpen('getAllChunks', () => this.store.findByTopic(topic));
  }

  /**
   * Ranked search within a topic. When ranking finds nothing, a
   * case-insensitive substring search over the same topic is tried before
   * giving up.
   */
  async search(topic: string, query: string, limit: number): Promise<ContentChunk[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0 || limit <= 0) return [];

    return this.failOpen('search', async () => {
      const ranked = await this.store.rankedSearch(topic, trimmed, limit);
      if (ranked.length > 0) {
        return ranked;
      }
      return this.store.substringSearch(topic, trimmed, limit);
    });
  }

  private async failOpen<T>(operation: string, run: () => Promise<T[]>): Promise<T[]> {
    try {
      return await run();
    } catch (error) {
      console.error(`[ContentService] ${operation} failed, returning no content:`, error);
      return [];
    }
  }
}
