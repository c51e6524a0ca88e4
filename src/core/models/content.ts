/**
 * Content Domain Types
 *
 * Topic material is stored as chunks: short passages with a stable
 * identifier. Chunks are immutable once fetched, and their order within a
 * topic is the order progressive recap walks through them.
 */

/**
 * A retrievable unit of topic material.
 */
export interface ContentChunk {
  /** Stable identifier, reported back to callers as a response source */
  chunkId: string;

  /** Topic the chunk belongs to */
  topic: string;

  /** The passage itself */
  text: string;
}

/**
 * A topic available for revision, with how much material it holds.
 */
export interface TopicSummary {
  topic: string;
  chunkCount: number;
  description: string;
}
