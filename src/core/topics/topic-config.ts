/**
 * Topic Configuration Resolver
 *
 * Maps a free-text topic name to the session limits used for it. Lookup
 * runs exact match, then substring match in either direction in table
 * order, then the process-wide defaults. Unknown topics are not an error.
 */

import { config } from '../../config';

export interface TopicConfig {
  /** Turn cap for a session on this topic */
  maxConversations: number;
  /** Turn count at which a progress check completes the session */
  completionThreshold: number;
}

/**
 * Per-topic limits. Order matters: it breaks ties between substring matches.
 */
export const TOPIC_CONFIGS: ReadonlyArray<readonly [string, TopicConfig]> = [
  ['photosynthesis', { maxConversations: 30, completionThreshold: 20 }],
  ['crop production', { maxConversations: 20, completionThreshold: 12 }],
  ['microorganisms', { maxConversations: 28, completionThreshold: 18 }],
  ['cell structure', { maxConversations: 24, completionThreshold: 16 }],
  ['force and pressure', { maxConversations: 22, completionThreshold: 14 }],
];

/**
 * Limits for topics missing from the table, taken from configuration.
 */
export function defaultTopicConfig(): TopicConfig {
  return {
    maxConversations: config.session.defaultMaxConversations,
    completionThreshold: config.session.defaultCompletionThreshold,
  };
}

/**
 * Resolves the limits for a topic.
 *
 * @example
 * ```typescript
 * resolveTopicConfig('Photosynthesis ');
 * // { maxConversations: 30, completionThreshold: 20 }
 *
 * resolveTopicConfig('photosynthesis in desert plants');
 * // matches 'photosynthesis' by substring
 * ```
 *
 * @param defaults - Fallback for unmatched topics; defaults to configuration
 */
export function resolveTopicConfig(
  topic: string,
  defaults: TopicConfig = defaultTopicConfig()
): TopicConfig {
  const normalized = topic.trim().toLowerCase();

  // An empty name would be a substring of every key
  if (normalized.length === 0) {
    return { ...defaults };
  }

  const exact = TOPIC_CONFIGS.find(([key]) => key === normalized);
  if (exact) {
    return { ...exact[1] };
  }

  const partial = TOPIC_CONFIGS.find(
    ([key]) => normalized.includes(key) || key.includes(normalized)
  );
  if (partial) {
    return { ...partial[1] };
  }

  return { ...defaults };
}
