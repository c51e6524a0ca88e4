/**
 * Content Module
 *
 * Fail-open read access to topic material.
 *
 * @example
 * ```typescript
 * import { ContentService } from '@/core/content';
 * import type { ContentStore } from '@/core/content';
 * ```
 */

export { ContentService, describeTopic } from './content-service';
export type { ContentStore, TopicChunkCount } from './types';
