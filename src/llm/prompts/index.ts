/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders for each stage of a revision session.
 *
 * @example
 * ```typescript
 * import { REVISION_SYSTEM_PROMPT, buildRecapPrompt } from '@/llm/prompts';
 *
 * const prompt = buildRecapPrompt({
 *   topic: 'nutrition',
 *   chunkText: chunk.text,
 *   chunkNumber: 2,
 *   totalChunks: 6,
 *   mode: 'quick_recap',
 * });
 * await generator.complete(prompt, { system: REVISION_SYSTEM_PROMPT });
 * ```
 */

export {
  REVISION_SYSTEM_PROMPT,
  escapePromptContent,
  buildKickoffPrompt,
  buildRecapPrompt,
  buildEngagingQuestionPrompt,
  buildMiniQuizPrompt,
  buildQuizFeedbackPrompt,
  buildProgressPrompt,
  buildConclusionPrompt,
  buildQuestionPrompt,
} from './revision-prompts';
