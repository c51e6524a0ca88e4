/**
 * LLM Module - Barrel Export
 *
 * Text generation for the revision tutor:
 * - TextGenerator: the interface the session flow depends on
 * - AnthropicClient: its implementation over the Anthropic SDK
 * - Typed errors and the revision prompt builders
 *
 * @example
 * ```typescript
 * import { AnthropicClient, REVISION_SYSTEM_PROMPT, buildKickoffPrompt } from './llm';
 *
 * const client = new AnthropicClient();
 * const { text } = await client.complete(buildKickoffPrompt('nutrition', opening), {
 *   system: REVISION_SYSTEM_PROMPT,
 * });
 * ```
 */

export { AnthropicClient, toLLMError, type AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  CompletionOptions,
  LLMResponse,
  LLMErrorType,
  TextGenerator,
} from './types';

// Value export: callers use instanceof
export { LLMError } from './types';

export * from './prompts';
