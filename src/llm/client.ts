/**
 * Anthropic Client Wrapper
 *
 * Implements TextGenerator over the Anthropic SDK. It handles:
 * - API key configuration with clear error messages
 * - Per-call system instructions
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient();
 * const response = await client.complete('Explain osmosis briefly.', {
 *   system: REVISION_SYSTEM_PROMPT,
 * });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import { config as appConfig, getAnthropicApiKey } from '../config';
import {
  LLMError,
  type CompletionOptions,
  type LLMConfig,
  type LLMErrorType,
  type LLMMessage,
  type LLMResponse,
  type TextGenerator,
} from './types';

/**
 * Constructor options. Anything omitted comes from configuration.
 */
export interface AnthropicClientOptions extends LLMConfig {
  apiKey?: string;
}

/**
 * Maps an Anthropic API error to our simplified error type.
 */
function mapErrorType(error: APIError): LLMErrorType {
  if (error instanceof AuthenticationError) {
    return 'authentication';
  }
  if (error instanceof RateLimitError) {
    return 'rate_limit';
  }
  if (error instanceof BadRequestError) {
    return 'invalid_request';
  }
  if (error instanceof InternalServerError) {
    return 'server_error';
  }
  return 'unknown';
}

/**
 * Converts anything thrown by the SDK to a typed LLMError.
 */
export function toLLMError(error: unknown): LLMError {
  if (error instanceof LLMError) {
    return error;
  }

  // Timeout extends the connection error, so it is checked first
  if (error instanceof APIConnectionTimeoutError) {
    return new LLMError('Request to Anthropic API timed out. Please try again.', 'timeout', error);
  }

  if (error instanceof APIConnectionError) {
    return new LLMError(
      'Failed to connect to Anthropic API. Please check your network connection.',
      'network',
      error
    );
  }

  if (error instanceof APIError) {
    return new LLMError(error.message, mapErrorType(error), error);
  }

  const message = error instanceof Error ? error.message : 'Unknown error occurred';
  return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
}

/**
 * TextGenerator backed by the Anthropic Messages API.
 */
export class AnthropicClient implements TextGenerator {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: Required<LLMConfig>;

  /**
   * @throws LLMError if no API key is given or configured
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({ temperature: 0.5 });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? getAnthropicApiKey();
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Then set it: export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey });

    this.defaultConfig = {
      model: options.model ?? appConfig.anthropic.model,
      maxTokens: options.maxTokens ?? appConfig.anthropic.maxTokens,
      temperature: options.temperature ?? appConfig.anthropic.temperature,
    };
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - A single user prompt, or a full message array
   * @throws LLMError on API errors
   */
  async complete(
    messages: string | LLMMessage[],
    options: CompletionOptions = {}
  ): Promise<LLMResponse> {
    const messageArray: LLMMessage[] =
      typeof messages === 'string' ? [{ role: 'user', content: messages }] : messages;

    try {
      const response = await this.client.messages.create({
        model: options.model ?? this.defaultConfig.model,
        max_tokens: options.maxTokens ?? this.defaultConfig.maxTokens,
        temperature: options.temperature ?? this.defaultConfig.temperature,
        system: options.system,
        messages: messageArray.map((msg) => ({ role: msg.role, content: msg.content })),
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw toLLMError(error);
    }
  }

  /**
   * Concatenates the text blocks of a response.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }
}
