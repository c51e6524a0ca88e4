/**
 * LLM Types and Interfaces
 *
 * This file defines the TypeScript types for text generation. The session
 * flow depends only on the TextGenerator interface, so the Anthropic client
 * can be swapped for a scripted generator in tests.
 */

/**
 * Represents a single message in a conversation.
 */
export interface LLMMessage {
  /** The role of who sent this message */
  role: 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Configuration options for LLM API calls.
 * All fields are optional and fall back to the client defaults.
 */
export interface LLMConfig {
  /** The model to use for completions */
  model?: string;

  /** Maximum number of tokens to generate in the response */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Lower values = more deterministic, higher = more creative.
   */
  temperature?: number;
}

/**
 * Per-call options: the model settings plus the system instruction sent
 * with this request.
 */
export interface CompletionOptions extends LLMConfig {
  system?: string;
}

/**
 * Result of a complete (non-streaming) API call.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /**
   * Token usage information for billing/tracking.
   * Null if usage data is not available.
   */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating, as reported by the provider */
  stopReason: string | null;
}

/**
 * Anything that turns a prompt into text. Implementations may reject;
 * callers decide how a failed generation degrades.
 */
export interface TextGenerator {
  complete(messages: string | LLMMessage[], options?: CompletionOptions): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 * These help distinguish between different failure modes.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Provider server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 * Includes the error type for easier handling.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  type: LLMErrorType;
  /** The original error that was caught, if any */
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
