/**
 * Centralized Configuration Module
 *
 * This module provides a type-safe, validated configuration system for the
 * Revision Tutor. It loads configuration from environment variables and
 * validates that required values are present in production.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.database.url);
 *   console.log(config.session.defaultCompletionThreshold);
 *
 *   // Validate configuration (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const nodeEnvSchema = z.enum(['development', 'production', 'test']);

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  server: z.object({
    nodeEnv: nodeEnvSchema.default('development'),
  }),

  // SQLite file holding the content corpus, session snapshots and turn log
  database: z.object({
    url: z.string().min(1).default('./revision-tutor.db'),
  }),

  // Anthropic API configuration
  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(1024),
    temperature: z.number().min(0).max(1).default(0.7),
  }),

  // Revision session tuning
  session: z.object({
    // Zero or a negative value disables the turn cap
    defaultMaxConversations: z.number().int().default(25),
    defaultCompletionThreshold: z.number().int().positive().default(15),
    cacheTtlMs: z.number().int().positive().default(2 * 60 * 60 * 1000),
    cacheMaxEntries: z.number().int().positive().default(500),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 * Returns undefined if the value is not a valid number.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables.
 * Unset or unparseable values are left undefined so the schema defaults apply.
 */
function loadFromEnvironment(): z.input<typeof configSchema> {
  const nodeEnv = nodeEnvSchema.safeParse(process.env.NODE_ENV);

  return {
    server: {
      nodeEnv: nodeEnv.success ? nodeEnv.data : undefined,
    },
    database: {
      url: process.env.DATABASE_URL || undefined,
    },
    anthropic: {
      apiKey: process.env.ANTHROPIC_API_KEY,
      model: process.env.ANTHROPIC_MODEL || undefined,
      maxTokens: parseIntOrUndefined(process.env.ANTHROPIC_MAX_TOKENS),
      temperature: parseFloatOrUndefined(process.env.ANTHROPIC_TEMPERATURE),
    },
    session: {
      defaultMaxConversations: parseIntOrUndefined(process.env.MAX_CONVERSATIONS_PER_SESSION),
      defaultCompletionThreshold: parseIntOrUndefined(process.env.TOPIC_COMPLETION_THRESHOLD),
      cacheTtlMs: parseIntOrUndefined(process.env.SESSION_CACHE_TTL_MS),
      cacheMaxEntries: parseIntOrUndefined(process.env.SESSION_CACHE_MAX_ENTRIES),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];

  constructor(message: string, missingVars: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
  }
}

/**
 * Validates the configuration and throws for production requirements.
 *
 * In production mode ANTHROPIC_API_KEY is required; in development and test
 * the text generator can be injected instead.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(current: Config = config): void {
  if (current.server.nodeEnv !== 'production') {
    return;
  }

  const missingVars: string[] = [];
  if (!current.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (missingVars.length > 0) {
    throw new ConfigValidationError(
      `Missing required environment variables: ${missingVars.join(', ')}`,
      missingVars
    );
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * Parse and validate the configuration against the schema.
 * This runs once at module load time.
 */
const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('[config] Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = parseResult.data;

/**
 * Returns the configured Anthropic API key, or undefined when unset.
 */
export function getAnthropicApiKey(): string | undefined {
  return config.anthropic.apiKey;
}

/**
 * Returns the path of the SQLite database file.
 */
export function getDatabaseURL(): string {
  return config.database.url;
}

export default config;
