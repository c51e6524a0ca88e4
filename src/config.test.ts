import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// config.ts parses the environment at import time, so each case re-imports it
async function loadConfig() {
  vi.resetModules();
  return import('./config');
}

describe('config', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('applies session defaults', async () => {
    vi.stubEnv('MAX_CONVERSATIONS_PER_SESSION', '');
    vi.stubEnv('TOPIC_COMPLETION_THRESHOLD', '');

    const { config } = await loadConfig();

    expect(config.session.defaultMaxConversations).toBe(25);
    expect(config.session.defaultCompletionThreshold).toBe(15);
  });

  it.each([
    ['0', 0],
    ['-1', -1],
  ])('accepts a turn cap of %s to mean no cap', async (raw, expected) => {
    vi.stubEnv('MAX_CONVERSATIONS_PER_SESSION', raw);

    const { config } = await loadConfig();

    expect(config.session.defaultMaxConversations).toBe(expected);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('exits on a completion threshold of zero', async () => {
    vi.stubEnv('TOPIC_COMPLETION_THRESHOLD', '0');

    await expect(loadConfig()).rejects.toThrow('process.exit(1)');
  });
});
