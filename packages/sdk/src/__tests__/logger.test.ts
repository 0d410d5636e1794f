/**
 * Logger unit tests
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should take its level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(createLogger().level).toBe('debug');
  });

  it('should default to info', () => {
    const saved = process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL;
    try {
      expect(createLogger().level).toBe('info');
    } finally {
      if (saved !== undefined) {
        process.env.LOG_LEVEL = saved;
      }
    }
  });

  it('should let options override the environment', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(createLogger({ level: 'silent' }).level).toBe('silent');
  });
});
