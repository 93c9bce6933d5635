import { describe, it, expect } from 'vitest';
import { DEFAULT_SYSTEM_DIRECTIVE, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      DATA_DIR: './data/conversations',
      MODEL: 'gpt-4o-mini',
      EMBEDDING_MODEL: 'text-embedding-3-small',
      TEMPERATURE: 0.7,
      SYSTEM_DIRECTIVE: DEFAULT_SYSTEM_DIRECTIVE,
      RECENCY_WINDOW: 4,
      RESPONSE_RESERVE_PCT: 25,
      BUDGET_SAFETY_MARGIN_PCT: 5,
      MESSAGE_TOKEN_OVERHEAD: 4,
      MAX_RETRIES: 3,
      RETRY_BASE_DELAY_MS: 1000,
      RETRY_MAX_DELAY_MS: 10000,
      TITLE_AFTER_EXCHANGES: 2,
      DEBUG: false
    });
    expect(config.MAX_TOKENS).toBeUndefined();
    expect(config.LOG_LEVEL).toBeUndefined();
  });

  it('coerces values read from the environment', () => {
    const config = loadConfig({ RECENCY_WINDOW: '6', MAX_TOKENS: '512', TEMPERATURE: '0', DEBUG: 'true', LOG_LEVEL: 'warn' });

    expect(config.RECENCY_WINDOW).toBe(6);
    expect(config.MAX_TOKENS).toBe(512);
    expect(config.TEMPERATURE).toBe(0);
    expect(config.DEBUG).toBe(true);
    expect(config.LOG_LEVEL).toBe('warn');
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ TEMPERATURE: '5' })).toThrow('Invalid configuration: TEMPERATURE');
    expect(() => loadConfig({ RECENCY_WINDOW: 'many' })).toThrow('Invalid configuration: RECENCY_WINDOW');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Invalid configuration: LOG_LEVEL');
  });
});
