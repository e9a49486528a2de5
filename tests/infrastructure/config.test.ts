import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_DATABASE_URL } from '../../src/config/env.js';

describe('loadConfig', () => {
  it('falls back to local development defaults', () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: 'info',
      HOST: '0.0.0.0',
      PORT: 3000,
      DATABASE_URL: DEFAULT_DATABASE_URL,
      REDIS_URL: 'redis://localhost:6379',
      WORKER_ID: 'worker-1',
      LOOKBACK_DAYS: 90,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '8080', LOOKBACK_DAYS: '30' });
    expect(config.PORT).toBe(8080);
    expect(config.LOOKBACK_DAYS).toBe(30);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
