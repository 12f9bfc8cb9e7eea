import { describe, expect, it } from 'vitest';
import { loadEnv, loadRecommenderSettings, parseBoolean } from './index.js';

describe('loadEnv', () => {
  it('applies defaults to an empty environment', () => {
    const env = loadEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.API_PORT).toBe(3000);
    expect(env.DATA_DIR).toBe('./data');
    expect(env.CONTENT_TOP_K).toBe(5);
  });

  it('coerces numeric settings', () => {
    const env = loadEnv({ API_PORT: '8080', DISTRICT_TOP_N: '10' });

    expect(env.API_PORT).toBe(8080);
    expect(env.DISTRICT_TOP_N).toBe(10);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'trace' })).toThrow();
  });

  it('rejects a zero top-K', () => {
    expect(() => loadEnv({ CONTENT_TOP_K: '0' })).toThrow();
  });
});

describe('loadRecommenderSettings', () => {
  it('maps the environment onto engine options', () => {
    const settings = loadRecommenderSettings(
      loadEnv({ DATA_DIR: '/srv/data', CONTENT_HISTORY_ANCHORS: 'yes', CONTENT_HISTORY_BUDGET: '7' })
    );

    expect(settings).toEqual({
      dataDir: '/srv/data',
      districtTopN: 5,
      demographicTopN: 5,
      contentTopK: 5,
      historyAnchors: { enabled: true, budget: 7, selectedShare: 3 }
    });
  });

  it('parses boolean flags', () => {
    expect(parseBoolean('ON')).toBe(true);
    expect(parseBoolean('0')).toBe(false);
    expect(parseBoolean(undefined, true)).toBe(true);
  });
});
