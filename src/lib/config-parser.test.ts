/**
 * Config Parser Unit Tests
 */
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, clearConfigCache, getConfig, getConfigStatus, parseConfig } from './config-parser';

describe('Config Parser', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    clearConfigCache();
  });

  afterEach(() => {
    process.env = originalEnv;
    clearConfigCache();
  });

  // ============================================================================
  // 1. Defaults
  // ============================================================================
  describe('parseConfig', () => {
    it('falls back to defaults for an empty environment', () => {
      expect(parseConfig({})).toEqual({
        port: 8080,
        apiKey: null,
        database: {
          inMemory: true,
          path: './metrics_usage.json',
          flushPeriodMs: 300_000,
          threshold: 3,
          pendingUsageThreshold: 0,
        },
        expressionEngine: 'promql',
        remote: null,
      });
    });

    it('treats empty strings as unset', () => {
      const config = parseConfig({ PORT: '', METRICS_USAGE_API_KEY: '', METRICS_USAGE_DATABASE_IN_MEMORY: '' });

      expect(config.port).toBe(8080);
      expect(config.apiKey).toBeNull();
      expect(config.database.inMemory).toBe(true);
    });

    // ============================================================================
    // 2. Overrides
    // ============================================================================
    it('reads every supported variable', () => {
      const config = parseConfig({
        PORT: '9000',
        METRICS_USAGE_API_KEY: 'test-secret',
        METRICS_USAGE_DATABASE_IN_MEMORY: 'false',
        METRICS_USAGE_DATABASE_PATH: '/data/usage.json',
        METRICS_USAGE_DATABASE_FLUSH_PERIOD_SECONDS: '60',
        METRICS_USAGE_DATABASE_THRESHOLD: '5',
        METRICS_USAGE_DATABASE_PENDING_USAGE_THRESHOLD: '10',
        METRICS_USAGE_EXPRESSION_ENGINE: 'metricsql',
        METRICS_USAGE_REMOTE_URL: 'http://central:8080',
        METRICS_USAGE_REMOTE_API_KEY: 'remote-secret',
        METRICS_USAGE_REMOTE_TIMEOUT_MS: '2500',
      });

      expect(config).toEqual({
        port: 9000,
        apiKey: 'test-secret',
        database: {
          inMemory: false,
          path: '/data/usage.json',
          flushPeriodMs: 60_000,
          threshold: 5,
          pendingUsageThreshold: 10,
        },
        expressionEngine: 'metricsql',
        remote: { url: 'http://central:8080', apiKey: 'remote-secret', timeoutMs: 2500 },
      });
    });

    // ============================================================================
    // 3. Validation
    // ============================================================================
    it('lists every invalid variable', () => {
      let caught: unknown;
      try {
        parseConfig({
          METRICS_USAGE_DATABASE_THRESHOLD: '0',
          METRICS_USAGE_EXPRESSION_ENGINE: 'sql',
          METRICS_USAGE_DATABASE_IN_MEMORY: 'maybe',
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (!(caught instanceof ConfigError)) return;
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
        'METRICS_USAGE_DATABASE_IN_MEMORY',
        'METRICS_USAGE_DATABASE_THRESHOLD',
        'METRICS_USAGE_EXPRESSION_ENGINE',
      ]);
    });

    it('rejects a threshold above 255', () => {
      expect(() => parseConfig({ METRICS_USAGE_DATABASE_THRESHOLD: '256' })).toThrow(ConfigError);
    });
  });

  // ============================================================================
  // 4. Cache
  // ============================================================================
  describe('getConfig', () => {
    it('caches the parsed environment until cleared', () => {
      process.env.PORT = '9100';
      expect(getConfig().port).toBe(9100);

      process.env.PORT = '9200';
      expect(getConfig().port).toBe(9100);

      clearConfigCache();
      expect(getConfig().port).toBe(9200);
    });

    it('reports secrets as set or unset only', () => {
      process.env.METRICS_USAGE_API_KEY = 'test-secret';
      delete process.env.METRICS_USAGE_REMOTE_URL;
      delete process.env.METRICS_USAGE_DATABASE_IN_MEMORY;

      expect(getConfigStatus()).toMatchObject({ apiKey: true, persistence: 'memory', remote: 'none' });
    });
  });
});
