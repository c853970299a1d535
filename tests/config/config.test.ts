import { describe, it, expect, beforeEach } from 'vitest';
import { ArenaConfigSchema, ConfigLoader, ConfigValidationError } from '../../src/config/index.js';

describe('ArenaConfigSchema', () => {
  it('should fill every section with defaults', () => {
    const config = ArenaConfigSchema.parse({});

    expect(config.env).toBe('development');
    expect(config.database).toEqual({ filename: './data/arena.db', busyTimeout: 5000, journalMode: 'wal' });
    expect(config.observability.logging).toEqual({ level: 'info', prettyPrint: false, redactPaths: [] });
    expect(config.reputation).toEqual({
      minUsageForReview: 5,
      burst: { reviewCount: 3, windowMs: 60_000, dampingFactor: 0.1 },
    });
    expect(config.ranking).toEqual({ gravity: 1.8, refreshIntervalMs: 300_000, autoRefresh: false });
    expect(config.feed).toEqual({ defaultLimit: 50, maxLimit: 100 });
    expect(config.storage).toEqual({ maxAttempts: 3, retryDelayMs: 25 });
  });

  it('should keep nested defaults when a section is partial', () => {
    const config = ArenaConfigSchema.parse({ reputation: { burst: { windowMs: 30_000 } } });

    expect(config.reputation.minUsageForReview).toBe(5);
    expect(config.reputation.burst).toEqual({ reviewCount: 3, windowMs: 30_000, dampingFactor: 0.1 });
  });

  it('should reject out-of-range values', () => {
    expect(ArenaConfigSchema.safeParse({ ranking: { gravity: 0 } }).success).toBe(false);
    expect(ArenaConfigSchema.safeParse({ reputation: { burst: { dampingFactor: 1.5 } } }).success).toBe(false);
    expect(ArenaConfigSchema.safeParse({ storage: { maxAttempts: 0 } }).success).toBe(false);
    expect(ArenaConfigSchema.safeParse({ feed: { defaultLimit: 200, maxLimit: 100 } }).success).toBe(false);
  });
});

describe('ConfigLoader', () => {
  beforeEach(() => {
    ConfigLoader.reset();
  });

  describe('load', () => {
    it('should validate and keep the loaded configuration', () => {
      const config = ConfigLoader.load({ env: 'test', ranking: { gravity: 2 } });

      expect(config.ranking.gravity).toBe(2);
      expect(ConfigLoader.get()).toBe(config);
    });

    it('should report every invalid path', () => {
      const error = (() => {
        try {
          ConfigLoader.load({ ranking: { gravity: -1 }, storage: { maxAttempts: 20 } });
          return null;
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map(e => e.path)).toEqual(['ranking.gravity', 'storage.maxAttempts']);
        expect(error.message).toMatch(/^Configuration validation failed: ranking\.gravity: /);
      }
    });

    it('should refuse an in-memory database in production', () => {
      expect(() => ConfigLoader.load({ env: 'production', database: { filename: ':memory:' } })).toThrow(
        'database.filename: In-memory database is not allowed in production'
      );
    });

    it('should refuse pretty printing in production', () => {
      expect(() =>
        ConfigLoader.load({ env: 'production', observability: { logging: { prettyPrint: true } } })
      ).toThrow(ConfigValidationError);
    });

    it('should throw from get before anything is loaded', () => {
      expect(() => ConfigLoader.get()).toThrow('Configuration not loaded. Call ConfigLoader.load() first.');
    });
  });

  describe('fromEnv', () => {
    it('should read arena variables', () => {
      const config = ConfigLoader.fromEnv({
        NODE_ENV: 'test',
        ARENA_DB_PATH: '/tmp/arena-test.db',
        LOG_LEVEL: 'warn',
        ARENA_HOT_REFRESH_MS: '60000',
        ARENA_MIN_REVIEW_USAGE: '10',
      });

      expect(config.env).toBe('test');
      expect(config.database.filename).toBe('/tmp/arena-test.db');
      expect(config.observability.logging.level).toBe('warn');
      expect(config.ranking.refreshIntervalMs).toBe(60_000);
      expect(config.reputation.minUsageForReview).toBe(10);
    });

    it('should layer variables over overrides', () => {
      const config = ConfigLoader.fromEnv(
        { LOG_LEVEL: 'error' },
        { env: 'test', observability: { logging: { prettyPrint: true, level: 'debug' } }, ranking: { gravity: 3 } }
      );

      expect(config.env).toBe('test');
      expect(config.observability.logging).toEqual({ level: 'error', prettyPrint: true, redactPaths: [] });
      expect(config.ranking.gravity).toBe(3);
    });

    it('should reject malformed variables', () => {
      expect(() => ConfigLoader.fromEnv({ ARENA_HOT_REFRESH_MS: 'soon' })).toThrow(ConfigValidationError);
      expect(() => ConfigLoader.fromEnv({ LOG_LEVEL: 'loud' })).toThrow(ConfigValidationError);
    });
  });
});

describe('ConfigValidationError', () => {
  it('should accept plain messages', () => {
    const error = new ConfigValidationError(['first problem', 'second problem']);

    expect(error.errors).toEqual([
      { path: '', message: 'first problem' },
      { path: '', message: 'second problem' },
    ]);
    expect(error.message).toBe('Configuration validation failed: first problem, second problem');
    expect(error.name).toBe('ConfigValidationError');
  });
});
