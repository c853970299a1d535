import { describe, it, expect, afterEach } from 'vitest';
import {
  ARENA_EVENTS,
  ArenaManager,
  createArenaManager,
  type HotScoreRefreshResult,
} from '../../src/arena/index.js';
import { ConfigValidationError } from '../../src/config/schema.js';
import { getLogger, initLogger } from '../../src/observability/logger.js';
import { createTestArena, publish, registerAgents, START } from './helpers.js';

describe('ArenaManager', () => {
  const open: ArenaManager[] = [];

  afterEach(async () => {
    for (const arena of open.splice(0)) {
      await arena.close();
    }
    initLogger({ level: 'silent' });
  });

  it('should apply configuration defaults', async () => {
    const { arena } = await createTestArena();
    open.push(arena);

    expect(arena.config.env).toBe('test');
    expect(arena.config.reputation.minUsageForReview).toBe(5);
    expect(arena.config.ranking.gravity).toBe(1.8);
    expect(arena.config.feed).toEqual({ defaultLimit: 50, maxLimit: 100 });
  });

  it('should reject invalid configuration', () => {
    expect(() => new ArenaManager({ config: { ranking: { gravity: -1 } } })).toThrow(ConfigValidationError);
  });

  it('should emit events after successful mutations', async () => {
    const { arena } = await createTestArena();
    open.push(arena);
    const events: Array<[string, unknown]> = [];
    for (const name of Object.values(ARENA_EVENTS)) {
      arena.on(name, (payload: unknown) => events.push([name, payload]));
    }

    await registerAgents(arena, 'author', 'alice');
    const skillId = await publish(arena, 'did:arena:author', 'echo');
    await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');
    await arena.vote('skill', skillId, 'did:arena:ghost', 'upvote');
    await arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 5, totalTime: 50 });
    await arena.submitReview(skillId, 'did:arena:alice', 75);
    await arena.addComment(skillId, 'did:arena:alice', 'Handy');
    await arena.recordDownload(skillId, 'did:arena:alice');
    await arena.refreshHotScores();

    expect(events.map(([name]) => name)).toEqual([
      'skill:published',
      'vote',
      'usage',
      'review',
      'comment',
      'download',
      'hot-scores:refreshed',
    ]);
    expect(events[1]?.[1]).toMatchObject({ targetType: 'skill', targetId: skillId, outcome: 'voted', upvotes: 1 });
    expect(events[3]?.[1]).toMatchObject({ skillId, skillRating: 75, weight: 1 });
    expect(events[5]?.[1]).toMatchObject({ skillId, reason: 'public', downloadsCount: 1 });
  });

  it('should create and initialize through the factory', async () => {
    const arena = await createArenaManager({ env: 'test', database: { filename: ':memory:' } });
    open.push(arena);

    const feed = await arena.composeFeed('new');
    expect(feed.items).toEqual([]);
    expect(feed.total).toBe(0);
  });

  it('should tolerate repeated initialization', async () => {
    const { arena } = await createTestArena();
    open.push(arena);

    await arena.initialize();
    await registerAgents(arena, 'alice');
    expect((await arena.registerAgent({ did: 'did:arena:alice', username: 'alice' })).createdAt).toBe(START);
  });

  it('should apply logging configuration on request', async () => {
    const arena = new ArenaManager({
      config: { env: 'test', database: { filename: ':memory:' }, observability: { logging: { level: 'error' } } },
      configureLogging: true,
    });
    await arena.initialize();
    open.push(arena);

    expect(getLogger().level).toBe('error');
  });

  it('should leave the process logger alone by default', async () => {
    const { arena } = await createTestArena({ observability: { logging: { level: 'debug' } } });
    open.push(arena);

    expect(getLogger().level).toBe('silent');
  });

  it('should refresh hot scores on a schedule when enabled', async () => {
    const { arena } = await createTestArena({ ranking: { autoRefresh: true, refreshIntervalMs: 1000 } });
    open.push(arena);

    const refreshed = await new Promise<HotScoreRefreshResult>(resolve => {
      arena.once(ARENA_EVENTS.HOT_SCORES_REFRESHED, resolve);
    });

    expect(refreshed.updatedCount).toBe(0);
    expect(arena.getRefresherStats().runs).toBe(1);

    await arena.stopHotScoreRefresh();
  });
});
