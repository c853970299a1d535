import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  IdentityNotFoundError,
  SkillNotFoundError,
  ValidationError,
  type ArenaManager,
} from '../../src/arena/index.js';
import { createTestArena, publish, registerAgents } from './helpers.js';

describe('UsageService', () => {
  let arena: ArenaManager;
  let skillId: string;

  beforeEach(async () => {
    ({ arena } = await createTestArena());
    await registerAgents(arena, 'author', 'alice', 'bob');
    skillId = await publish(arena, 'did:arena:author', 'summarizer');
  });

  afterEach(async () => {
    await arena.close();
  });

  it('should accumulate usage on the skill', async () => {
    const first = await arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 4, totalTime: 400 });
    const second = await arena.recordUsage(skillId, 'did:arena:bob', { usageCount: 6, totalTime: 1600 });

    expect(first.usageCount).toBe(4);
    expect(first.avgResponseTime).toBe(100);
    expect(second.usageCount).toBe(10);
    expect(second.totalUsageTime).toBe(2000);
    expect(second.avgResponseTime).toBe(200);
    expect(second.usageId).not.toBe(first.usageId);
  });

  it('should accept a zero-count report', async () => {
    const result = await arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 0, totalTime: 0 });

    expect(result.usageCount).toBe(0);
    expect(result.avgResponseTime).toBe(0);
  });

  it('should count usage per agent for the review gate', async () => {
    await arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 4, totalTime: 40 });
    await arena.recordUsage(skillId, 'did:arena:bob', { usageCount: 10, totalTime: 100 });

    const result = await arena.submitReview(skillId, 'did:arena:bob', 80);
    expect(result.usageCount).toBe(10);
    await expect(arena.submitReview(skillId, 'did:arena:alice', 80)).rejects.toThrow('current: 4');
  });

  it('should validate reports', async () => {
    await expect(arena.recordUsage(skillId, 'did:arena:alice', { usageCount: -1, totalTime: 0 })).rejects.toThrow(
      ValidationError
    );
    await expect(arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 1.5, totalTime: 0 })).rejects.toThrow(
      ValidationError
    );
    await expect(
      arena.recordUsage(skillId, 'did:arena:alice', { usageCount: 1, totalTime: 1, successRate: 2 })
    ).rejects.toThrow(ValidationError);
  });

  it('should reject unknown skills and identities', async () => {
    await expect(arena.recordUsage('skill-missing', 'did:arena:alice', { usageCount: 1, totalTime: 1 })).rejects.toThrow(
      SkillNotFoundError
    );
    await expect(arena.recordUsage(skillId, 'did:arena:ghost', { usageCount: 1, totalTime: 1 })).rejects.toThrow(
      IdentityNotFoundError
    );
  });
});
