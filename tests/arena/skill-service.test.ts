import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  IdentityNotFoundError,
  ValidationError,
  VersionConflictError,
  type ArenaManager,
} from '../../src/arena/index.js';
import { buildSkillId, computeContentHash } from '../../src/arena/services/skill-service.js';
import { createTestArena, registerAgents, skillInput, START } from './helpers.js';

describe('computeContentHash', () => {
  it('should produce lowercase sha256 hex', () => {
    expect(computeContentHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('buildSkillId', () => {
  it('should combine the name with a hash prefix', () => {
    expect(buildSkillId('echo', 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855')).toBe(
      'skill-echo-e3b0c442'
    );
  });
});

describe('SkillService', () => {
  let arena: ArenaManager;

  beforeEach(async () => {
    ({ arena } = await createTestArena());
    await registerAgents(arena, 'author', 'alice', 'bob');
  });

  afterEach(async () => {
    await arena.close();
  });

  it('should publish a new skill with defaults', async () => {
    const input = skillInput('echo');
    const result = await arena.publishSkill('did:arena:author', input);

    expect(result.status).toBe('uploaded');
    expect(result.isNewVersion).toBe(false);
    expect(result.newUploader).toBe(true);
    expect(result.skillId).toBe(buildSkillId('echo', input.contentHash));

    const skill = await arena.getSkill(result.skillId);
    expect(skill).toMatchObject({
      name: 'echo',
      version: '1.0.0',
      description: 'echo skill',
      community: 'general',
      categories: [],
      visibility: 'public',
      uploaderCount: 1,
      upvotes: 0,
      voteScore: 0,
      rating: 0,
      createdAt: START,
    });
  });

  it('should keep categories', async () => {
    const result = await arena.publishSkill('did:arena:author', skillInput('echo', { categories: ['text', 'io'] }));

    expect((await arena.getSkill(result.skillId))?.categories).toEqual(['text', 'io']);
  });

  it('should credit a re-upload of identical content to the original', async () => {
    const original = await arena.publishSkill('did:arena:author', skillInput('echo'));
    const duplicate = await arena.publishSkill('did:arena:alice', skillInput('echo'));

    expect(duplicate.status).toBe('duplicate');
    expect(duplicate.skillId).toBe(original.skillId);
    expect(duplicate.newUploader).toBe(true);
    expect(duplicate.skill.uploaderCount).toBe(2);
    expect(duplicate.skill.upvotes).toBe(1);
    expect(duplicate.skill.voteScore).toBe(1);
    expect(duplicate.skill.uploaderId).toBe(original.skill.uploaderId);
  });

  it('should turn an earlier downvote into an upvote on re-upload', async () => {
    const original = await arena.publishSkill('did:arena:author', skillInput('echo'));
    await arena.vote('skill', original.skillId, 'did:arena:alice', 'downvote');

    const duplicate = await arena.publishSkill('did:arena:alice', skillInput('echo'));

    expect(duplicate.skill.upvotes).toBe(1);
    expect(duplicate.skill.downvotes).toBe(0);
  });

  it('should not credit the same uploader twice', async () => {
    await arena.publishSkill('did:arena:author', skillInput('echo'));
    await arena.publishSkill('did:arena:alice', skillInput('echo'));
    const again = await arena.publishSkill('did:arena:alice', skillInput('echo'));
    const byAuthor = await arena.publishSkill('did:arena:author', skillInput('echo'));

    expect(again.status).toBe('duplicate');
    expect(again.newUploader).toBe(false);
    expect(byAuthor.newUploader).toBe(false);
    expect(byAuthor.skill.uploaderCount).toBe(2);
    expect(byAuthor.skill.upvotes).toBe(1);
  });

  it('should flag a new version of an existing name', async () => {
    await arena.publishSkill('did:arena:author', skillInput('echo'));
    const next = await arena.publishSkill('did:arena:author', skillInput('echo', { version: '1.1.0' }));

    expect(next.status).toBe('uploaded');
    expect(next.isNewVersion).toBe(true);
  });

  it('should reject the same version with different content', async () => {
    const original = await arena.publishSkill('did:arena:author', skillInput('echo'));

    const error = await arena
      .publishSkill('did:arena:bob', skillInput('echo', { contentHash: computeContentHash('changed') }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VersionConflictError);
    if (error instanceof VersionConflictError) {
      expect(error.conflictWith).toBe(original.skillId);
      expect(error.httpStatus).toBe(409);
    }
  });

  it('should validate input', async () => {
    await expect(arena.publishSkill('did:arena:author', skillInput('-echo'))).rejects.toThrow(ValidationError);
    await expect(arena.publishSkill('did:arena:author', skillInput('echo', { contentHash: 'abc' }))).rejects.toThrow(
      ValidationError
    );
    await expect(arena.publishSkill('did:arena:author', skillInput('echo', { version: '' }))).rejects.toThrow(
      ValidationError
    );
  });

  it('should reject unknown publishers', async () => {
    await expect(arena.publishSkill('did:arena:ghost', skillInput('echo'))).rejects.toThrow(IdentityNotFoundError);
  });

  it('should return null for a missing skill', async () => {
    expect(await arena.getSkill('skill-missing')).toBeNull();
  });

  it('should list non-private versions newest first', async () => {
    await arena.publishSkill('did:arena:author', skillInput('echo'));
    await arena.publishSkill('did:arena:author', skillInput('echo', { version: '1.1.0' }));
    await arena.publishSkill('did:arena:author', skillInput('echo', { version: '2.0.0', visibility: 'private' }));
    await arena.publishSkill('did:arena:author', skillInput('translator'));

    const versions = await arena.listSkillVersions('echo');

    expect(versions.map(skill => skill.version)).toEqual(['1.1.0', '1.0.0']);
    expect((await arena.getLatestSkillVersion('echo'))?.version).toBe('1.1.0');
  });

  it('should return no versions for an unknown name', async () => {
    expect(await arena.listSkillVersions('missing')).toEqual([]);
    expect(await arena.getLatestSkillVersion('missing')).toBeNull();
  });

  it('should report zeroed platform statistics when empty', async () => {
    expect(await arena.getPlatformStats()).toEqual({
      totalSkills: 0,
      totalUsage: 0,
      totalReviews: 0,
      totalUploaders: 0,
      uniqueUploaders: 0,
      averageRating: 0,
      generatedAt: START,
    });
  });

  it('should aggregate platform statistics over every skill', async () => {
    const echo = await arena.publishSkill('did:arena:author', skillInput('echo'));
    await arena.publishSkill('did:arena:author', skillInput('translator'));
    await arena.publishSkill('did:arena:alice', skillInput('echo'));
    await arena.publishSkill('did:arena:bob', skillInput('secret', { visibility: 'private' }));
    await arena.recordUsage(echo.skillId, 'did:arena:alice', { usageCount: 5, totalTime: 50 });
    await arena.submitReview(echo.skillId, 'did:arena:alice', 80);

    expect(await arena.getPlatformStats()).toEqual({
      totalSkills: 3,
      totalUsage: 5,
      totalReviews: 1,
      totalUploaders: 4,
      uniqueUploaders: 3,
      averageRating: 26.67,
      generatedAt: START,
    });
  });
});
