import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  IdentityNotFoundError,
  InvalidActionError,
  InvalidTargetTypeError,
  NotFoundError,
  type ArenaManager,
} from '../../src/arena/index.js';
import { createTestArena, publish, registerAgents } from './helpers.js';

describe('VoteService', () => {
  let arena: ArenaManager;
  let skillId: string;

  beforeEach(async () => {
    ({ arena } = await createTestArena());
    await registerAgents(arena, 'author', 'alice', 'bob', 'carol');
    skillId = await publish(arena, 'did:arena:author', 'summarizer');
  });

  afterEach(async () => {
    await arena.close();
  });

  it('should count a new upvote', async () => {
    const result = await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');

    expect(result).toEqual({
      success: true,
      outcome: 'voted',
      message: 'Vote recorded',
      previousState: 'none',
      state: 'upvoted',
      upvotes: 1,
      downvotes: 0,
      voteScore: 1,
    });
  });

  it('should leave counters unchanged on a repeated upvote', async () => {
    await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');
    const result = await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');

    expect(result.success).toBe(true);
    expect(result.outcome).toBe('already_voted');
    expect(result.message).toBe('Already voted');
    expect(result.upvotes).toBe(1);
    expect(result.voteScore).toBe(1);
  });

  it('should restore counters after upvote then cancel', async () => {
    await arena.vote('skill', skillId, 'did:arena:bob', 'downvote');
    const before = await arena.getSkill(skillId);

    await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');
    const result = await arena.vote('skill', skillId, 'did:arena:alice', 'cancel');

    expect(result.outcome).toBe('cancelled');
    expect(result.state).toBe('none');
    expect(result.upvotes).toBe(before?.upvotes);
    expect(result.downvotes).toBe(before?.downvotes);
    expect(result.voteScore).toBe(before?.voteScore);
  });

  it('should move a vote from up to down', async () => {
    await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');
    const result = await arena.vote('skill', skillId, 'did:arena:alice', 'downvote');

    expect(result.outcome).toBe('changed');
    expect(result.previousState).toBe('upvoted');
    expect(result.state).toBe('downvoted');
    expect(result.upvotes).toBe(0);
    expect(result.downvotes).toBe(1);
    expect(result.voteScore).toBe(-1);
  });

  it('should report cancelling without a vote', async () => {
    const result = await arena.vote('skill', skillId, 'did:arena:alice', 'cancel');

    expect(result.success).toBe(true);
    expect(result.outcome).toBe('no_vote_to_cancel');
    expect(result.message).toBe('No vote to cancel');
    expect(result.voteScore).toBe(0);
  });

  it('should soft-fail for an unknown identity', async () => {
    const result = await arena.vote('skill', skillId, 'did:arena:nobody', 'upvote');

    expect(result).toEqual({
      success: false,
      outcome: 'identity_not_found',
      message: 'Agent not found',
      previousState: 'none',
      state: 'none',
      upvotes: 0,
      downvotes: 0,
      voteScore: 0,
    });
    expect((await arena.getSkill(skillId))?.upvotes).toBe(0);
  });

  it('should reject malformed input', async () => {
    await expect(arena.vote('post', skillId, 'did:arena:alice', 'upvote')).rejects.toThrow(InvalidTargetTypeError);
    await expect(arena.vote('skill', skillId, 'did:arena:alice', 'like')).rejects.toThrow(InvalidActionError);
  });

  it('should reject votes on missing targets', async () => {
    await expect(arena.vote('skill', 'skill-missing', 'did:arena:alice', 'upvote')).rejects.toThrow(NotFoundError);
    await expect(arena.vote('comment', 'no-such-comment', 'did:arena:alice', 'upvote')).rejects.toThrow(NotFoundError);
  });

  it('should vote on comments', async () => {
    const comment = await arena.addComment(skillId, 'did:arena:bob', 'Nice work');

    await arena.vote('comment', comment.commentId, 'did:arena:alice', 'upvote');
    const result = await arena.vote('comment', comment.commentId, 'did:arena:carol', 'downvote');

    expect(result.upvotes).toBe(1);
    expect(result.downvotes).toBe(1);
    expect(result.voteScore).toBe(0);
  });

  it('should keep the score equal to upvotes minus downvotes', async () => {
    await arena.vote('skill', skillId, 'did:arena:alice', 'upvote');
    await arena.vote('skill', skillId, 'did:arena:bob', 'upvote');
    await arena.vote('skill', skillId, 'did:arena:carol', 'downvote');
    await arena.vote('skill', skillId, 'did:arena:bob', 'downvote');

    const skill = await arena.getSkill(skillId);
    expect(skill?.upvotes).toBe(1);
    expect(skill?.downvotes).toBe(2);
    expect(skill?.voteScore).toBe(-1);
  });

  it('should report the caller vote state', async () => {
    expect(await arena.getVoteState('skill', skillId, 'did:arena:alice')).toEqual({
      targetType: 'skill',
      targetId: skillId,
      state: 'none',
      upvotes: 0,
      downvotes: 0,
      voteScore: 0,
    });

    await arena.vote('skill', skillId, 'did:arena:alice', 'downvote');
    await arena.vote('skill', skillId, 'did:arena:bob', 'upvote');

    expect(await arena.getVoteState('skill', skillId, 'did:arena:alice')).toEqual({
      targetType: 'skill',
      targetId: skillId,
      state: 'downvoted',
      upvotes: 1,
      downvotes: 1,
      voteScore: 0,
    });
    expect((await arena.getVoteState('skill', skillId, 'did:arena:bob')).state).toBe('upvoted');
    expect((await arena.getVoteState('skill', skillId, 'did:arena:carol')).state).toBe('none');
  });

  it('should report vote state on comments', async () => {
    const comment = await arena.addComment(skillId, 'did:arena:bob', 'Nice work');
    await arena.vote('comment', comment.commentId, 'did:arena:alice', 'upvote');

    const status = await arena.getVoteState('comment', comment.commentId, 'did:arena:alice');

    expect(status.state).toBe('upvoted');
    expect(status.voteScore).toBe(1);
  });

  it('should reject vote state lookups for unknown types, callers and targets', async () => {
    await expect(arena.getVoteState('post', skillId, 'did:arena:alice')).rejects.toThrow(InvalidTargetTypeError);
    await expect(arena.getVoteState('skill', skillId, 'did:arena:ghost')).rejects.toThrow(IdentityNotFoundError);
    await expect(arena.getVoteState('skill', 'skill-missing', 'did:arena:alice')).rejects.toThrow(NotFoundError);
  });

  it('should not lose concurrent votes on the same target', async () => {
    const voters = await registerAgents(arena, ...Array.from({ length: 20 }, (_, i) => `voter${i}`));

    const results = await Promise.all(
      voters.map((voter, i) => arena.vote('skill', skillId, voter.did, i % 4 === 0 ? 'downvote' : 'upvote'))
    );

    expect(results.every(r => r.success)).toBe(true);
    const skill = await arena.getSkill(skillId);
    expect(skill?.upvotes).toBe(15);
    expect(skill?.downvotes).toBe(5);
    expect(skill?.voteScore).toBe(10);
  });

  it('should apply one vote when the same voter races itself', async () => {
    const results = await Promise.all([
      arena.vote('skill', skillId, 'did:arena:alice', 'upvote'),
      arena.vote('skill', skillId, 'did:arena:alice', 'upvote'),
      arena.vote('skill', skillId, 'did:arena:alice', 'upvote'),
    ]);

    expect(results.map(r => r.outcome).sort()).toEqual(['already_voted', 'already_voted', 'voted']);
    expect((await arena.getSkill(skillId))?.upvotes).toBe(1);
  });
});
