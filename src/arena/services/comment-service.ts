/**
 * Comment Service
 *
 * Threaded discussion on skills
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { IdentityNotFoundError, NotFoundError, SkillNotFoundError, ValidationError } from '../errors.js';
import type { ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import { systemClock, type Clock, type Comment, type CommentNode } from '../types.js';

const logger = (): Logger => getModuleLogger('CommentService');

const MAX_COMMENT_LENGTH = 10_000;

/**
 * Nest a flat, already ordered comment list under its parents.
 * Replies whose parent is missing are promoted to the top level.
 */
export function buildCommentTree(comments: Comment[]): CommentNode[] {
  const nodes = new Map<string, CommentNode>();
  for (const comment of comments) {
    nodes.set(comment.commentId, { ...comment, replies: [] });
  }

  const roots: CommentNode[] = [];
  for (const comment of comments) {
    const node = nodes.get(comment.commentId);
    if (!node) continue;

    const parent = comment.parentCommentId ? nodes.get(comment.parentCommentId) : undefined;
    if (parent) {
      parent.replies.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

export class CommentService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly clock: Clock = systemClock
  ) {}

  async addComment(skillId: string, token: string, content: string, parentCommentId?: string): Promise<Comment> {
    const text = content.trim();
    if (text.length === 0) {
      throw new ValidationError('Comment content must not be empty');
    }
    if (text.length > MAX_COMMENT_LENGTH) {
      throw new ValidationError(`Comment content must be at most ${MAX_COMMENT_LENGTH} characters`, {
        length: text.length,
      });
    }

    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }

    return this.unitOfWork.run(async stores => {
      if (!(await stores.skills.getById(skillId))) {
        throw new SkillNotFoundError(skillId);
      }

      const commentId = randomUUID();
      let depth = 0;
      let rootCommentId: string = commentId;
      let threadId: string = commentId;

      if (parentCommentId !== undefined) {
        const parent = await stores.comments.getById(parentCommentId);
        if (!parent || parent.skillId !== skillId) {
          throw new NotFoundError('Comment', parentCommentId);
        }
        depth = parent.depth + 1;
        rootCommentId = parent.rootCommentId;
        threadId = parent.threadId;
      }

      const now = this.clock.now();
      const comment: Comment = {
        commentId,
        skillId,
        parentCommentId: parentCommentId ?? null,
        rootCommentId,
        threadId,
        authorId: identity.agentId,
        content: text,
        depth,
        upvotes: 0,
        downvotes: 0,
        voteScore: 0,
        hotScore: 0,
        repliesCount: 0,
        createdAt: now,
        updatedAt: now,
      };

      await stores.comments.insert(comment);
      await stores.skills.incrementCommentsCount(skillId, now);
      if (parentCommentId !== undefined) {
        await stores.comments.incrementRepliesCount(parentCommentId, now);
      }

      logger().debug({ commentId, skillId, depth }, 'Comment added');
      return comment;
    });
  }

  async getCommentTree(skillId: string): Promise<CommentNode[]> {
    const comments = await this.unitOfWork.read().comments.listBySkill(skillId);
    return buildCommentTree(comments);
  }
}
