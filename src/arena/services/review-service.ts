/**
 * Review Service
 *
 * Usage-gated, usage-weighted reviews with burst damping
 */

import { randomUUID } from 'crypto';
import { DatabaseError } from '../../persistence/database.js';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { MAX_RATING, MIN_RATING } from '../constants.js';
import {
  DuplicateReviewError,
  IdentityNotFoundError,
  InsufficientUsageError,
  InvalidRatingError,
  SkillNotFoundError,
  ValidationError,
} from '../errors.js';
import type { ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import { systemClock, type Clock, type ReviewRecord, type ReviewResult } from '../types.js';
import {
  computeReviewWeight,
  computeWeightedRating,
  isReviewBurst,
  roundTo,
  type BurstPolicy,
} from './reputation.js';

const logger = (): Logger => getModuleLogger('ReviewService');

export interface ReviewPolicy {
  minUsageForReview: number;
  burst: BurstPolicy;
}

export class ReviewService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly policy: ReviewPolicy,
    private readonly clock: Clock = systemClock
  ) {}

  async submitReview(skillId: string, token: string, rating: number, comment?: string): Promise<ReviewResult> {
    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }

    return this.unitOfWork.run(async stores => {
      const skill = await stores.skills.getById(skillId);
      if (!skill) {
        throw new SkillNotFoundError(skillId);
      }

      if (typeof rating !== 'number' || !Number.isFinite(rating) || rating < MIN_RATING || rating > MAX_RATING) {
        throw new InvalidRatingError(rating);
      }

      const totalUsage = await stores.usage.getTotalUsage(identity.agentId, skillId);
      if (totalUsage < this.policy.minUsageForReview) {
        throw new InsufficientUsageError(this.policy.minUsageForReview, totalUsage);
      }

      if (await stores.reviews.findByAgentAndSkill(identity.agentId, skillId)) {
        throw new DuplicateReviewError(skillId, identity.agentId);
      }

      const now = this.clock.now();
      const recent = await stores.reviews.recentTimestamps(identity.agentId, this.policy.burst.reviewCount - 1);
      const damped = isReviewBurst([now, ...recent], this.policy.burst);

      let weight = computeReviewWeight(totalUsage, this.policy.minUsageForReview);
      if (damped) {
        weight = roundTo(weight * this.policy.burst.dampingFactor, 4);
        logger().warn(
          { agentId: identity.agentId, skillId, recentReviews: recent.length + 1 },
          'Review burst detected, damping weight'
        );
      }

      const review: ReviewRecord = {
        reviewId: randomUUID(),
        skillId,
        agentId: identity.agentId,
        rating,
        usageCountAtReview: totalUsage,
        weight,
        damped,
        comment: comment ?? null,
        createdAt: now,
      };

      try {
        await stores.reviews.insert(review);
      } catch (error) {
        if (error instanceof DatabaseError && error.uniqueViolation) {
          throw new DuplicateReviewError(skillId, identity.agentId);
        }
        throw error;
      }

      const aggregate = await stores.reviews.aggregate(skillId);
      const skillRating = computeWeightedRating(aggregate.weightedSum, aggregate.totalWeight);
      await stores.skills.updateRating(skillId, skillRating, aggregate.count, now);

      logger().info(
        { skillId, agentId: identity.agentId, weight, skillRating, reviewsCount: aggregate.count },
        'Review submitted'
      );

      return {
        reviewId: review.reviewId,
        weight,
        usageCount: totalUsage,
        damped,
        skillRating,
        reviewsCount: aggregate.count,
      };
    });
  }

  /**
   * Reviews of a skill, newest first
   */
  async listReviews(skillId: string, limit = 20): Promise<ReviewRecord[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit must be a positive integer', { limit });
    }
    return this.unitOfWork.read().reviews.listBySkill(skillId, limit);
  }
}
