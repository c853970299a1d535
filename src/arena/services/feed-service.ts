/**
 * Feed Service
 *
 * Sorted, filtered and paginated views over public skills
 */

import { z } from 'zod';
import { FEED_SORT_COLUMNS, LEADERBOARD_SCORE_SQL } from '../constants.js';
import { InvalidSortKeyError, ValidationError } from '../errors.js';
import type { ArenaUnitOfWork, ScoredSkill } from '../stores/index.js';
import {
  isFeedSortKey,
  isLeaderboardCategory,
  type FeedFilter,
  type Page,
  type RankedTargetSummary,
  type TargetSummary,
} from '../types.js';

export interface FeedLimits {
  defaultLimit: number;
  maxLimit: number;
}

const FeedFilterSchema = z
  .object({
    community: z.string().min(1).optional(),
    query: z.string().max(200).optional(),
    minRating: z.number().min(0).max(100).optional(),
    minUsage: z.number().int().min(0).optional(),
  })
  .strict();

export function toTargetSummary({ skill, uploaderName, uploaderDisplayName }: ScoredSkill): TargetSummary {
  return {
    skillId: skill.skillId,
    name: skill.name,
    version: skill.version,
    description: skill.description,
    community: skill.community,
    categories: skill.categories,
    uploaderId: skill.uploaderId,
    uploaderName,
    uploaderDisplayName,
    uploaderCount: skill.uploaderCount,
    upvotes: skill.upvotes,
    downvotes: skill.downvotes,
    voteScore: skill.voteScore,
    hotScore: skill.hotScore,
    rating: skill.rating,
    reviewsCount: skill.reviewsCount,
    usageCount: skill.usageCount,
    commentsCount: skill.commentsCount,
    downloadsCount: skill.downloadsCount,
    createdAt: skill.createdAt,
  };
}

export class FeedService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly limits: FeedLimits = { defaultLimit: 50, maxLimit: 100 }
  ) {}

  async composeFeed(sortKey: string, filter: FeedFilter = {}, limit?: number, offset?: number): Promise<Page<TargetSummary>> {
    if (!isFeedSortKey(sortKey)) {
      throw new InvalidSortKeyError(sortKey);
    }

    const parsedFilter = this.parseFilter(filter);
    const page = this.resolvePage(limit, offset);
    const orderBy = FEED_SORT_COLUMNS[sortKey];

    // Page and total come from one transaction so they agree
    return this.unitOfWork.run(async stores => {
      const rows = await stores.skills.page({
        filter: parsedFilter,
        orderBy,
        limit: page.limit,
        offset: page.offset,
      });
      const total = await stores.skills.count(parsedFilter);

      return {
        items: rows.map(toTargetSummary),
        total,
        limit: page.limit,
        offset: page.offset,
      };
    });
  }

  async composeLeaderboard(category: string, limit?: number): Promise<Page<RankedTargetSummary>> {
    if (!isLeaderboardCategory(category)) {
      throw new InvalidSortKeyError(category);
    }

    const page = this.resolvePage(limit, 0);
    const orderBy = LEADERBOARD_SCORE_SQL[category];

    return this.unitOfWork.run(async stores => {
      const rows = await stores.skills.page({ filter: {}, orderBy, limit: page.limit, offset: 0 });
      const total = await stores.skills.count({});

      return {
        items: rows.map((row, index) => ({
          ...toTargetSummary(row),
          rank: index + 1,
          score: row.score,
        })),
        total,
        limit: page.limit,
        offset: 0,
      };
    });
  }

  private parseFilter(filter: FeedFilter): FeedFilter {
    const parsed = FeedFilterSchema.safeParse(filter);
    if (!parsed.success) {
      throw new ValidationError('Invalid feed filter', {
        issues: parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })),
      });
    }
    return parsed.data;
  }

  private resolvePage(limit: number | undefined, offset: number | undefined): { limit: number; offset: number } {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError('limit must be a positive integer', { limit });
    }
    if (offset !== undefined && (!Number.isInteger(offset) || offset < 0)) {
      throw new ValidationError('offset must be a non-negative integer', { offset });
    }

    return {
      limit: Math.min(limit ?? this.limits.defaultLimit, this.limits.maxLimit),
      offset: offset ?? 0,
    };
  }
}
