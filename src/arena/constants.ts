import type { FeedSortKey, LeaderboardCategory } from './types.js';

// =============================================================================
// Reputation
// =============================================================================

export const DEFAULT_MIN_USAGE_FOR_REVIEW = 5;

/**
 * Review weight by total usage, highest threshold first
 */
export const REVIEW_WEIGHT_BANDS: ReadonlyArray<{ minUsage: number; weight: number }> = [
  { minUsage: 100, weight: 3.0 },
  { minUsage: 50, weight: 2.0 },
  { minUsage: 20, weight: 1.5 },
  { minUsage: 5, weight: 1.0 },
];

export const DEFAULT_BURST_POLICY = {
  reviewCount: 3,
  windowMs: 60_000,
  dampingFactor: 0.1,
} as const;

export const MIN_RATING = 0;
export const MAX_RATING = 100;

// =============================================================================
// Ranking
// =============================================================================

export const DEFAULT_HOT_GRAVITY = 1.8;
export const MS_PER_HOUR = 3_600_000;

// =============================================================================
// Feeds
// =============================================================================

/**
 * Column each feed sort key orders by, descending
 */
export const FEED_SORT_COLUMNS: Readonly<Record<FeedSortKey, string>> = {
  hot: 'hot_score',
  new: 'created_at',
  top: 'vote_score',
  rating: 'rating',
  usage: 'usage_count',
  reviews: 'reviews_count',
  uploaders: 'uploader_count',
  downloads: 'downloads_count',
};

export const OVERALL_SCORE_SQL =
  '(rating * 0.5 + MIN(usage_count / 1000.0, 1.0) * 30 + MIN(reviews_count / 50.0, 1.0) * 20)';

/**
 * Expression each leaderboard category ranks by, descending
 */
export const LEADERBOARD_SCORE_SQL: Readonly<Record<LeaderboardCategory, string>> = {
  overall: OVERALL_SCORE_SQL,
  rating: 'rating',
  usage: 'usage_count',
  reviews: 'reviews_count',
  uploaders: 'uploader_count',
  downloads: 'downloads_count',
};

export const DEFAULT_FEED_LIMIT = 50;
export const MAX_FEED_LIMIT = 100;
