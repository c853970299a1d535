/**
 * Skills Arena Types
 *
 * Entities, results and enumerations shared by the reputation and ranking engine
 */

// =============================================================================
// Enumerations
// =============================================================================

export const TARGET_TYPES = ['skill', 'comment'] as const;
export type TargetType = (typeof TARGET_TYPES)[number];

export const VOTE_ACTIONS = ['upvote', 'downvote', 'cancel'] as const;
export type VoteAction = (typeof VOTE_ACTIONS)[number];

export type VoteState = 'none' | 'upvoted' | 'downvoted';

/** Stored vote direction: +1 up, -1 down */
export type VoteDirection = 1 | -1;

export type VoteOutcome = 'voted' | 'changed' | 'cancelled' | 'already_voted' | 'no_vote_to_cancel';

export const FEED_SORT_KEYS = ['hot', 'new', 'top', 'rating', 'usage', 'reviews', 'uploaders', 'downloads'] as const;
export type FeedSortKey = (typeof FEED_SORT_KEYS)[number];

export const LEADERBOARD_CATEGORIES = ['overall', 'rating', 'usage', 'reviews', 'uploaders', 'downloads'] as const;
export type LeaderboardCategory = (typeof LEADERBOARD_CATEGORIES)[number];

export const SKILL_VISIBILITIES = ['public', 'unlisted', 'private'] as const;
export type SkillVisibility = (typeof SKILL_VISIBILITIES)[number];

/**
 * Why a download was allowed or refused: public and unlisted skills are open to
 * every registered agent, private ones to their uploaders only
 */
export type DownloadReason = 'public' | 'unlisted' | 'uploader' | 'private';

export function isTargetType(value: unknown): value is TargetType {
  return typeof value === 'string' && (TARGET_TYPES as readonly string[]).includes(value);
}

export function isVoteAction(value: unknown): value is VoteAction {
  return typeof value === 'string' && (VOTE_ACTIONS as readonly string[]).includes(value);
}

export function isFeedSortKey(value: unknown): value is FeedSortKey {
  return typeof value === 'string' && (FEED_SORT_KEYS as readonly string[]).includes(value);
}

export function isLeaderboardCategory(value: unknown): value is LeaderboardCategory {
  return typeof value === 'string' && (LEADERBOARD_CATEGORIES as readonly string[]).includes(value);
}

// =============================================================================
// Clock
// =============================================================================

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// =============================================================================
// Entities
// =============================================================================

/**
 * Resolved caller identity. Issued by the identity resolver and never mutated.
 */
export interface Identity {
  readonly agentId: string;
  readonly did: string;
  readonly username: string;
  readonly displayName: string;
}

export interface Agent extends Identity {
  bio: string | null;
  createdAt: number;
  lastActiveAt: number;
}

export interface Skill {
  skillId: string;
  name: string;
  version: string;
  description: string;
  contentHash: string;
  community: string;
  categories: string[];
  visibility: SkillVisibility;
  uploaderId: string;
  uploaderCount: number;
  upvotes: number;
  downvotes: number;
  voteScore: number;
  hotScore: number;
  /** Weighted review rating, 0-100 */
  rating: number;
  reviewsCount: number;
  usageCount: number;
  totalUsageTime: number;
  avgResponseTime: number;
  commentsCount: number;
  downloadsCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface Comment {
  commentId: string;
  skillId: string;
  parentCommentId: string | null;
  rootCommentId: string;
  threadId: string;
  authorId: string;
  content: string;
  depth: number;
  upvotes: number;
  downvotes: number;
  voteScore: number;
  hotScore: number;
  repliesCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface CommentNode extends Comment {
  replies: CommentNode[];
}

export interface VoteRecord {
  voteId: string;
  agentId: string;
  targetType: TargetType;
  targetId: string;
  direction: VoteDirection;
  createdAt: number;
  updatedAt: number;
}

export interface ReviewRecord {
  reviewId: string;
  skillId: string;
  agentId: string;
  rating: number;
  usageCountAtReview: number;
  weight: number;
  damped: boolean;
  comment: string | null;
  createdAt: number;
}

export interface UsageRecord {
  usageId: string;
  skillId: string;
  agentId: string;
  usageCount: number;
  totalTime: number;
  avgResponseTime: number;
  successRate: number;
  createdAt: number;
}

export interface DownloadRecord {
  downloadId: string;
  skillId: string;
  agentId: string;
  createdAt: number;
}

/** Vote counters of a single target */
export interface VoteCounts {
  upvotes: number;
  downvotes: number;
  voteScore: number;
}

// =============================================================================
// Operation Results
// =============================================================================

export interface VoteResult extends VoteCounts {
  success: boolean;
  outcome: VoteOutcome | 'identity_not_found';
  message: string;
  previousState: VoteState;
  state: VoteState;
}

/** The caller's current vote on a target, with the target's counters */
export interface VoteStatus extends VoteCounts {
  targetType: TargetType;
  targetId: string;
  state: VoteState;
}

export interface ReviewResult {
  reviewId: string;
  weight: number;
  usageCount: number;
  damped: boolean;
  skillRating: number;
  reviewsCount: number;
}

export interface UsageInput {
  usageCount: number;
  totalTime: number;
  avgResponseTime?: number;
  successRate?: number;
}

export interface UsageResult {
  usageId: string;
  usageCount: number;
  totalUsageTime: number;
  avgResponseTime: number;
}

export interface PublishSkillInput {
  name: string;
  version: string;
  description?: string;
  contentHash: string;
  community?: string;
  categories?: string[];
  visibility?: SkillVisibility;
}

export interface PublishResult {
  status: 'uploaded' | 'duplicate';
  skillId: string;
  skill: Skill;
  isNewVersion: boolean;
  /** Whether the caller was added as an uploader by this call */
  newUploader: boolean;
}

export interface DownloadPermission {
  canDownload: boolean;
  reason: DownloadReason;
}

export interface DownloadResult {
  downloadId: string;
  skillId: string;
  reason: DownloadReason;
  downloadsCount: number;
}

export interface PlatformStats {
  totalSkills: number;
  totalUsage: number;
  totalReviews: number;
  /** Sum of per-skill uploader counts */
  totalUploaders: number;
  /** Distinct agents that uploaded at least one skill */
  uniqueUploaders: number;
  averageRating: number;
  generatedAt: number;
}

export interface HotScoreRefreshResult {
  updatedCount: number;
  skills: number;
  comments: number;
  refreshedAt: number;
}

// =============================================================================
// Feeds
// =============================================================================

export interface FeedFilter {
  community?: string;
  /** Case-insensitive substring of name or description */
  query?: string;
  minRating?: number;
  minUsage?: number;
}

export interface TargetSummary {
  skillId: string;
  name: string;
  version: string;
  description: string;
  community: string;
  categories: string[];
  uploaderId: string;
  /** Username of the original uploader, null once the agent is gone */
  uploaderName: string | null;
  uploaderDisplayName: string | null;
  uploaderCount: number;
  upvotes: number;
  downvotes: number;
  voteScore: number;
  hotScore: number;
  rating: number;
  reviewsCount: number;
  usageCount: number;
  commentsCount: number;
  downloadsCount: number;
  createdAt: number;
}

export interface RankedTargetSummary extends TargetSummary {
  /** 1-based position in the leaderboard */
  rank: number;
  /** Value the leaderboard was sorted by */
  score: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}
