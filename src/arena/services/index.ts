export { VoteService, applyVote, type AppliedVote } from './vote-service.js';
export {
  computeVoteTransition,
  stateFromDirection,
  directionFromState,
  OUTCOME_MESSAGES,
  type VoteDelta,
  type VoteTransition,
} from './vote-transitions.js';
export { ReviewService, type ReviewPolicy } from './review-service.js';
export {
  computeReviewWeight,
  computeWeightedRating,
  isReviewBurst,
  roundTo,
  type BurstPolicy,
} from './reputation.js';
export { RankingService, calculateHotScore } from './ranking-service.js';
export { FeedService, toTargetSummary, type FeedLimits } from './feed-service.js';
export { UsageService } from './usage-service.js';
export { DownloadService } from './download-service.js';
export { SkillService, computeContentHash, buildSkillId } from './skill-service.js';
export { CommentService, buildCommentTree } from './comment-service.js';
