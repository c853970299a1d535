/**
 * Skills Arena
 *
 * Reputation and ranking engine for shared agent skills:
 * - Vote state machine on skills and comments
 * - Usage-weighted reviews with burst damping
 * - Time-decayed hot ranking, refreshed in batch
 * - Sorted feeds and leaderboards
 * - Visibility-gated download tracking
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { ConfigLoader, type ArenaConfig, type ArenaConfigInput } from '../config/schema.js';
import { getModuleLogger, initLogger } from '../observability/logger.js';
import type { DatabaseAdapter } from '../persistence/database.js';
import { SQLiteDatabaseAdapter } from '../persistence/sqlite-adapter.js';
import { ArenaUnitOfWork, initializeArenaSchema } from './stores/index.js';
import {
  DatabaseIdentityResolver,
  type IdentityResolver,
  type RegisterAgentInput,
} from './identity/resolver.js';
import { VoteService } from './services/vote-service.js';
import { ReviewService } from './services/review-service.js';
import { RankingService } from './services/ranking-service.js';
import { FeedService } from './services/feed-service.js';
import { UsageService } from './services/usage-service.js';
import { DownloadService } from './services/download-service.js';
import { SkillService } from './services/skill-service.js';
import { CommentService } from './services/comment-service.js';
import { HotScoreRefresher, type HotScoreRefresherStats } from './jobs/hot-score-refresher.js';
import {
  systemClock,
  type Agent,
  type Clock,
  type Comment,
  type CommentNode,
  type DownloadPermission,
  type DownloadResult,
  type FeedFilter,
  type HotScoreRefreshResult,
  type Page,
  type PlatformStats,
  type PublishResult,
  type PublishSkillInput,
  type RankedTargetSummary,
  type ReviewRecord,
  type ReviewResult,
  type Skill,
  type TargetSummary,
  type UsageInput,
  type UsageResult,
  type VoteResult,
  type VoteStatus,
} from './types.js';

const logger = (): Logger => getModuleLogger('ArenaManager');

// =============================================================================
// Events
// =============================================================================

export const ARENA_EVENTS = {
  VOTE: 'vote',
  REVIEW: 'review',
  USAGE: 'usage',
  DOWNLOAD: 'download',
  SKILL_PUBLISHED: 'skill:published',
  COMMENT: 'comment',
  HOT_SCORES_REFRESHED: 'hot-scores:refreshed',
} as const;

export type ArenaEventName = (typeof ARENA_EVENTS)[keyof typeof ARENA_EVENTS];

// =============================================================================
// Manager
// =============================================================================

export interface ArenaManagerOptions {
  /** Configuration, validated with defaults applied */
  config?: ArenaConfigInput;
  /** Storage; defaults to a SQLite adapter on `config.database` */
  db?: DatabaseAdapter;
  /** Identity lookup; defaults to the agents table */
  identityResolver?: IdentityResolver;
  clock?: Clock;
  /** Apply `config.observability.logging` to the process logger */
  configureLogging?: boolean;
}

/**
 * Facade over the arena services. Emits an event after every successful mutation.
 */
export class ArenaManager extends EventEmitter {
  readonly config: ArenaConfig;
  private readonly db: DatabaseAdapter;
  private readonly unitOfWork: ArenaUnitOfWork;
  private readonly agentRegistry: DatabaseIdentityResolver;
  private readonly votes: VoteService;
  private readonly reviews: ReviewService;
  private readonly ranking: RankingService;
  private readonly feeds: FeedService;
  private readonly usage: UsageService;
  private readonly downloads: DownloadService;
  private readonly skills: SkillService;
  private readonly comments: CommentService;
  private readonly refresher: HotScoreRefresher;
  private initialized = false;

  constructor(options: ArenaManagerOptions = {}) {
    super();

    this.config = ConfigLoader.load(options.config ?? {});
    if (options.configureLogging) {
      initLogger(this.config.observability.logging);
    }

    const clock = options.clock ?? systemClock;

    this.db =
      options.db ??
      new SQLiteDatabaseAdapter({
        type: 'sqlite',
        filename: this.config.database.filename,
        busyTimeout: this.config.database.busyTimeout,
        journalMode: this.config.database.journalMode,
      });

    this.unitOfWork = new ArenaUnitOfWork(this.db, {
      maxAttempts: this.config.storage.maxAttempts,
      retryDelayMs: this.config.storage.retryDelayMs,
    });

    this.agentRegistry = new DatabaseIdentityResolver(this.db, clock);
    const identities = options.identityResolver ?? this.agentRegistry;

    this.votes = new VoteService(this.unitOfWork, identities, clock);
    this.reviews = new ReviewService(
      this.unitOfWork,
      identities,
      {
        minUsageForReview: this.config.reputation.minUsageForReview,
        burst: this.config.reputation.burst,
      },
      clock
    );
    this.ranking = new RankingService(this.unitOfWork, this.config.ranking.gravity, clock);
    this.feeds = new FeedService(this.unitOfWork, this.config.feed);
    this.usage = new UsageService(this.unitOfWork, identities, clock);
    this.downloads = new DownloadService(this.unitOfWork, identities, clock);
    this.skills = new SkillService(this.unitOfWork, identities, clock);
    this.comments = new CommentService(this.unitOfWork, identities, clock);

    this.refresher = new HotScoreRefresher(() => this.ranking.refreshHotScores(), {
      intervalMs: this.config.ranking.refreshIntervalMs,
      onRefresh: result => this.emit(ARENA_EVENTS.HOT_SCORES_REFRESHED, result),
    });
  }

  /**
   * Connect storage, create the schema and start the refresher when enabled
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.db.connect();
    await initializeArenaSchema(this.db);
    this.initialized = true;

    if (this.config.ranking.autoRefresh) {
      this.refresher.start();
    }

    logger().info({ env: this.config.env, database: this.config.database.filename }, 'Arena initialized');
  }

  // ---------------------------------------------------------------------------
  // Core operations
  // ---------------------------------------------------------------------------

  async submitReview(skillId: string, token: string, rating: number, comment?: string): Promise<ReviewResult> {
    const result = await this.reviews.submitReview(skillId, token, rating, comment);
    this.emit(ARENA_EVENTS.REVIEW, { skillId, ...result });
    return result;
  }

  async vote(targetType: string, targetId: string, token: string, action: string): Promise<VoteResult> {
    const result = await this.votes.vote(targetType, targetId, token, action);
    if (result.success) {
      this.emit(ARENA_EVENTS.VOTE, { targetType, targetId, ...result });
    }
    return result;
  }

  async getVoteState(targetType: string, targetId: string, token: string): Promise<VoteStatus> {
    return this.votes.getVoteState(targetType, targetId, token);
  }

  /**
   * Refresh hot scores now, bypassing the schedule
   */
  async refreshHotScores(): Promise<HotScoreRefreshResult> {
    const result = await this.ranking.refreshHotScores();
    this.emit(ARENA_EVENTS.HOT_SCORES_REFRESHED, result);
    return result;
  }

  async composeFeed(
    sortKey: string,
    filter?: FeedFilter,
    limit?: number,
    offset?: number
  ): Promise<Page<TargetSummary>> {
    return this.feeds.composeFeed(sortKey, filter, limit, offset);
  }

  async composeLeaderboard(category: string, limit?: number): Promise<Page<RankedTargetSummary>> {
    return this.feeds.composeLeaderboard(category, limit);
  }

  // ---------------------------------------------------------------------------
  // Skills, usage, downloads and comments
  // ---------------------------------------------------------------------------

  async recordUsage(skillId: string, token: string, input: UsageInput): Promise<UsageResult> {
    const result = await this.usage.recordUsage(skillId, token, input);
    this.emit(ARENA_EVENTS.USAGE, { skillId, ...result });
    return result;
  }

  async checkDownloadPermission(skillId: string, token: string): Promise<DownloadPermission> {
    return this.downloads.checkDownloadPermission(skillId, token);
  }

  async recordDownload(skillId: string, token: string): Promise<DownloadResult> {
    const result = await this.downloads.recordDownload(skillId, token);
    this.emit(ARENA_EVENTS.DOWNLOAD, result);
    return result;
  }

  async publishSkill(token: string, input: PublishSkillInput): Promise<PublishResult> {
    const result = await this.skills.publishSkill(token, input);
    this.emit(ARENA_EVENTS.SKILL_PUBLISHED, result);
    return result;
  }

  async getSkill(skillId: string): Promise<Skill | null> {
    return this.skills.getSkill(skillId);
  }

  async listSkillVersions(name: string): Promise<Skill[]> {
    return this.skills.listSkillVersions(name);
  }

  async getLatestSkillVersion(name: string): Promise<Skill | null> {
    return this.skills.getLatestSkillVersion(name);
  }

  async getPlatformStats(): Promise<PlatformStats> {
    return this.skills.getPlatformStats();
  }

  async listReviews(skillId: string, limit?: number): Promise<ReviewRecord[]> {
    return this.reviews.listReviews(skillId, limit);
  }

  async addComment(skillId: string, token: string, content: string, parentCommentId?: string): Promise<Comment> {
    const comment = await this.comments.addComment(skillId, token, content, parentCommentId);
    this.emit(ARENA_EVENTS.COMMENT, comment);
    return comment;
  }

  async getCommentTree(skillId: string): Promise<CommentNode[]> {
    return this.comments.getCommentTree(skillId);
  }

  async registerAgent(input: RegisterAgentInput): Promise<Agent> {
    return this.agentRegistry.registerAgent(input);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  startHotScoreRefresh(): void {
    this.refresher.start();
  }

  async stopHotScoreRefresh(): Promise<void> {
    await this.refresher.stop();
  }

  getRefresherStats(): HotScoreRefresherStats {
    return this.refresher.getStats();
  }

  async close(): Promise<void> {
    await this.refresher.stop();
    await this.db.disconnect();
    this.initialized = false;
    logger().info('Arena closed');
  }
}

/**
 * Create and initialize an arena manager
 */
export async function createArenaManager(
  config: ArenaConfigInput = {},
  options: Omit<ArenaManagerOptions, 'config'> = {}
): Promise<ArenaManager> {
  const manager = new ArenaManager({ ...options, config });
  await manager.initialize();
  return manager;
}

export * from './types.js';
export * from './errors.js';
export * from './services/index.js';
export {
  ArenaUnitOfWork,
  createArenaStores,
  initializeArenaSchema,
  voteTargetStore,
  type ArenaStores,
  type UnitOfWorkOptions,
} from './stores/index.js';
export {
  DatabaseIdentityResolver,
  InMemoryIdentityResolver,
  generateDid,
  type IdentityResolver,
  type RegisterAgentInput,
} from './identity/resolver.js';
export {
  HotScoreRefresher,
  type HotScoreRefresherConfig,
  type HotScoreRefresherStats,
} from './jobs/hot-score-refresher.js';
