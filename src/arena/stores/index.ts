/**
 * Arena Stores
 *
 * Store factory, schema setup and the transactional unit of work
 */

import {
  isTransientDatabaseError,
  withTransaction,
  type DatabaseAdapter,
  type Queryable,
} from '../../persistence/database.js';
import { retry, RetryExhaustedError } from '../../resilience/retry.js';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { TransientStorageError } from '../errors.js';
import type { TargetType } from '../types.js';
import { DatabaseAgentStore, type AgentStore } from './agent-store.js';
import { DatabaseSkillStore, type SkillStore } from './skill-store.js';
import { DatabaseCommentStore, type CommentStore } from './comment-store.js';
import { DatabaseVoteStore, type VoteStore, type VoteTargetStore } from './vote-store.js';
import { DatabaseReviewStore, type ReviewStore } from './review-store.js';
import { DatabaseUsageStore, type UsageStore } from './usage-store.js';
import { DatabaseDownloadStore, type DownloadStore } from './download-store.js';

const logger = (): Logger => getModuleLogger('UnitOfWork');

export interface ArenaStores {
  agents: AgentStore;
  skills: SkillStore;
  comments: CommentStore;
  votes: VoteStore;
  reviews: ReviewStore;
  usage: UsageStore;
  downloads: DownloadStore;
}

/**
 * Bind every store to one connection or transaction
 */
export function createArenaStores(db: Queryable): ArenaStores {
  return {
    agents: new DatabaseAgentStore(db),
    skills: new DatabaseSkillStore(db),
    comments: new DatabaseCommentStore(db),
    votes: new DatabaseVoteStore(db),
    reviews: new DatabaseReviewStore(db),
    usage: new DatabaseUsageStore(db),
    downloads: new DatabaseDownloadStore(db),
  };
}

/**
 * Counter store of a vote target type
 */
export function voteTargetStore(stores: ArenaStores, targetType: TargetType): VoteTargetStore {
  return targetType === 'skill' ? stores.skills : stores.comments;
}

/**
 * Create all tables and indexes
 */
export async function initializeArenaSchema(db: DatabaseAdapter): Promise<void> {
  await withTransaction(db, async tx => {
    const stores = createArenaStores(tx);
    await stores.agents.initialize();
    await stores.skills.initialize();
    await stores.comments.initialize();
    await stores.votes.initialize();
    await stores.reviews.initialize();
    await stores.usage.initialize();
    await stores.downloads.initialize();
  });
  logger().debug('Arena schema initialized');
}

// =============================================================================
// Unit of Work
// =============================================================================

export interface UnitOfWorkOptions {
  /** Attempts per unit, including the first */
  maxAttempts: number;
  /** Initial backoff between attempts in ms */
  retryDelayMs: number;
}

/**
 * Runs store work inside a single transaction, retrying the whole transaction
 * when the database reports a transient lock conflict
 */
export class ArenaUnitOfWork {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly options: UnitOfWorkOptions = { maxAttempts: 3, retryDelayMs: 25 }
  ) {}

  async run<T>(work: (stores: ArenaStores) => Promise<T>): Promise<T> {
    try {
      return await retry(
        () => withTransaction(this.db, tx => work(createArenaStores(tx))),
        {
          maxAttempts: this.options.maxAttempts,
          initialDelay: this.options.retryDelayMs,
          retryIf: isTransientDatabaseError,
          onRetry: ({ attempt, delay }) => {
            logger().warn({ attempt, delay }, 'Transient storage conflict, retrying transaction');
          },
        }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new TransientStorageError(error.attempts, error.lastError);
      }
      throw error;
    }
  }

  /**
   * Stores bound to the connection itself, for reads that need no transaction
   */
  read(): ArenaStores {
    return createArenaStores(this.db);
  }
}

export type { AgentStore } from './agent-store.js';
export type { SkillStore, SkillPageQuery, ScoredSkill, SkillTotals } from './skill-store.js';
export type { CommentStore } from './comment-store.js';
export type { VoteStore, VoteTargetStore, HotScoreInput } from './vote-store.js';
export type { ReviewStore, ReviewAggregate } from './review-store.js';
export type { UsageStore } from './usage-store.js';
export type { DownloadStore } from './download-store.js';
export {
  DatabaseAgentStore,
  DatabaseSkillStore,
  DatabaseCommentStore,
  DatabaseVoteStore,
  DatabaseReviewStore,
  DatabaseUsageStore,
  DatabaseDownloadStore,
};
