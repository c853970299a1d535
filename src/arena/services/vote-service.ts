/**
 * Vote Service
 *
 * Applies vote actions to skills and comments. The ledger row and the
 * target's counters change together inside one transaction.
 */

import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { IdentityNotFoundError, InvalidActionError, InvalidTargetTypeError, NotFoundError } from '../errors.js';
import { voteTargetStore, type ArenaStores, type ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import {
  isTargetType,
  isVoteAction,
  systemClock,
  type Clock,
  type TargetType,
  type VoteAction,
  type VoteCounts,
  type VoteResult,
  type VoteState,
  type VoteStatus,
} from '../types.js';
import {
  OUTCOME_MESSAGES,
  computeVoteTransition,
  directionFromState,
  stateFromDirection,
  type VoteTransition,
} from './vote-transitions.js';

const logger = (): Logger => getModuleLogger('VoteService');

export interface AppliedVote {
  previousState: VoteState;
  transition: VoteTransition;
  counts: VoteCounts;
}

/**
 * Run one state-machine step for (agent, target) against transaction-bound stores
 */
export async function applyVote(
  stores: ArenaStores,
  targetType: TargetType,
  targetId: string,
  agentId: string,
  action: VoteAction,
  at: number
): Promise<AppliedVote> {
  const targets = voteTargetStore(stores, targetType);

  if (!(await targets.getVoteCounts(targetId))) {
    throw new NotFoundError(targetType === 'skill' ? 'Skill' : 'Comment', targetId);
  }

  const existing = await stores.votes.find(agentId, targetType, targetId);
  const previousState = stateFromDirection(existing ? existing.direction : null);
  const transition = computeVoteTransition(previousState, action);

  if (transition.nextState !== previousState) {
    const direction = directionFromState(transition.nextState);
    if (direction === null) {
      if (existing) {
        await stores.votes.delete(existing.voteId);
      }
    } else if (existing) {
      await stores.votes.updateDirection(existing.voteId, direction, at);
    } else {
      await stores.votes.insert(agentId, targetType, targetId, direction, at);
    }

    await targets.applyVoteDelta(targetId, transition.delta.upvotes, transition.delta.downvotes, at);
  }

  const counts = await targets.getVoteCounts(targetId);
  if (!counts) {
    throw new NotFoundError(targetType === 'skill' ? 'Skill' : 'Comment', targetId);
  }

  return { previousState, transition, counts };
}

// =============================================================================
// Vote Service
// =============================================================================

export class VoteService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Apply a vote action. An unknown caller gets a failed result rather than an error.
   */
  async vote(targetType: string, targetId: string, token: string, action: string): Promise<VoteResult> {
    if (!isTargetType(targetType)) {
      throw new InvalidTargetTypeError(targetType);
    }
    if (!isVoteAction(action)) {
      throw new InvalidActionError(action);
    }

    const type: TargetType = targetType;
    const voteAction: VoteAction = action;

    const identity = await this.identities.resolve(token);
    if (!identity) {
      logger().debug({ targetType, targetId }, 'Vote from unknown identity ignored');
      return {
        success: false,
        outcome: 'identity_not_found',
        message: 'Agent not found',
        previousState: 'none',
        state: 'none',
        upvotes: 0,
        downvotes: 0,
        voteScore: 0,
      };
    }

    const applied = await this.unitOfWork.run(stores =>
      applyVote(stores, type, targetId, identity.agentId, voteAction, this.clock.now())
    );

    logger().debug(
      {
        targetType,
        targetId,
        agentId: identity.agentId,
        action,
        outcome: applied.transition.outcome,
      },
      'Vote applied'
    );

    return {
      success: true,
      outcome: applied.transition.outcome,
      message: OUTCOME_MESSAGES[applied.transition.outcome],
      previousState: applied.previousState,
      state: applied.transition.nextState,
      ...applied.counts,
    };
  }

  /**
   * The caller's current vote on a target
   */
  async getVoteState(targetType: string, targetId: string, token: string): Promise<VoteStatus> {
    if (!isTargetType(targetType)) {
      throw new InvalidTargetTypeError(targetType);
    }
    const type: TargetType = targetType;

    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }

    // Ledger row and counters are read in one transaction
    return this.unitOfWork.run(async stores => {
      const counts = await voteTargetStore(stores, type).getVoteCounts(targetId);
      if (!counts) {
        throw new NotFoundError(type === 'skill' ? 'Skill' : 'Comment', targetId);
      }

      const existing = await stores.votes.find(identity.agentId, type, targetId);
      return {
        targetType: type,
        targetId,
        state: stateFromDirection(existing ? existing.direction : null),
        ...counts,
      };
    });
  }
}
