import type { VoteAction, VoteDirection, VoteOutcome, VoteState } from '../types.js';

// =============================================================================
// Vote State Machine
// =============================================================================

export interface VoteDelta {
  upvotes: number;
  downvotes: number;
}

export interface VoteTransition {
  nextState: VoteState;
  delta: VoteDelta;
  outcome: VoteOutcome;
}

const NO_CHANGE: VoteDelta = { upvotes: 0, downvotes: 0 };

/**
 * Transition table for a single voter on a single target.
 * Repeating the current vote and cancelling nothing are no-ops.
 */
const TRANSITIONS: Readonly<Record<VoteState, Readonly<Record<VoteAction, VoteTransition>>>> = {
  none: {
    upvote: { nextState: 'upvoted', delta: { upvotes: 1, downvotes: 0 }, outcome: 'voted' },
    downvote: { nextState: 'downvoted', delta: { upvotes: 0, downvotes: 1 }, outcome: 'voted' },
    cancel: { nextState: 'none', delta: NO_CHANGE, outcome: 'no_vote_to_cancel' },
  },
  upvoted: {
    upvote: { nextState: 'upvoted', delta: NO_CHANGE, outcome: 'already_voted' },
    downvote: { nextState: 'downvoted', delta: { upvotes: -1, downvotes: 1 }, outcome: 'changed' },
    cancel: { nextState: 'none', delta: { upvotes: -1, downvotes: 0 }, outcome: 'cancelled' },
  },
  downvoted: {
    upvote: { nextState: 'upvoted', delta: { upvotes: 1, downvotes: -1 }, outcome: 'changed' },
    downvote: { nextState: 'downvoted', delta: NO_CHANGE, outcome: 'already_voted' },
    cancel: { nextState: 'none', delta: { upvotes: 0, downvotes: -1 }, outcome: 'cancelled' },
  },
};

export function computeVoteTransition(state: VoteState, action: VoteAction): VoteTransition {
  return TRANSITIONS[state][action];
}

export function stateFromDirection(direction: VoteDirection | null): VoteState {
  if (direction === 1) return 'upvoted';
  if (direction === -1) return 'downvoted';
  return 'none';
}

export function directionFromState(state: VoteState): VoteDirection | null {
  if (state === 'upvoted') return 1;
  if (state === 'downvoted') return -1;
  return null;
}

export const OUTCOME_MESSAGES: Readonly<Record<VoteOutcome, string>> = {
  voted: 'Vote recorded',
  changed: 'Vote changed',
  cancelled: 'Vote cancelled',
  already_voted: 'Already voted',
  no_vote_to_cancel: 'No vote to cancel',
};
