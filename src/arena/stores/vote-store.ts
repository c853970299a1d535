/**
 * Vote Store
 *
 * The vote ledger: at most one row per (agent, target type, target id)
 */

import { randomUUID } from 'crypto';
import type { Queryable } from '../../persistence/database.js';
import type { TargetType, VoteCounts, VoteDirection, VoteRecord } from '../types.js';

// =============================================================================
// Vote Target Interface
// =============================================================================

/**
 * Counter side of a votable entity (skills and comments)
 */
export interface VoteTargetStore {
  /** Current counters, or null when the target does not exist */
  getVoteCounts(targetId: string): Promise<VoteCounts | null>;

  /**
   * Add the deltas to the counters and recompute the score in one statement.
   * Counters are clamped at zero.
   */
  applyVoteDelta(targetId: string, upvoteDelta: number, downvoteDelta: number, at: number): Promise<void>;

  /** Everything the hot score needs, for every rankable row */
  listHotScoreInputs(): Promise<HotScoreInput[]>;

  updateHotScore(targetId: string, hotScore: number): Promise<void>;
}

export interface HotScoreInput {
  id: string;
  upvotes: number;
  downvotes: number;
  createdAt: number;
}

/**
 * SET clause shared by the skill and comment counter updates.
 * Binds (up, down, up, down, updatedAt); the right-hand sides read pre-update values.
 */
export const VOTE_DELTA_ASSIGNMENTS = `upvotes = MAX(upvotes + ?, 0),
          downvotes = MAX(downvotes + ?, 0),
          vote_score = MAX(upvotes + ?, 0) - MAX(downvotes + ?, 0),
          updated_at = ?`;

// =============================================================================
// Vote Store Interface
// =============================================================================

export interface VoteStore {
  initialize(): Promise<void>;

  find(agentId: string, targetType: TargetType, targetId: string): Promise<VoteRecord | null>;

  insert(agentId: string, targetType: TargetType, targetId: string, direction: VoteDirection, at: number): Promise<VoteRecord>;

  updateDirection(voteId: string, direction: VoteDirection, at: number): Promise<void>;

  delete(voteId: string): Promise<void>;
}

// =============================================================================
// Database Row Type
// =============================================================================

interface VoteRow {
  vote_id: string;
  agent_id: string;
  target_type: TargetType;
  target_id: string;
  direction: VoteDirection;
  created_at: number;
  updated_at: number;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseVoteStore implements VoteStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS votes (
        vote_id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL,
        target_type TEXT NOT NULL CHECK (target_type IN ('skill', 'comment')),
        target_id TEXT NOT NULL,
        direction INTEGER NOT NULL CHECK (direction IN (1, -1)),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_votes_agent_target
      ON votes(agent_id, target_type, target_id)
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_votes_target ON votes(target_type, target_id)
    `);
  }

  async find(agentId: string, targetType: TargetType, targetId: string): Promise<VoteRecord | null> {
    const result = await this.db.query<VoteRow>(
      'SELECT * FROM votes WHERE agent_id = ? AND target_type = ? AND target_id = ?',
      [agentId, targetType, targetId]
    );
    const row = result.rows[0];
    return row ? this.rowToRecord(row) : null;
  }

  async insert(
    agentId: string,
    targetType: TargetType,
    targetId: string,
    direction: VoteDirection,
    at: number
  ): Promise<VoteRecord> {
    const record: VoteRecord = {
      voteId: randomUUID(),
      agentId,
      targetType,
      targetId,
      direction,
      createdAt: at,
      updatedAt: at,
    };

    await this.db.query(
      `INSERT INTO votes (vote_id, agent_id, target_type, target_id, direction, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [record.voteId, agentId, targetType, targetId, direction, at, at]
    );

    return record;
  }

  async updateDirection(voteId: string, direction: VoteDirection, at: number): Promise<void> {
    await this.db.query('UPDATE votes SET direction = ?, updated_at = ? WHERE vote_id = ?', [direction, at, voteId]);
  }

  async delete(voteId: string): Promise<void> {
    await this.db.query('DELETE FROM votes WHERE vote_id = ?', [voteId]);
  }

  private rowToRecord(row: VoteRow): VoteRecord {
    return {
      voteId: row.vote_id,
      agentId: row.agent_id,
      targetType: row.target_type,
      targetId: row.target_id,
      direction: row.direction,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
