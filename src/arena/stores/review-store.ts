/**
 * Review Store
 *
 * Immutable weighted reviews, one per (agent, skill)
 */

import type { Queryable } from '../../persistence/database.js';
import type { ReviewRecord } from '../types.js';

// =============================================================================
// Review Store Interface
// =============================================================================

export interface ReviewAggregate {
  weightedSum: number;
  totalWeight: number;
  count: number;
}

export interface ReviewStore {
  initialize(): Promise<void>;

  /** Raises a unique-constraint DatabaseError when the agent already reviewed the skill */
  insert(review: ReviewRecord): Promise<void>;

  findByAgentAndSkill(agentId: string, skillId: string): Promise<ReviewRecord | null>;

  /** Creation times of the agent's newest reviews across all skills, newest first */
  recentTimestamps(agentId: string, limit: number): Promise<number[]>;

  aggregate(skillId: string): Promise<ReviewAggregate>;

  listBySkill(skillId: string, limit: number): Promise<ReviewRecord[]>;
}

// =============================================================================
// Database Row Type
// =============================================================================

interface ReviewRow {
  review_id: string;
  skill_id: string;
  agent_id: string;
  rating: number;
  usage_count_at_review: number;
  weight: number;
  damped: number;
  comment: string | null;
  created_at: number;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseReviewStore implements ReviewStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS reviews (
        review_id TEXT PRIMARY KEY,
        skill_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        rating REAL NOT NULL CHECK (rating >= 0 AND rating <= 100),
        usage_count_at_review INTEGER NOT NULL,
        weight REAL NOT NULL,
        damped INTEGER NOT NULL DEFAULT 0,
        comment TEXT,
        created_at INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_reviews_agent_skill ON reviews(agent_id, skill_id)
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_reviews_agent_time ON reviews(agent_id, created_at)
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_reviews_skill_time ON reviews(skill_id, created_at)
    `);
  }

  async insert(review: ReviewRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO reviews (review_id, skill_id, agent_id, rating, usage_count_at_review, weight, damped, comment, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        review.reviewId,
        review.skillId,
        review.agentId,
        review.rating,
        review.usageCountAtReview,
        review.weight,
        review.damped,
        review.comment,
        review.createdAt,
      ]
    );
  }

  async findByAgentAndSkill(agentId: string, skillId: string): Promise<ReviewRecord | null> {
    const result = await this.db.query<ReviewRow>(
      'SELECT * FROM reviews WHERE agent_id = ? AND skill_id = ?',
      [agentId, skillId]
    );
    const row = result.rows[0];
    return row ? this.rowToRecord(row) : null;
  }

  async recentTimestamps(agentId: string, limit: number): Promise<number[]> {
    const result = await this.db.query<{ created_at: number }>(
      'SELECT created_at FROM reviews WHERE agent_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
      [agentId, limit]
    );
    return result.rows.map(row => row.created_at);
  }

  async aggregate(skillId: string): Promise<ReviewAggregate> {
    const result = await this.db.query<{ weighted_sum: number; total_weight: number; count: number }>(
      `SELECT COALESCE(SUM(rating * weight), 0) AS weighted_sum,
              COALESCE(SUM(weight), 0) AS total_weight,
              COUNT(*) AS count
       FROM reviews WHERE skill_id = ?`,
      [skillId]
    );
    const row = result.rows[0];
    return {
      weightedSum: row?.weighted_sum ?? 0,
      totalWeight: row?.total_weight ?? 0,
      count: row?.count ?? 0,
    };
  }

  async listBySkill(skillId: string, limit: number): Promise<ReviewRecord[]> {
    const result = await this.db.query<ReviewRow>(
      'SELECT * FROM reviews WHERE skill_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
      [skillId, limit]
    );
    return result.rows.map(row => this.rowToRecord(row));
  }

  private rowToRecord(row: ReviewRow): ReviewRecord {
    return {
      reviewId: row.review_id,
      skillId: row.skill_id,
      agentId: row.agent_id,
      rating: row.rating,
      usageCountAtReview: row.usage_count_at_review,
      weight: row.weight,
      damped: row.damped === 1,
      comment: row.comment,
      createdAt: row.created_at,
    };
  }
}
