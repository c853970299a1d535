/**
 * Usage Store
 *
 * Append-only usage reports per (agent, skill)
 */

import type { Queryable } from '../../persistence/database.js';
import type { UsageRecord } from '../types.js';

// =============================================================================
// Usage Store Interface
// =============================================================================

export interface UsageStore {
  initialize(): Promise<void>;

  insert(record: UsageRecord): Promise<void>;

  /** Sum of reported usage of a skill by one agent */
  getTotalUsage(agentId: string, skillId: string): Promise<number>;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseUsageStore implements UsageStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS usage_records (
        usage_id TEXT PRIMARY KEY,
        skill_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        usage_count INTEGER NOT NULL CHECK (usage_count >= 0),
        total_time REAL NOT NULL CHECK (total_time >= 0),
        avg_response_time REAL NOT NULL DEFAULT 0,
        success_rate REAL NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_usage_agent_skill ON usage_records(agent_id, skill_id)
    `);
  }

  async insert(record: UsageRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO usage_records (usage_id, skill_id, agent_id, usage_count, total_time, avg_response_time, success_rate, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        record.usageId,
        record.skillId,
        record.agentId,
        record.usageCount,
        record.totalTime,
        record.avgResponseTime,
        record.successRate,
        record.createdAt,
      ]
    );
  }

  async getTotalUsage(agentId: string, skillId: string): Promise<number> {
    const result = await this.db.query<{ total: number }>(
      'SELECT COALESCE(SUM(usage_count), 0) AS total FROM usage_records WHERE agent_id = ? AND skill_id = ?',
      [agentId, skillId]
    );
    return result.rows[0]?.total ?? 0;
  }
}
