/**
 * Download Store
 *
 * Append-only download log per (agent, skill)
 */

import type { Queryable } from '../../persistence/database.js';
import type { DownloadRecord } from '../types.js';

// =============================================================================
// Download Store Interface
// =============================================================================

export interface DownloadStore {
  initialize(): Promise<void>;

  insert(record: DownloadRecord): Promise<void>;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseDownloadStore implements DownloadStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS downloads (
        download_id TEXT PRIMARY KEY,
        skill_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_downloads_skill_time ON downloads(skill_id, created_at)
    `);
    await this.db.query(`
      CREATE INDEX IF NOT EXISTS idx_downloads_agent_skill ON downloads(agent_id, skill_id)
    `);
  }

  async insert(record: DownloadRecord): Promise<void> {
    await this.db.query(
      'INSERT INTO downloads (download_id, skill_id, agent_id, created_at) VALUES (?, ?, ?, ?)',
      [record.downloadId, record.skillId, record.agentId, record.createdAt]
    );
  }
}
