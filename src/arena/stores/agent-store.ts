/**
 * Agent Store
 *
 * Registered agents, looked up by DID
 */

import type { Queryable } from '../../persistence/database.js';
import type { Agent } from '../types.js';

// =============================================================================
// Agent Store Interface
// =============================================================================

export interface AgentStore {
  /** Create tables and indexes */
  initialize(): Promise<void>;

  /** Insert a new agent */
  insert(agent: Agent): Promise<void>;

  getById(agentId: string): Promise<Agent | null>;

  getByDid(did: string): Promise<Agent | null>;

  /** Bump last activity time */
  touch(agentId: string, at: number): Promise<void>;
}

// =============================================================================
// Database Row Type
// =============================================================================

interface AgentRow {
  agent_id: string;
  did: string;
  username: string;
  display_name: string;
  bio: string | null;
  created_at: number;
  last_active_at: number;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseAgentStore implements AgentStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS agents (
        agent_id TEXT PRIMARY KEY,
        did TEXT NOT NULL UNIQUE,
        username TEXT NOT NULL,
        display_name TEXT NOT NULL,
        bio TEXT,
        created_at INTEGER NOT NULL,
        last_active_at INTEGER NOT NULL
      )
    `);
  }

  async insert(agent: Agent): Promise<void> {
    await this.db.query(
      `INSERT INTO agents (agent_id, did, username, display_name, bio, created_at, last_active_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        agent.agentId,
        agent.did,
        agent.username,
        agent.displayName,
        agent.bio,
        agent.createdAt,
        agent.lastActiveAt,
      ]
    );
  }

  async getById(agentId: string): Promise<Agent | null> {
    const result = await this.db.query<AgentRow>('SELECT * FROM agents WHERE agent_id = ?', [agentId]);
    const row = result.rows[0];
    return row ? this.rowToAgent(row) : null;
  }

  async getByDid(did: string): Promise<Agent | null> {
    const result = await this.db.query<AgentRow>('SELECT * FROM agents WHERE did = ?', [did]);
    const row = result.rows[0];
    return row ? this.rowToAgent(row) : null;
  }

  async touch(agentId: string, at: number): Promise<void> {
    await this.db.query('UPDATE agents SET last_active_at = ? WHERE agent_id = ?', [at, agentId]);
  }

  private rowToAgent(row: AgentRow): Agent {
    return {
      agentId: row.agent_id,
      did: row.did,
      username: row.username,
      displayName: row.display_name,
      bio: row.bio,
      createdAt: row.created_at,
      lastActiveAt: row.last_active_at,
    };
  }
}
