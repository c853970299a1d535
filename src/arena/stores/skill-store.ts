/**
 * Skill Store
 *
 * Skills, their uploaders and the aggregate counters feeds are ranked by
 */

import type { Queryable } from '../../persistence/database.js';
import type { FeedFilter, Skill, SkillVisibility, VoteCounts } from '../types.js';
import { VOTE_DELTA_ASSIGNMENTS, type HotScoreInput, type VoteTargetStore } from './vote-store.js';

// =============================================================================
// Skill Store Interface
// =============================================================================

export interface SkillPageQuery {
  filter: FeedFilter;
  /** SQL expression to sort by, descending */
  orderBy: string;
  limit: number;
  offset: number;
}

export interface ScoredSkill {
  skill: Skill;
  score: number;
  uploaderName: string | null;
  uploaderDisplayName: string | null;
}

export interface SkillTotals {
  totalSkills: number;
  totalUsage: number;
  totalReviews: number;
  totalUploaders: number;
  uniqueUploaders: number;
  averageRating: number;
}

export interface SkillStore extends VoteTargetStore {
  initialize(): Promise<void>;

  insert(skill: Skill): Promise<void>;

  getById(skillId: string): Promise<Skill | null>;

  getByContentHash(contentHash: string): Promise<Skill | null>;

  getByNameAndVersion(name: string, version: string): Promise<Skill | null>;

  /** Number of stored versions of a skill name */
  countVersions(name: string): Promise<number>;

  /** Non-private versions of a skill name, newest first */
  listByName(name: string): Promise<Skill[]>;

  /** Record an uploader; false when already recorded */
  addUploader(skillId: string, agentId: string, at: number): Promise<boolean>;

  hasUploader(skillId: string, agentId: string): Promise<boolean>;

  incrementUploaderCount(skillId: string, at: number): Promise<void>;

  updateRating(skillId: string, rating: number, reviewsCount: number, at: number): Promise<void>;

  /** Add usage and recompute the average response time */
  addUsage(skillId: string, usageCount: number, totalTime: number, at: number): Promise<void>;

  incrementCommentsCount(skillId: string, at: number): Promise<void>;

  incrementDownloadsCount(skillId: string, at: number): Promise<void>;

  /** Aggregates over every stored skill */
  totals(): Promise<SkillTotals>;

  /** One page of public skills with the sort expression's value */
  page(query: SkillPageQuery): Promise<ScoredSkill[]>;

  /** Number of public skills matching the filter */
  count(filter: FeedFilter): Promise<number>;
}

// =============================================================================
// Database Row Type
// =============================================================================

interface SkillRow {
  skill_id: string;
  name: string;
  version: string;
  description: string;
  content_hash: string;
  community: string;
  categories: string;
  visibility: SkillVisibility;
  uploader_id: string;
  uploader_count: number;
  upvotes: number;
  downvotes: number;
  vote_score: number;
  hot_score: number;
  rating: number;
  reviews_count: number;
  usage_count: number;
  total_usage_time: number;
  avg_response_time: number;
  comments_count: number;
  downloads_count: number;
  created_at: number;
  updated_at: number;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

function parseCategories(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((c): c is string => typeof c === 'string') : [];
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseSkillStore implements SkillStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS skills (
        skill_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        version TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        content_hash TEXT NOT NULL UNIQUE,
        community TEXT NOT NULL DEFAULT 'general',
        categories TEXT NOT NULL DEFAULT '[]',
        visibility TEXT NOT NULL DEFAULT 'public',
        uploader_id TEXT NOT NULL,
        uploader_count INTEGER NOT NULL DEFAULT 1,
        upvotes INTEGER NOT NULL DEFAULT 0 CHECK (upvotes >= 0),
        downvotes INTEGER NOT NULL DEFAULT 0 CHECK (downvotes >= 0),
        vote_score INTEGER NOT NULL DEFAULT 0,
        hot_score REAL NOT NULL DEFAULT 0,
        rating REAL NOT NULL DEFAULT 0,
        reviews_count INTEGER NOT NULL DEFAULT 0,
        usage_count INTEGER NOT NULL DEFAULT 0,
        total_usage_time REAL NOT NULL DEFAULT 0,
        avg_response_time REAL NOT NULL DEFAULT 0,
        comments_count INTEGER NOT NULL DEFAULT 0,
        downloads_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS skill_uploaders (
        skill_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (skill_id, agent_id)
      )
    `);

    const indexes: Array<[string, string]> = [
      ['idx_skills_name_version', 'name, version'],
      ['idx_skills_hot', 'hot_score'],
      ['idx_skills_created', 'created_at'],
      ['idx_skills_score', 'vote_score'],
      ['idx_skills_rating', 'rating'],
      ['idx_skills_usage', 'usage_count'],
      ['idx_skills_reviews', 'reviews_count'],
      ['idx_skills_uploaders', 'uploader_count'],
      ['idx_skills_downloads', 'downloads_count'],
      ['idx_skills_community', 'community'],
    ];
    for (const [name, columns] of indexes) {
      await this.db.query(`CREATE INDEX IF NOT EXISTS ${name} ON skills(${columns})`);
    }
  }

  async insert(skill: Skill): Promise<void> {
    await this.db.query(
      `INSERT INTO skills (
         skill_id, name, version, description, content_hash, community, categories, visibility,
         uploader_id, uploader_count, upvotes, downvotes, vote_score, hot_score, rating,
         reviews_count, usage_count, total_usage_time, avg_response_time, comments_count,
         downloads_count, created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        skill.skillId,
        skill.name,
        skill.version,
        skill.description,
        skill.contentHash,
        skill.community,
        JSON.stringify(skill.categories),
        skill.visibility,
        skill.uploaderId,
        skill.uploaderCount,
        skill.upvotes,
        skill.downvotes,
        skill.voteScore,
        skill.hotScore,
        skill.rating,
        skill.reviewsCount,
        skill.usageCount,
        skill.totalUsageTime,
        skill.avgResponseTime,
        skill.commentsCount,
        skill.downloadsCount,
        skill.createdAt,
        skill.updatedAt,
      ]
    );
  }

  async getById(skillId: string): Promise<Skill | null> {
    const result = await this.db.query<SkillRow>('SELECT * FROM skills WHERE skill_id = ?', [skillId]);
    const row = result.rows[0];
    return row ? this.rowToSkill(row) : null;
  }

  async getByContentHash(contentHash: string): Promise<Skill | null> {
    const result = await this.db.query<SkillRow>('SELECT * FROM skills WHERE content_hash = ?', [contentHash]);
    const row = result.rows[0];
    return row ? this.rowToSkill(row) : null;
  }

  async getByNameAndVersion(name: string, version: string): Promise<Skill | null> {
    const result = await this.db.query<SkillRow>(
      'SELECT * FROM skills WHERE name = ? AND version = ? ORDER BY rowid ASC LIMIT 1',
      [name, version]
    );
    const row = result.rows[0];
    return row ? this.rowToSkill(row) : null;
  }

  async countVersions(name: string): Promise<number> {
    const result = await this.db.query<{ count: number }>('SELECT COUNT(*) AS count FROM skills WHERE name = ?', [name]);
    return result.rows[0]?.count ?? 0;
  }

  async listByName(name: string): Promise<Skill[]> {
    const result = await this.db.query<SkillRow>(
      `SELECT * FROM skills WHERE name = ? AND visibility != 'private'
       ORDER BY created_at DESC, rowid DESC`,
      [name]
    );
    return result.rows.map(row => this.rowToSkill(row));
  }

  async addUploader(skillId: string, agentId: string, at: number): Promise<boolean> {
    const result = await this.db.query(
      'INSERT OR IGNORE INTO skill_uploaders (skill_id, agent_id, created_at) VALUES (?, ?, ?)',
      [skillId, agentId, at]
    );
    return result.rowCount > 0;
  }

  async hasUploader(skillId: string, agentId: string): Promise<boolean> {
    const result = await this.db.query<{ found: number }>(
      'SELECT 1 AS found FROM skill_uploaders WHERE skill_id = ? AND agent_id = ?',
      [skillId, agentId]
    );
    return result.rows.length > 0;
  }

  async incrementUploaderCount(skillId: string, at: number): Promise<void> {
    await this.db.query(
      'UPDATE skills SET uploader_count = uploader_count + 1, updated_at = ? WHERE skill_id = ?',
      [at, skillId]
    );
  }

  async getVoteCounts(skillId: string): Promise<VoteCounts | null> {
    const result = await this.db.query<{ upvotes: number; downvotes: number; vote_score: number }>(
      'SELECT upvotes, downvotes, vote_score FROM skills WHERE skill_id = ?',
      [skillId]
    );
    const row = result.rows[0];
    return row ? { upvotes: row.upvotes, downvotes: row.downvotes, voteScore: row.vote_score } : null;
  }

  async applyVoteDelta(skillId: string, upvoteDelta: number, downvoteDelta: number, at: number): Promise<void> {
    await this.db.query(
      `UPDATE skills SET ${VOTE_DELTA_ASSIGNMENTS} WHERE skill_id = ?`,
      [upvoteDelta, downvoteDelta, upvoteDelta, downvoteDelta, at, skillId]
    );
  }

  async listHotScoreInputs(): Promise<HotScoreInput[]> {
    const result = await this.db.query<{ skill_id: string; upvotes: number; downvotes: number; created_at: number }>(
      "SELECT skill_id, upvotes, downvotes, created_at FROM skills WHERE visibility = 'public' ORDER BY rowid ASC"
    );
    return result.rows.map(row => ({
      id: row.skill_id,
      upvotes: row.upvotes,
      downvotes: row.downvotes,
      createdAt: row.created_at,
    }));
  }

  async updateHotScore(skillId: string, hotScore: number): Promise<void> {
    await this.db.query('UPDATE skills SET hot_score = ? WHERE skill_id = ?', [hotScore, skillId]);
  }

  async updateRating(skillId: string, rating: number, reviewsCount: number, at: number): Promise<void> {
    await this.db.query(
      'UPDATE skills SET rating = ?, reviews_count = ?, updated_at = ? WHERE skill_id = ?',
      [rating, reviewsCount, at, skillId]
    );
  }

  async addUsage(skillId: string, usageCount: number, totalTime: number, at: number): Promise<void> {
    await this.db.query(
      `UPDATE skills SET
         usage_count = usage_count + ?,
         total_usage_time = total_usage_time + ?,
         avg_response_time = CASE
           WHEN usage_count + ? > 0 THEN (total_usage_time + ?) / (usage_count + ?)
           ELSE 0
         END,
         updated_at = ?
       WHERE skill_id = ?`,
      [usageCount, totalTime, usageCount, totalTime, usageCount, at, skillId]
    );
  }

  async incrementCommentsCount(skillId: string, at: number): Promise<void> {
    await this.db.query(
      'UPDATE skills SET comments_count = comments_count + 1, updated_at = ? WHERE skill_id = ?',
      [at, skillId]
    );
  }

  async incrementDownloadsCount(skillId: string, at: number): Promise<void> {
    await this.db.query(
      'UPDATE skills SET downloads_count = downloads_count + 1, updated_at = ? WHERE skill_id = ?',
      [at, skillId]
    );
  }

  async totals(): Promise<SkillTotals> {
    const result = await this.db.query<{
      total_skills: number;
      total_usage: number;
      total_reviews: number;
      total_uploaders: number;
      unique_uploaders: number;
      average_rating: number;
    }>(
      `SELECT COUNT(*) AS total_skills,
              COALESCE(SUM(usage_count), 0) AS total_usage,
              COALESCE(SUM(reviews_count), 0) AS total_reviews,
              COALESCE(SUM(uploader_count), 0) AS total_uploaders,
              (SELECT COUNT(DISTINCT agent_id) FROM skill_uploaders) AS unique_uploaders,
              COALESCE(AVG(rating), 0) AS average_rating
       FROM skills`
    );
    const row = result.rows[0];
    return {
      totalSkills: row?.total_skills ?? 0,
      totalUsage: row?.total_usage ?? 0,
      totalReviews: row?.total_reviews ?? 0,
      totalUploaders: row?.total_uploaders ?? 0,
      uniqueUploaders: row?.unique_uploaders ?? 0,
      averageRating: row?.average_rating ?? 0,
    };
  }

  async page(query: SkillPageQuery): Promise<ScoredSkill[]> {
    const { where, params } = this.buildFilter(query.filter);
    // Rank inside the subquery so agent columns never shadow skill columns
    const result = await this.db.query<
      SkillRow & { score: number; uploader_name: string | null; uploader_display_name: string | null }
    >(
      `SELECT ranked.*, a.username AS uploader_name, a.display_name AS uploader_display_name
       FROM (
         SELECT *, ${query.orderBy} AS score, rowid AS position FROM skills
         WHERE ${where}
         ORDER BY score DESC, rowid ASC
         LIMIT ? OFFSET ?
       ) AS ranked
       LEFT JOIN agents a ON a.agent_id = ranked.uploader_id
       ORDER BY ranked.score DESC, ranked.position ASC`,
      [...params, query.limit, query.offset]
    );
    return result.rows.map(row => ({
      skill: this.rowToSkill(row),
      score: row.score,
      uploaderName: row.uploader_name,
      uploaderDisplayName: row.uploader_display_name,
    }));
  }

  async count(filter: FeedFilter): Promise<number> {
    const { where, params } = this.buildFilter(filter);
    const result = await this.db.query<{ count: number }>(
      `SELECT COUNT(*) AS count FROM skills WHERE ${where}`,
      params
    );
    return result.rows[0]?.count ?? 0;
  }

  private buildFilter(filter: FeedFilter): { where: string; params: unknown[] } {
    const conditions: string[] = ["visibility = 'public'"];
    const params: unknown[] = [];

    if (filter.community !== undefined) {
      conditions.push('community = ?');
      params.push(filter.community);
    }
    if (filter.query !== undefined && filter.query.trim() !== '') {
      // LIKE is case-insensitive for ASCII in SQLite
      const pattern = `%${escapeLike(filter.query.trim())}%`;
      conditions.push("(name LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\')");
      params.push(pattern, pattern);
    }
    if (filter.minRating !== undefined) {
      conditions.push('rating >= ?');
      params.push(filter.minRating);
    }
    if (filter.minUsage !== undefined) {
      conditions.push('usage_count >= ?');
      params.push(filter.minUsage);
    }

    return { where: conditions.join(' AND '), params };
  }

  private rowToSkill(row: SkillRow): Skill {
    return {
      skillId: row.skill_id,
      name: row.name,
      version: row.version,
      description: row.description,
      contentHash: row.content_hash,
      community: row.community,
      categories: parseCategories(row.categories),
      visibility: row.visibility,
      uploaderId: row.uploader_id,
      uploaderCount: row.uploader_count,
      upvotes: row.upvotes,
      downvotes: row.downvotes,
      voteScore: row.vote_score,
      hotScore: row.hot_score,
      rating: row.rating,
      reviewsCount: row.reviews_count,
      usageCount: row.usage_count,
      totalUsageTime: row.total_usage_time,
      avgResponseTime: row.avg_response_time,
      commentsCount: row.comments_count,
      downloadsCount: row.downloads_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
