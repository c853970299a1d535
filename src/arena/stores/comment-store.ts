/**
 * Comment Store
 *
 * Threaded comments on skills. Comments are votable targets.
 */

import type { Queryable } from '../../persistence/database.js';
import type { Comment, VoteCounts } from '../types.js';
import { VOTE_DELTA_ASSIGNMENTS, type HotScoreInput, type VoteTargetStore } from './vote-store.js';

// =============================================================================
// Comment Store Interface
// =============================================================================

export interface CommentStore extends VoteTargetStore {
  initialize(): Promise<void>;

  insert(comment: Comment): Promise<void>;

  getById(commentId: string): Promise<Comment | null>;

  /** All comments on a skill, best first, then oldest first */
  listBySkill(skillId: string): Promise<Comment[]>;

  incrementRepliesCount(commentId: string, at: number): Promise<void>;
}

// =============================================================================
// Database Row Type
// =============================================================================

interface CommentRow {
  comment_id: string;
  skill_id: string;
  parent_comment_id: string | null;
  root_comment_id: string;
  thread_id: string;
  author_id: string;
  content: string;
  depth: number;
  upvotes: number;
  downvotes: number;
  vote_score: number;
  hot_score: number;
  replies_count: number;
  created_at: number;
  updated_at: number;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseCommentStore implements CommentStore {
  constructor(private readonly db: Queryable) {}

  async initialize(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS comments (
        comment_id TEXT PRIMARY KEY,
        skill_id TEXT NOT NULL,
        parent_comment_id TEXT,
        root_comment_id TEXT NOT NULL,
        thread_id TEXT NOT NULL,
        author_id TEXT NOT NULL,
        content TEXT NOT NULL,
        depth INTEGER NOT NULL DEFAULT 0,
        upvotes INTEGER NOT NULL DEFAULT 0 CHECK (upvotes >= 0),
        downvotes INTEGER NOT NULL DEFAULT 0 CHECK (downvotes >= 0),
        vote_score INTEGER NOT NULL DEFAULT 0,
        hot_score REAL NOT NULL DEFAULT 0,
        replies_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
    await this.db.query('CREATE INDEX IF NOT EXISTS idx_comments_skill ON comments(skill_id, vote_score)');
    await this.db.query('CREATE INDEX IF NOT EXISTS idx_comments_parent ON comments(parent_comment_id)');
  }

  async insert(comment: Comment): Promise<void> {
    await this.db.query(
      `INSERT INTO comments (
         comment_id, skill_id, parent_comment_id, root_comment_id, thread_id, author_id, content,
         depth, upvotes, downvotes, vote_score, hot_score, replies_count, created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        comment.commentId,
        comment.skillId,
        comment.parentCommentId,
        comment.rootCommentId,
        comment.threadId,
        comment.authorId,
        comment.content,
        comment.depth,
        comment.upvotes,
        comment.downvotes,
        comment.voteScore,
        comment.hotScore,
        comment.repliesCount,
        comment.createdAt,
        comment.updatedAt,
      ]
    );
  }

  async getById(commentId: string): Promise<Comment | null> {
    const result = await this.db.query<CommentRow>('SELECT * FROM comments WHERE comment_id = ?', [commentId]);
    const row = result.rows[0];
    return row ? this.rowToComment(row) : null;
  }

  async listBySkill(skillId: string): Promise<Comment[]> {
    const result = await this.db.query<CommentRow>(
      `SELECT * FROM comments WHERE skill_id = ?
       ORDER BY vote_score DESC, created_at ASC, rowid ASC`,
      [skillId]
    );
    return result.rows.map(row => this.rowToComment(row));
  }

  async incrementRepliesCount(commentId: string, at: number): Promise<void> {
    await this.db.query(
      'UPDATE comments SET replies_count = replies_count + 1, updated_at = ? WHERE comment_id = ?',
      [at, commentId]
    );
  }

  async getVoteCounts(commentId: string): Promise<VoteCounts | null> {
    const result = await this.db.query<{ upvotes: number; downvotes: number; vote_score: number }>(
      'SELECT upvotes, downvotes, vote_score FROM comments WHERE comment_id = ?',
      [commentId]
    );
    const row = result.rows[0];
    return row ? { upvotes: row.upvotes, downvotes: row.downvotes, voteScore: row.vote_score } : null;
  }

  async applyVoteDelta(commentId: string, upvoteDelta: number, downvoteDelta: number, at: number): Promise<void> {
    await this.db.query(
      `UPDATE comments SET ${VOTE_DELTA_ASSIGNMENTS} WHERE comment_id = ?`,
      [upvoteDelta, downvoteDelta, upvoteDelta, downvoteDelta, at, commentId]
    );
  }

  async listHotScoreInputs(): Promise<HotScoreInput[]> {
    const result = await this.db.query<{ comment_id: string; upvotes: number; downvotes: number; created_at: number }>(
      'SELECT comment_id, upvotes, downvotes, created_at FROM comments ORDER BY rowid ASC'
    );
    return result.rows.map(row => ({
      id: row.comment_id,
      upvotes: row.upvotes,
      downvotes: row.downvotes,
      createdAt: row.created_at,
    }));
  }

  async updateHotScore(commentId: string, hotScore: number): Promise<void> {
    await this.db.query('UPDATE comments SET hot_score = ? WHERE comment_id = ?', [hotScore, commentId]);
  }

  private rowToComment(row: CommentRow): Comment {
    return {
      commentId: row.comment_id,
      skillId: row.skill_id,
      parentCommentId: row.parent_comment_id,
      rootCommentId: row.root_comment_id,
      threadId: row.thread_id,
      authorId: row.author_id,
      content: row.content,
      depth: row.depth,
      upvotes: row.upvotes,
      downvotes: row.downvotes,
      voteScore: row.vote_score,
      hotScore: row.hot_score,
      repliesCount: row.replies_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
