/**
 * Database Queries and Operations
 *
 * Every public method catches its own store errors and returns a sentinel
 * (null, 0, [] or false) so a failing query never aborts a run.
 */

import { MIGRATIONS, SCHEMA } from './schema.js';
import type { SqliteDatabase } from './index.js';
import type { Logger } from '../utils/logger.js';
import {
  isPostState,
  type PendingPost,
  type Post,
  type PostListing,
  type PostState,
} from '../types/index.js';

export interface PendingQuery {
  sourceId?: number;
  /** Values <= 0 mean no limit */
  limit?: number;
}

export interface DbStats {
  totalSources: number;
  totalPosts: number;
  postsByState: Record<PostState, number>;
  lastProcessedAt: Date | null;
}

export class PostStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: SqliteDatabase,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'store' });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Schema
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Create tables and indexes if missing, then add any missing columns
   */
  ensureSchema(): boolean {
    try {
      this.db.exec(SCHEMA);

      for (const migration of MIGRATIONS) {
        const columns = this.db
          .prepare<[], { name: string }>(`PRAGMA table_info(${migration.table})`)
          .all();
        if (!columns.some((c) => c.name === migration.column)) {
          this.db.exec(migration.ddl);
          this.logger.info({ table: migration.table, column: migration.column }, 'Column added');
        }
      }

      this.logger.debug('Database schema ensured');
      return true;
    } catch (error) {
      this.logger.error({ error }, 'Failed to initialize schema');
      return false;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Source Operations
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Existing source id for `name`, or the id of a newly created row.
   * Returns null on any store error.
   */
  getOrCreateSource(name: string): number | null {
    try {
      const existing = this.db
        .prepare<[string], { id: number }>('SELECT id FROM sources WHERE name = ?')
        .get(name);

      if (existing) {
        this.logger.debug({ name, sourceId: existing.id }, 'Source already exists');
        return existing.id;
      }

      const info = this.db.prepare<[string]>('INSERT INTO sources (name) VALUES (?)').run(name);
      const sourceId = Number(info.lastInsertRowid);
      this.logger.info({ name, sourceId }, 'New source added');
      return sourceId;
    } catch (error) {
      this.logger.error({ error, name }, 'Failed to get or create source');
      return null;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Post Operations
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Insert new posts as UNPROCESSED. Links already stored are skipped.
   * Returns the number of rows actually inserted.
   */
  insertPosts(sourceId: number, items: readonly PostListing[]): number {
    try {
      const stmt = this.db.prepare<[number, string, string]>(`
        INSERT INTO posts (source_id, title, link)
        VALUES (?, ?, ?)
        ON CONFLICT(link) DO NOTHING
      `);

      const insertAll = this.db.transaction((batch: readonly PostListing[]): number => {
        let inserted = 0;
        for (const item of batch) {
          try {
            inserted += stmt.run(sourceId, item.title, item.link).changes;
          } catch (error) {
            this.logger.error({ error, link: item.link }, 'Failed to insert post');
          }
        }
        return inserted;
      });

      const inserted = insertAll(items);
      this.logger.debug(
        { sourceId, inserted, skipped: items.length - inserted },
        'Posts inserted'
      );
      return inserted;
    } catch (error) {
      this.logger.error({ error, sourceId }, 'Database error during post insertion');
      return 0;
    }
  }

  /**
   * Posts still in the UNPROCESSED state, optionally for one source
   */
  postsPendingAnalysis(query: PendingQuery = {}): PendingPost[] {
    const { sourceId, limit } = query;
    let sql = `SELECT id, link FROM posts WHERE state = 'UNPROCESSED'`;
    const params: number[] = [];

    if (sourceId !== undefined) {
      sql += ' AND source_id = ?';
      params.push(sourceId);
    }
    if (limit !== undefined && limit > 0) {
      sql += ' LIMIT ?';
      params.push(limit);
    }

    try {
      const rows = this.db.prepare<number[], PendingPost>(sql).all(...params);
      this.logger.debug({ sourceId, count: rows.length }, 'Retrieved posts pending analysis');
      return rows;
    } catch (error) {
      this.logger.error({ error, sourceId }, 'Failed to retrieve posts pending analysis');
      return [];
    }
  }

  /**
   * Set a post's state and stamp processed_at with the current time.
   * Returns false when no row was updated.
   */
  setPostState(postId: number, state: PostState, summary?: string): boolean {
    const processedAt = new Date().toISOString();

    try {
      const info = this.db
        .prepare<[string, string, string | null, number]>(`
          UPDATE posts
          SET state = ?, processed_at = ?, summary = ?
          WHERE id = ?
        `)
        .run(state, processedAt, summary ?? null, postId);

      if (info.changes === 0) {
        this.logger.warn({ postId, state }, 'Post not found to update state');
        return false;
      }

      this.logger.debug({ postId, state, processedAt }, 'Post state updated');
      return true;
    } catch (error) {
      this.logger.error({ error, postId, state }, 'Failed to update post state');
      return false;
    }
  }

  getPost(postId: number): Post | null {
    try {
      const row = this.db.prepare<[number], PostRow>('SELECT * FROM posts WHERE id = ?').get(postId);
      return row ? mapPostRow(row) : null;
    } catch (error) {
      this.logger.error({ error, postId }, 'Failed to read post');
      return null;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Statistics
  // ═══════════════════════════════════════════════════════════════════════════

  getStats(): DbStats | null {
    try {
      const totalSources = this.db
        .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM sources')
        .get()?.count ?? 0;

      const stateCounts = this.db
        .prepare<[], { state: string; count: number }>(
          'SELECT state, COUNT(*) as count FROM posts GROUP BY state'
        )
        .all();

      const postsByState: Record<PostState, number> = {
        UNPROCESSED: 0,
        RELEVANT: 0,
        NOT_RELEVANT: 0,
        ERROR: 0,
      };
      let totalPosts = 0;
      for (const row of stateCounts) {
        if (isPostState(row.state)) {
          postsByState[row.state] = row.count;
        }
        totalPosts += row.count;
      }

      const last = this.db
        .prepare<[], { last: string | null }>('SELECT MAX(processed_at) as last FROM posts')
        .get()?.last;

      return {
        totalSources,
        totalPosts,
        postsByState,
        lastProcessedAt: last ? parseTimestamp(last) : null,
      };
    } catch (error) {
      this.logger.error({ error }, 'Failed to read database statistics');
      return null;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Row mapping
// ═══════════════════════════════════════════════════════════════════════════════

interface PostRow {
  id: number;
  source_id: number;
  title: string;
  link: string;
  extracted_at: string;
  processed_at: string | null;
  state: string;
  summary: string | null;
}

function mapPostRow(row: PostRow): Post {
  if (!isPostState(row.state)) {
    throw new Error(`Unknown post state '${row.state}' for post ${row.id}`);
  }
  return {
    id: row.id,
    sourceId: row.source_id,
    title: row.title,
    link: row.link,
    extractedAt: parseTimestamp(row.extracted_at),
    processedAt: row.processed_at ? parseTimestamp(row.processed_at) : null,
    state: row.state,
    summary: row.summary,
  };
}

/**
 * SQLite's datetime('now') is UTC without a zone designator
 */
function parseTimestamp(value: string): Date {
  return /[zZ]|[+-]\d{2}:\d{2}$/.test(value)
    ? new Date(value)
    : new Date(`${value.replace(' ', 'T')}Z`);
}
