/**
 * SQLite Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Sources Table
-- One row per monitored site
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS sources (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE CHECK (length(name) > 0),
  added_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Posts Table
-- Discovered articles and their classification state
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS posts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_id INTEGER NOT NULL,
  title TEXT NOT NULL,
  link TEXT NOT NULL UNIQUE,
  extracted_at TEXT NOT NULL DEFAULT (datetime('now')),
  processed_at TEXT,
  state TEXT NOT NULL DEFAULT 'UNPROCESSED'
    CHECK (state IN ('UNPROCESSED', 'RELEVANT', 'NOT_RELEVANT', 'ERROR')),
  summary TEXT,
  FOREIGN KEY (source_id) REFERENCES sources(id)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_posts_state_source ON posts(state, source_id);
`;

/**
 * Columns added after the first release, applied when missing
 */
export const MIGRATIONS: { table: string; column: string; ddl: string }[] = [
  { table: 'posts', column: 'summary', ddl: 'ALTER TABLE posts ADD COLUMN summary TEXT' },
];
