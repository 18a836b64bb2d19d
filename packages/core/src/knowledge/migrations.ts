/**
 * @module knowledge/migrations
 * SQLite schema migrations using user_version pragma for version tracking.
 */

import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  description: string;
  up: string[];
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create problems table',
    up: [
      `CREATE TABLE IF NOT EXISTS problems (
        id          TEXT PRIMARY KEY,
        position    INTEGER NOT NULL,
        aliases     TEXT NOT NULL DEFAULT '[]',
        np_aliases  TEXT NOT NULL DEFAULT '[]',
        answer_en   TEXT NOT NULL,
        answer_np   TEXT,
        auto_fix    INTEGER NOT NULL DEFAULT 0 CHECK (auto_fix IN (0, 1)),
        learned     INTEGER NOT NULL DEFAULT 0 CHECK (learned IN (0, 1)),
        extra       TEXT,
        updated_at  TEXT NOT NULL DEFAULT (datetime('now'))
      )`,
      'CREATE INDEX IF NOT EXISTS idx_problems_position ON problems(position)',
    ],
  },
];

/** Latest schema version known to this build. */
export const SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0);

/**
 * Apply pending migrations to the database.
 * Uses the SQLite `user_version` pragma to track the current schema version.
 */
export function applyMigrations(db: Database.Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true })) || 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      const migrate = db.transaction(() => {
        for (const sql of migration.up) {
          db.exec(sql);
        }
        db.pragma(`user_version = ${migration.version}`);
      });
      migrate();
    }
  }
}
