/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Note: This is NOT child_process.exec; it is SQLite's native exec for DDL.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema: index_records',
    up(db) {
      // seq is the insertion order; similarity ties rank by it.
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS index_records (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          doc_id TEXT NOT NULL UNIQUE,
          source TEXT NOT NULL,
          title TEXT NOT NULL,
          content TEXT NOT NULL,
          content_hash TEXT NOT NULL,
          indexed_at TEXT NOT NULL,
          char_count INTEGER NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          dimensions INTEGER NOT NULL,
          embedding BLOB NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_index_records_source ON index_records(source);
      `,
      )
    },
  },
  {
    version: 2,
    description: 'Embedding provenance: detect model changes between syncs',
    up(db) {
      runSQL(
        db,
        `
        ALTER TABLE index_records ADD COLUMN embedding_model TEXT NOT NULL DEFAULT '';
      `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1]?.version ?? 0
