/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Knowledge vectors: one row per embedded chunk, scoped by owner',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS knowledge_vectors (
          seq INTEGER PRIMARY KEY AUTOINCREMENT,
          id TEXT NOT NULL,
          owner TEXT NOT NULL,
          chunk_text TEXT NOT NULL,
          dimensions INTEGER NOT NULL,
          embedding BLOB NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          created_at TEXT NOT NULL,
          UNIQUE (owner, id)
        );

        CREATE INDEX IF NOT EXISTS idx_knowledge_vectors_owner ON knowledge_vectors(owner, seq);
      `)
    },
  },
  {
    version: 2,
    description: 'Knowledge generations: the ingestion generation installed per owner',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS knowledge_generations (
          owner TEXT PRIMARY KEY,
          generation_id TEXT NOT NULL,
          source_name TEXT,
          embedding_model TEXT,
          dimensions INTEGER NOT NULL,
          record_count INTEGER NOT NULL,
          completed_at TEXT NOT NULL
        );
      `)
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  db.exec(
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined

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

/** Highest migration version known to this build. */
export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version
