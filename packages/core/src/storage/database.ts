/**
 * SQLite database initialization with WAL mode and migrations.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export interface OpenDatabaseOptions {
  /** How long a statement waits on a locked database before SQLITE_BUSY, in ms. */
  busyTimeoutMs?: number
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true })
  const db = new Database(path, { timeout: options.busyTimeoutMs ?? 5000 })

  // Performance + safety pragmas
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  runMigrations(db)

  return db
}
