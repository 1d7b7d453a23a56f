/**
 * Storage: SQLite database and migrations.
 */

export { openDatabase } from './database.js'
export type { OpenDatabaseOptions } from './database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrations.js'
