/**
 * Storage: SQLite database and migrations.
 */

export { openDatabase, MEMORY_DB } from './database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrations.js'
