/**
 * SQLite database initialization with WAL mode and migrations.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export const MEMORY_DB = ':memory:'

export function openDatabase(path: string): Database.Database {
  if (path !== MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true })
  }
  const db = new Database(path)

  // Performance + safety pragmas
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  runMigrations(db)

  return db
}
