/**
 * Database connection for taskchat storage
 *
 * SQLite through better-sqlite3 with WAL mode for file databases.
 * Queries are synchronous; multi-statement writes run in db.transaction.
 */

import Database from 'better-sqlite3'
import {drizzle, type BetterSQLite3Database} from 'drizzle-orm/better-sqlite3'
import type {BaseSQLiteDatabase} from 'drizzle-orm/sqlite-core'
import * as schema from './schema'

export type DrizzleDB = BetterSQLite3Database<typeof schema>

/**
 * Anything queries can run against: the database itself or an open
 * transaction.
 */
export type Executor = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>

export type RawDatabase = Database.Database

export interface Connection {
  db: DrizzleDB
  raw: RawDatabase
}

/**
 * Open a SQLite connection. `:memory:` gives a private database for tests.
 */
export function openDb(dbPath: string): Connection {
  const raw = new Database(dbPath)

  if (dbPath !== ':memory:') {
    raw.pragma('journal_mode = WAL')
    // Wait up to 5s for locks held by another process
    raw.pragma('busy_timeout = 5000')
  }
  raw.pragma('foreign_keys = ON')

  const db: DrizzleDB = drizzle(raw, {schema})
  return {db, raw}
}
