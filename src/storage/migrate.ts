/**
 * Database migrations for taskchat.
 *
 * Applies src/storage/migrations/NNNN_description.sql files in name order.
 * The _migrations table records which files have run, so startup can call
 * runMigrations every time.
 */

import {readdirSync, readFileSync} from 'fs'
import {join} from 'path'
import {fileURLToPath} from 'url'
import type {RawDatabase} from './db'
import {Log} from '../util/log'

const log = Log.create({service: 'migrate'})

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url))

export interface MigrationReport {
  applied: string[]
  skipped: string[]
}

function ensureMigrationsTable(db: RawDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `)
}

function getAppliedMigrations(db: RawDatabase): Set<string> {
  const rows = db.prepare<[], {id: string}>('SELECT id FROM _migrations').all()
  return new Set(rows.map((row) => row.id))
}

function getMigrationFiles(dir: string): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
}

/**
 * Run all pending migrations. Each file and its bookkeeping row commit
 * together; a failing file leaves the database at the previous version.
 */
export function runMigrations(db: RawDatabase, dir: string = MIGRATIONS_DIR): MigrationReport {
  const report: MigrationReport = {applied: [], skipped: []}

  ensureMigrationsTable(db)
  const applied = getAppliedMigrations(db)
  const record = db.prepare<[string, string]>(
    'INSERT INTO _migrations (id, applied_at) VALUES (?, ?)',
  )

  for (const filename of getMigrationFiles(dir)) {
    if (applied.has(filename)) {
      report.skipped.push(filename)
      continue
    }

    log.info('applying migration', {migration: filename})
    const sql = readFileSync(join(dir, filename), 'utf-8')

    try {
      db.transaction(() => {
        db.exec(sql)
        record.run(filename, new Date().toISOString())
      })()
    } catch (error) {
      log.error('migration failed', {migration: filename, error})
      throw new Error(`Migration ${filename} failed`, {cause: error})
    }
    report.applied.push(filename)
  }

  if (report.applied.length > 0) {
    log.info('migrations complete', {applied: report.applied.length})
  }

  return report
}
