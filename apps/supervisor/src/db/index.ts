import { mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'
import { sql } from 'drizzle-orm'
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3'
import { logger } from '@/logger'
import * as schema from './schema'

export type LeashDb = BetterSQLite3Database<typeof schema>

export interface DbHandle {
  db: LeashDb
  sqlite: Database.Database
  path: string
  close: () => void
}

const schemaSql = readFileSync(fileURLToPath(new URL('./schema.sql', import.meta.url)), 'utf8')

/**
 * Open (and create if needed) the message database. Several processes
 * (supervisor, watchers, worker-side CLI calls) share the file, hence WAL
 * and a generous busy timeout.
 */
export function openDatabase(path: string): DbHandle {
  mkdirSync(dirname(path), { recursive: true })

  const sqlite = new Database(path)
  sqlite.pragma('journal_mode = WAL')
  sqlite.pragma('busy_timeout = 15000')
  sqlite.pragma('synchronous = NORMAL')
  sqlite.exec(schemaSql)

  const db = drizzle({ client: sqlite, schema })
  logger.debug({ path }, 'db_opened')

  return {
    db,
    sqlite,
    path,
    close: () => sqlite.close(),
  }
}

export function checkDbHealth(handle: DbHandle): { ok: boolean } {
  try {
    const row = handle.db.get<{ ok: number }>(sql`select 1 as ok`)
    return { ok: row.ok === 1 }
  } catch (err) {
    logger.error({ err }, 'db_health_failed')
    return { ok: false }
  }
}
