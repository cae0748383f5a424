// packages/bot/src/services/database.ts - SQLite access
import Database from 'better-sqlite3'
import { createLogger } from '../utils/logger'

const log = createLogger('database')

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    telegram_id INTEGER UNIQUE,
    username TEXT,
    created_at INTEGER
  );

  CREATE TABLE IF NOT EXISTS purchases (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER,
    product_id TEXT,
    plan TEXT,
    provider TEXT,
    provider_ref TEXT,
    amount INTEGER,
    success INTEGER DEFAULT 0,
    created_at INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_purchases_pending
    ON purchases (success, created_at);
`

export function openDatabase(databasePath: string): Database.Database {
  const db = new Database(databasePath)
  db.pragma('journal_mode = WAL')
  db.pragma('busy_timeout = 5000')
  return db
}

/**
 * Runs `fn` against a connection opened for this call only. Statements run
 * in autocommit mode, so each write is durable as soon as it returns.
 */
export function withDatabase<T>(databasePath: string, fn: (db: Database.Database) => T): T {
  const db = openDatabase(databasePath)
  try {
    return fn(db)
  } finally {
    db.close()
  }
}

// Create tables if missing
export function initializeDatabase(databasePath: string): void {
  try {
    withDatabase(databasePath, db => {
      db.exec(SCHEMA)
    })
    log.info({ databasePath }, '✅ Database initialized')
  } catch (error) {
    log.error({ err: error, databasePath }, 'Failed to initialize database')
    throw error
  }
}

export function checkDatabaseConnection(databasePath: string): boolean {
  try {
    return withDatabase(databasePath, db => db.prepare('SELECT 1 AS ok').get() !== undefined)
  } catch (error) {
    log.error({ err: error }, 'Database connection check failed')
    return false
  }
}

export function unixNow(): number {
  return Math.floor(Date.now() / 1000)
}
