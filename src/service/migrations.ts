/**
 * Schema versions for the profile database. Each migration runs once; the
 * applied versions are recorded in `schema_migrations`.
 */

import type BetterSqlite3 from 'better-sqlite3'
import { logger } from '../utils/logger'

const log = logger.child({ component: 'migrations' })

// ── Migration definition ────────────────────────────────────────────

export interface Migration {
  version: number
  description: string
  up: (db: BetterSqlite3.Database) => void
}

// ── Built-in migrations ─────────────────────────────────────────────

export const migrations: Migration[] = [
  {
    version: 1,
    description: 'Create user_profile table',
    up(db) {
      db.exec(`
        CREATE TABLE IF NOT EXISTS user_profile (
          id                    INTEGER PRIMARY KEY CHECK (id = 1),
          years_experience      REAL    NOT NULL,
          performance_rating    TEXT    NOT NULL,
          risk_tolerance        TEXT    NOT NULL,
          available_savings_usd REAL    NOT NULL,
          english_level         TEXT    NOT NULL,
          gpa                   REAL,
          gre_score             INTEGER,
          ielts_score           REAL,
          has_publications      INTEGER NOT NULL DEFAULT 0,
          has_freelance_profile INTEGER NOT NULL DEFAULT 0,
          has_side_projects     INTEGER NOT NULL DEFAULT 0,
          quant_aptitude        TEXT    NOT NULL,
          current_salary_pkr    INTEGER NOT NULL
        )
      `)
    },
  },
  {
    version: 2,
    description: 'Add updated_at to user_profile',
    up(db) {
      db.exec(`ALTER TABLE user_profile ADD COLUMN updated_at TEXT`)
    },
  },
]

// ── Public API ──────────────────────────────────────────────────────

/** Highest applied version, 0 on a fresh database. */
export function getCurrentVersion(db: BetterSqlite3.Database): number {
  const row = db.prepare<[], { v: number | null }>(`SELECT MAX(version) AS v FROM schema_migrations`).get()
  return row?.v ?? 0
}

/** Apply every version above the current one, in order, in one transaction. */
export function runMigrations(db: BetterSqlite3.Database, list: readonly Migration[] = migrations): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version     INTEGER PRIMARY KEY,
      applied_at  TEXT NOT NULL DEFAULT (datetime('now')),
      description TEXT
    )
  `)

  const currentVersion = getCurrentVersion(db)
  const pending = list.filter((m) => m.version > currentVersion).sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    log.debug('Profile schema current', { version: currentVersion })
    return
  }

  const insertMigration = db.prepare<[number, string]>(
    `INSERT INTO schema_migrations (version, description) VALUES (?, ?)`,
  )

  const applyAll = db.transaction(() => {
    for (const m of pending) {
      log.info('Migrating profile schema', { version: m.version, description: m.description })
      m.up(db)
      insertMigration.run(m.version, m.description)
    }
  })

  applyAll()

  log.info('Profile schema migrated', {
    from: currentVersion,
    to: pending[pending.length - 1].version,
    applied: pending.length,
  })
}
