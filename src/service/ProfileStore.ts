/**
 * ProfileStore: the single user profile, persisted to SQLite.
 *
 * Reads fall back to the neutral default profile until the first update.
 * Emits `profileChanged` after every successful write.
 */

import { EventEmitter } from 'node:events'
import { existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import type BetterSqlite3 from 'better-sqlite3'
import { DEFAULT_PROFILE } from '../calibration/constants'
import { ValidationError } from '../errors'
import { userProfileSchema, userProfileUpdateSchema } from '../model/schemas'
import type { UserProfile } from '../model/types'
import { logger } from '../utils/logger'
import { runMigrations } from './migrations'

const log = logger.child({ component: 'profile-store' })

interface ProfileRow {
  years_experience: number
  performance_rating: string
  risk_tolerance: string
  available_savings_usd: number
  english_level: string
  gpa: number | null
  gre_score: number | null
  ielts_score: number | null
  has_publications: number
  has_freelance_profile: number
  has_side_projects: number
  quant_aptitude: string
  current_salary_pkr: number
}

function fromRow(row: ProfileRow): UserProfile {
  const result = userProfileSchema.safeParse({
    yearsExperience: row.years_experience,
    performanceRating: row.performance_rating,
    riskTolerance: row.risk_tolerance,
    availableSavingsUsd: row.available_savings_usd,
    englishLevel: row.english_level,
    gpa: row.gpa,
    greScore: row.gre_score,
    ieltsScore: row.ielts_score,
    hasPublications: row.has_publications !== 0,
    hasFreelanceProfile: row.has_freelance_profile !== 0,
    hasSideProjects: row.has_side_projects !== 0,
    quantAptitude: row.quant_aptitude,
    currentSalaryPkr: row.current_salary_pkr,
  })
  if (!result.success) throw ValidationError.fromZod('Stored profile is invalid', result.error)
  return result.data
}

function toRow(profile: UserProfile): ProfileRow {
  return {
    years_experience: profile.yearsExperience,
    performance_rating: profile.performanceRating,
    risk_tolerance: profile.riskTolerance,
    available_savings_usd: profile.availableSavingsUsd,
    english_level: profile.englishLevel,
    gpa: profile.gpa,
    gre_score: profile.greScore,
    ielts_score: profile.ieltsScore,
    has_publications: profile.hasPublications ? 1 : 0,
    has_freelance_profile: profile.hasFreelanceProfile ? 1 : 0,
    has_side_projects: profile.hasSideProjects ? 1 : 0,
    quant_aptitude: profile.quantAptitude,
    current_salary_pkr: profile.currentSalaryPkr,
  }
}

/**
 * Overlay the non-null fields of an update onto a profile.
 * Null and absent fields leave the current value in place.
 */
export function mergeProfile(current: UserProfile, update: Partial<Record<keyof UserProfile, unknown>>): unknown {
  const merged: Record<string, unknown> = { ...current }
  for (const [key, value] of Object.entries(update)) {
    if (value !== null && value !== undefined) merged[key] = value
  }
  return merged
}

export class ProfileStore extends EventEmitter {
  private db: BetterSqlite3.Database
  private selectStmt: BetterSqlite3.Statement<[], ProfileRow>
  private upsertStmt: BetterSqlite3.Statement<[ProfileRow]>

  constructor(dbPath: string) {
    super()
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath)
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
    }

    this.db = new Database(dbPath)
    this.db.pragma('journal_mode = WAL')
    runMigrations(this.db)

    this.selectStmt = this.db.prepare<[], ProfileRow>(`
      SELECT years_experience, performance_rating, risk_tolerance, available_savings_usd,
             english_level, gpa, gre_score, ielts_score, has_publications,
             has_freelance_profile, has_side_projects, quant_aptitude, current_salary_pkr
      FROM user_profile WHERE id = 1
    `)
    this.upsertStmt = this.db.prepare<[ProfileRow]>(`
      INSERT OR REPLACE INTO user_profile (
        id, years_experience, performance_rating, risk_tolerance, available_savings_usd,
        english_level, gpa, gre_score, ielts_score, has_publications,
        has_freelance_profile, has_side_projects, quant_aptitude, current_salary_pkr, updated_at
      ) VALUES (
        1, @years_experience, @performance_rating, @risk_tolerance, @available_savings_usd,
        @english_level, @gpa, @gre_score, @ielts_score, @has_publications,
        @has_freelance_profile, @has_side_projects, @quant_aptitude, @current_salary_pkr, datetime('now')
      )
    `)
  }

  /** The stored profile, or the default profile when none has been saved. */
  get(): UserProfile {
    const row = this.selectStmt.get()
    return row ? fromRow(row) : { ...DEFAULT_PROFILE }
  }

  /**
   * Merge a partial update over the current profile, validate, and persist.
   * Invalid input throws `ValidationError` and leaves the stored row untouched.
   */
  update(input: unknown): UserProfile {
    const parsedUpdate = userProfileUpdateSchema.safeParse(input)
    if (!parsedUpdate.success) throw ValidationError.fromZod('Invalid profile update', parsedUpdate.error)

    const merged = userProfileSchema.safeParse(mergeProfile(this.get(), parsedUpdate.data))
    if (!merged.success) throw ValidationError.fromZod('Invalid profile', merged.error)

    this.upsertStmt.run(toRow(merged.data))
    log.info('Profile updated', { fields: Object.keys(parsedUpdate.data) })
    this.emit('profileChanged', merged.data)
    return merged.data
  }

  close(): void {
    this.db.close()
  }
}
