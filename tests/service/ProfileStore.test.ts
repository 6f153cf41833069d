import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import Database from 'better-sqlite3'
import { DEFAULT_PROFILE } from '../../src/calibration/constants'
import { ValidationError } from '../../src/errors'
import type { UserProfile } from '../../src/model/types'
import { ProfileStore, mergeProfile } from '../../src/service/ProfileStore'

// ── Helpers ──────────────────────────────────────────────────────

let tmpDir: string
let dbPath: string
let store: ProfileStore

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'pathfinder-profile-test-'))
  dbPath = join(tmpDir, 'nested', 'profile.db')
  store = new ProfileStore(dbPath)
})

afterEach(() => {
  store.close()
  rmSync(tmpDir, { recursive: true, force: true })
})

// ── Tests ────────────────────────────────────────────────────────

describe('ProfileStore', () => {
  describe('get', () => {
    it('returns the default profile before the first update', () => {
      expect(store.get()).toEqual(DEFAULT_PROFILE)
    })

    it('returns a copy of the default', () => {
      store.get().availableSavingsUsd = 1
      expect(store.get().availableSavingsUsd).toBe(DEFAULT_PROFILE.availableSavingsUsd)
    })
  })

  describe('update', () => {
    it('merges a partial update over the current profile', () => {
      const updated = store.update({ riskTolerance: 'high', hasSideProjects: true })
      expect(updated).toEqual({ ...DEFAULT_PROFILE, riskTolerance: 'high', hasSideProjects: true })
      expect(store.get()).toEqual(updated)
    })

    it('leaves fields sent as null unchanged', () => {
      store.update({ gpa: 3.9 })
      const updated = store.update({ gpa: null, yearsExperience: 4 })
      expect(updated.gpa).toBe(3.9)
      expect(updated.yearsExperience).toBe(4)
    })

    it('persists across reopening the database', () => {
      store.update({ englishLevel: 'native', greScore: 320 })
      store.close()

      store = new ProfileStore(dbPath)
      expect(store.get().englishLevel).toBe('native')
      expect(store.get().greScore).toBe(320)
    })

    it('stamps updated_at', () => {
      store.update({ quantAptitude: 'strong' })
      store.close()

      const raw = new Database(dbPath)
      const row = raw.prepare<[], { updated_at: string | null }>(`SELECT updated_at FROM user_profile`).get()
      raw.close()
      store = new ProfileStore(dbPath)

      expect(row?.updated_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/)
    })

    it('rejects invalid values and keeps the stored profile', () => {
      store.update({ availableSavingsUsd: 12_000 })
      expect(() => store.update({ availableSavingsUsd: -1 })).toThrow(ValidationError)
      expect(() => store.update({ riskTolerance: 'reckless' })).toThrow(ValidationError)
      expect(store.get().availableSavingsUsd).toBe(12_000)
    })

    it('rejects unknown fields', () => {
      expect(() => store.update({ favouriteColour: 'blue' })).toThrow(/Invalid profile update/)
    })

    it('emits profileChanged with the new profile', () => {
      const seen: UserProfile[] = []
      store.on('profileChanged', (p: UserProfile) => seen.push(p))
      store.update({ performanceRating: 'top' })

      expect(seen).toHaveLength(1)
      expect(seen[0].performanceRating).toBe('top')
    })
  })

  it('works in memory', () => {
    const memory = new ProfileStore(':memory:')
    memory.update({ yearsExperience: 7 })
    expect(memory.get().yearsExperience).toBe(7)
    memory.close()
  })
})

describe('mergeProfile', () => {
  it('overlays only non-null fields', () => {
    expect(mergeProfile(DEFAULT_PROFILE, { gpa: null, riskTolerance: 'low', greScore: undefined })).toEqual({
      ...DEFAULT_PROFILE,
      riskTolerance: 'low',
    })
  })
})
