import { describe, it, expect } from 'vitest'
import {
  graduateProgramSchema,
  pathScenarioSchema,
  userProfileSchema,
  userProfileUpdateSchema,
} from '../../src/model/schemas'
import { DEFAULT_PROFILE } from '../../src/calibration/constants'

const program = {
  id: 7,
  university: 'Test University',
  country: 'Germany',
  programName: 'MSc Informatics',
  field: 'CS',
  fundingTier: 'tier_b',
  tuitionK: 0,
  y1K: 60,
  y5K: 80,
  y10K: 100,
  primaryMarket: 'Germany',
  aidType: 'none',
  expectedAidK: 0,
  bestCaseAidK: 0,
  coopEarningsK: 0,
  initialCapitalUsd: 12_000,
}

describe('graduateProgramSchema', () => {
  it('defaults the duration to two years', () => {
    expect(graduateProgramSchema.parse(program).durationYears).toBe(2)
  })

  it('requires at least one work year inside the horizon', () => {
    expect(graduateProgramSchema.safeParse({ ...program, durationYears: 11 }).success).toBe(true)
    expect(graduateProgramSchema.safeParse({ ...program, durationYears: 12 }).success).toBe(false)
  })

  it('rejects negative money and unknown aid types', () => {
    expect(graduateProgramSchema.safeParse({ ...program, tuitionK: -1 }).success).toBe(false)
    expect(graduateProgramSchema.safeParse({ ...program, aidType: 'lottery' }).success).toBe(false)
  })
})

describe('pathScenarioSchema', () => {
  it('fills defaults and keeps baseline overrides', () => {
    expect(pathScenarioSchema.parse({ baselineSalaryK: 12 })).toEqual({
      lifestyle: 'frugal',
      familyTransitionYear: 3,
      baselineSalaryK: 12,
    })
  })

  it('rejects a non-integer transition year', () => {
    expect(pathScenarioSchema.safeParse({ familyTransitionYear: 2.5 }).success).toBe(false)
  })
})

describe('userProfileSchema', () => {
  it('accepts the default profile', () => {
    expect(userProfileSchema.parse(DEFAULT_PROFILE)).toEqual(DEFAULT_PROFILE)
  })

  it('bounds test scores', () => {
    expect(userProfileSchema.safeParse({ ...DEFAULT_PROFILE, greScore: 350 }).success).toBe(false)
    expect(userProfileSchema.safeParse({ ...DEFAULT_PROFILE, ieltsScore: 9.5 }).success).toBe(false)
  })
})

describe('userProfileUpdateSchema', () => {
  it('accepts an empty update and nulls', () => {
    expect(userProfileUpdateSchema.parse({})).toEqual({})
    expect(userProfileUpdateSchema.parse({ riskTolerance: null })).toEqual({ riskTolerance: null })
  })

  it('rejects unknown keys', () => {
    expect(userProfileUpdateSchema.safeParse({ shoeSize: 44 }).success).toBe(false)
  })
})
