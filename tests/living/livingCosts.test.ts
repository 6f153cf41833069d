import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_DIR } from '../../src/config'
import {
  annualLivingCost,
  homeLivingCost,
  studyCountryFor,
  studyLivingCost,
} from '../../src/living/livingCosts'
import { HOUSEHOLD_TYPES } from '../../src/model/types'
import { loadReferenceContext } from '../../src/reference/loader'
import { syntheticContext } from '../fixtures/reference'

const ctx = syntheticContext()

describe('annualLivingCost', () => {
  it('reads the exact city row', () => {
    expect(annualLivingCost(ctx, 'Seattle', 'single')).toBe(20)
    expect(annualLivingCost(ctx, 'Seattle', 'single', 'USA', 'comfortable')).toBe(26)
  })

  it("falls back to the country's default city", () => {
    expect(annualLivingCost(ctx, 'Munich', 'family', 'Germany')).toBe(30)
  })

  it('falls back to a study-only country row', () => {
    expect(annualLivingCost(ctx, 'Beirut', 'single', 'Lebanon')).toBe(9)
  })

  it('falls back to the generic row', () => {
    expect(annualLivingCost(ctx, 'Nowhere', 'single')).toBe(22)
    expect(annualLivingCost(ctx, 'Nowhere', 'family', 'Atlantis', 'comfortable')).toBe(58)
  })
})

describe('studyLivingCost', () => {
  it('prefers the study-only row for the university country', () => {
    expect(studyLivingCost(ctx, 'Lebanon', 'student')).toBe(5)
  })

  it("uses the country's default city otherwise", () => {
    expect(studyLivingCost(ctx, 'USA', 'student')).toBe(10)
    expect(studyLivingCost(ctx, 'USA', 'student', 'comfortable')).toBe(14)
  })

  it('falls back to the generic row', () => {
    expect(studyLivingCost(ctx, 'Atlantis', 'student')).toBe(12)
  })
})

describe('studyCountryFor', () => {
  it('maps multi-country programs to a single study location', () => {
    expect(studyCountryFor('Multi-country')).toBe('France')
    expect(studyCountryFor('Germany')).toBe('Germany')
  })
})

describe('homeLivingCost', () => {
  it('reads the home market row', () => {
    expect(homeLivingCost(ctx, 'single')).toBe(4)
    expect(homeLivingCost(ctx, 'family', 'comfortable')).toBe(8)
  })
})

describe('bundled dataset', () => {
  const data = loadReferenceContext(DEFAULT_DATA_DIR)

  it('costs rise from student to single to family in every city', () => {
    for (const [city, profile] of data.livingCosts) {
      for (const lifestyle of ['frugal', 'comfortable'] as const) {
        const costs = profile[lifestyle]
        expect(costs.student, city).toBeLessThan(costs.single)
        expect(costs.single, city).toBeLessThan(costs.family)
      }
    }
  })

  it('comfortable costs more than frugal for every household', () => {
    for (const [city, profile] of data.livingCosts) {
      for (const household of HOUSEHOLD_TYPES) {
        expect(profile.comfortable[household], city).toBeGreaterThan(profile.frugal[household])
      }
    }
  })

  it('every default city has a city row or a study-only country row', () => {
    for (const [country, city] of data.countryDefaultCities) {
      const covered = data.livingCosts.has(city) || data.studyOnlyLivingCosts.has(country)
      expect(covered, country).toBe(true)
    }
  })
})
