import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_DIR } from '../../src/config'
import { householdFor, projectBaseline } from '../../src/projection/baseline'
import { loadReferenceContext } from '../../src/reference/loader'
import { syntheticContext } from '../fixtures/reference'

const ctx = syntheticContext()

// Flat 9.5K salary is untaxed at home; savings are 5.5 single, 3.5 family.
const flat = { baselineGrowth: 0 }

describe('householdFor', () => {
  it('switches to family in the transition year', () => {
    expect(householdFor(4, 5)).toBe('single')
    expect(householdFor(5, 5)).toBe('family')
  })
})

describe('projectBaseline', () => {
  it('produces one row per horizon year', () => {
    const result = projectBaseline(ctx, 12, 5, flat)
    expect(result.yearly).toHaveLength(12)
    expect(result.yearly[0]).toEqual({
      year: 1,
      grossIncomeK: 9.5,
      afterTaxK: 9.5,
      livingCostK: 4,
      household: 'single',
      netSavingsK: 5.5,
      cumulativeK: 5.5,
    })
  })

  it('sums single and family years around the transition', () => {
    expect(projectBaseline(ctx, 12, 5, flat).totalNetworthK).toBe(4 * 5.5 + 8 * 3.5)
  })

  it('treats horizon + 1 as never forming a family', () => {
    expect(projectBaseline(ctx, 12, 5, { ...flat, familyTransitionYear: 13 }).totalNetworthK).toBe(66)
  })

  it('treats year 1 as a family from the start', () => {
    expect(projectBaseline(ctx, 12, 5, { ...flat, familyTransitionYear: 1 }).totalNetworthK).toBe(42)
  })

  it('grows the salary each year and taxes it above the home allowance', () => {
    const { yearly } = projectBaseline(ctx, 10, 3)
    expect(yearly[1].grossIncomeK).toBe(10.26)
    expect(yearly[1].afterTaxK).toBe(10.23)
  })

  it('honours salary and lifestyle overrides', () => {
    const result = projectBaseline(ctx, 1, 2, { baselineSalaryK: 8, lifestyle: 'comfortable' })
    expect(result.totalNetworthK).toBe(3)
  })

  it('final cumulative matches the total', () => {
    const { totalNetworthK, yearly } = projectBaseline(ctx, 12, 5)
    expect(yearly[yearly.length - 1].cumulativeK).toBe(totalNetworthK)
  })

  it('later family transition never lowers the bundled baseline', () => {
    const data = loadReferenceContext(DEFAULT_DATA_DIR)
    let previous = -Infinity
    for (let transition = 1; transition <= 13; transition++) {
      const total = projectBaseline(data, 12, 5, { familyTransitionYear: transition }).totalNetworthK
      expect(total).toBeGreaterThanOrEqual(previous)
      previous = total
    }
  })
})
