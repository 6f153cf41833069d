import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_DIR } from '../../src/config'
import { MissingIncomeDataError, ValidationError } from '../../src/errors'
import {
  adjustInitialCapital,
  parseProgramScenario,
  projectAllPrograms,
  projectProgram,
} from '../../src/projection/program'
import { loadReferenceContext } from '../../src/reference/loader'
import { makeProgram, syntheticContext } from '../fixtures/reference'

const ctx = syntheticContext()

// Seattle (WA, no state tax): 100K gross leaves 80K. Student living 10,
// single 20, family 40. Default: 2 study years at 20K tuition + 10K living,
// then 2 single work years (60) and 8 family work years (40).
const baselineTotalK = 100

describe('parseProgramScenario', () => {
  it('fills defaults', () => {
    expect(parseProgramScenario({})).toEqual({
      lifestyle: 'frugal',
      aidScenario: 'no_aid',
      familyTransitionYear: 5,
    })
  })

  it('rejects a transition year past horizon + 1', () => {
    expect(() => parseProgramScenario({ familyTransitionYear: 14 })).toThrow(ValidationError)
  })
})

describe('projectProgram', () => {
  const result = projectProgram(ctx, makeProgram(), {}, { baselineTotalK })

  it('covers the 12-year horizon with study years first', () => {
    expect(result.yearly).toHaveLength(12)
    expect(result.yearly.map((r) => r.phase)).toEqual([
      'study', 'study',
      'work', 'work', 'work', 'work', 'work', 'work', 'work', 'work', 'work', 'work',
    ])
    expect(result.yearly[0].grossIncomeK).toBe(0)
    expect(result.yearly[1].grossIncomeK).toBe(0)
    expect(result.yearly[2].workYear).toBe(1)
    expect(result.yearly[11].workYear).toBe(10)
  })

  it('charges tuition and student living during study', () => {
    expect(result.yearly[0]).toEqual({
      year: 1,
      phase: 'study',
      workYear: null,
      household: 'student',
      grossIncomeK: 0,
      afterTaxK: 0,
      livingCostK: 10,
      otherCostK: 20,
      netSavingsK: -30,
      cumulativeK: -30,
    })
    expect(result.totalStudyCostK).toBe(60)
    expect(result.studyLivingCostK).toBe(20)
  })

  it('switches household by calendar year', () => {
    expect(result.yearly[2].household).toBe('single')
    expect(result.yearly[3].household).toBe('single')
    expect(result.yearly[4].household).toBe('family')
    expect(result.yearly[4].netSavingsK).toBe(40)
  })

  it('reports net worth against the baseline', () => {
    expect(result.totalWorkSavingsK).toBe(440)
    expect(result.mastersNetworthK).toBe(380)
    expect(result.baselineNetworthK).toBe(100)
    expect(result.netBenefitK).toBe(280)
    expect(result.yearly[11].cumulativeK).toBe(380)
  })

  it('resolves the work market and reports effective tax rates', () => {
    expect(result.location).toEqual({ workCountry: 'USA', workCity: 'Seattle', subJurisdiction: 'WA' })
    expect(result.effectiveTaxRateY1).toBe(0.2)
    expect(result.effectiveTaxRateY10).toBe(0.2)
  })

  it('keeps cumulative equal to the running sum of net savings', () => {
    let running = 0
    for (const row of result.yearly) {
      running += row.netSavingsK
      expect(row.cumulativeK).toBeCloseTo(running, 6)
    }
  })

  it('costs more on a comfortable lifestyle', () => {
    const comfortable = projectProgram(ctx, makeProgram(), { lifestyle: 'comfortable' }, { baselineTotalK })
    // study 2 × (14 + 20); work 2 × 54 + 8 × 28
    expect(comfortable.mastersNetworthK).toBe(264)
  })

  it('never forms a family when the transition is past the horizon', () => {
    const single = projectProgram(ctx, makeProgram(), { familyTransitionYear: 13 }, { baselineTotalK })
    expect(single.mastersNetworthK).toBe(540)
  })

  it('uses at least one whole study year', () => {
    const short = projectProgram(ctx, makeProgram({ durationYears: 1.5 }), {}, { baselineTotalK })
    expect(short.yearly.filter((r) => r.phase === 'study')).toHaveLength(1)
    expect(short.yearly).toHaveLength(12)
    // study 40 + 10; work 3 single years × 60 + 8 family years × 40
    expect(short.mastersNetworthK).toBe(450)
  })

  it('computes its own baseline when none is passed', () => {
    const own = projectProgram(ctx, makeProgram())
    expect(own.netBenefitK).toBeCloseTo(own.mastersNetworthK - own.baselineNetworthK, 1)
  })

  it('rejects a program without income data', () => {
    expect(() => projectProgram(ctx, makeProgram({ y1K: 0, y5K: 50, y10K: 0 }))).toThrow(MissingIncomeDataError)
  })

  describe('aid scenarios', () => {
    it('applies expected aid to tuition and upfront capital', () => {
      const expected = projectProgram(ctx, makeProgram(), { aidScenario: 'expected' }, { baselineTotalK })
      expect(expected.scholarshipAppliedK).toBe(10)
      expect(expected.tuitionK).toBe(30)
      expect(expected.rawTuitionK).toBe(40)
      expect(expected.mastersNetworthK).toBe(390)
      expect(expected.initialCapitalUsd).toBe(17_500)
      expect(expected.initialCapitalBaseUsd).toBe(20_000)
    })

    it('applies best-case aid', () => {
      const best = projectProgram(ctx, makeProgram(), { aidScenario: 'best_case' }, { baselineTotalK })
      expect(best.mastersNetworthK).toBe(410)
      expect(best.initialCapitalUsd).toBe(12_500)
    })

    it('never improves net worth by withdrawing aid', () => {
      const worth = (aidScenario: 'no_aid' | 'expected' | 'best_case') =>
        projectProgram(ctx, makeProgram(), { aidScenario }, { baselineTotalK }).mastersNetworthK
      expect(worth('no_aid')).toBeLessThanOrEqual(worth('expected'))
      expect(worth('expected')).toBeLessThanOrEqual(worth('best_case'))
    })

    it('caps aid at the sticker price', () => {
      const over = projectProgram(ctx, makeProgram({ bestCaseAidK: 50 }), { aidScenario: 'best_case' }, { baselineTotalK })
      expect(over.scholarshipAppliedK).toBe(40)
      expect(over.tuitionK).toBe(0)
      expect(over.initialCapitalUsd).toBe(10_000)
    })

    it('spreads co-op earnings across study years only when aid applies', () => {
      const program = makeProgram({ coopEarningsK: 8 })
      const withCoop = projectProgram(ctx, program, { aidScenario: 'expected' }, { baselineTotalK })
      expect(withCoop.coopEarningsK).toBe(8)
      expect(withCoop.yearly[0].otherCostK).toBe(11)
      expect(withCoop.mastersNetworthK).toBe(398)

      const noAid = projectProgram(ctx, program, { aidScenario: 'no_aid' }, { baselineTotalK })
      expect(noAid.coopEarningsK).toBe(0)
      expect(noAid.mastersNetworthK).toBe(380)
    })

    it('lets co-op earnings outweigh study costs', () => {
      const rich = projectProgram(ctx, makeProgram({ coopEarningsK: 60 }), { aidScenario: 'expected' }, { baselineTotalK })
      expect(rich.yearly[0].otherCostK).toBe(-15)
      expect(rich.yearly[0].netSavingsK).toBe(5)
      expect(rich.mastersNetworthK).toBe(450)
    })
  })
})

describe('adjustInitialCapital', () => {
  const program = makeProgram()

  it('keeps the base figure without aid', () => {
    expect(adjustInitialCapital(program, 'no_aid', 0)).toBe(20_000)
  })

  it('caps capital under guaranteed funding', () => {
    const funded = makeProgram({ aidType: 'guaranteed_funding' })
    expect(adjustInitialCapital(funded, 'expected', 10)).toBe(3_000)
    expect(adjustInitialCapital(funded, 'no_aid', 0)).toBe(20_000)
  })

  it('keeps a base figure already under the guaranteed cap', () => {
    const funded = makeProgram({ aidType: 'guaranteed_funding', initialCapitalUsd: 2_000 })
    expect(adjustInitialCapital(funded, 'best_case', 30)).toBe(2_000)
  })

  it('truncates to whole dollars', () => {
    const odd = makeProgram({ initialCapitalUsd: 10_001 })
    // 5000.5 + 5000.5 × 0.75
    expect(adjustInitialCapital(odd, 'expected', 10)).toBe(8_750)
  })

  it('treats zero tuition as one thousand for the waived share', () => {
    const free = makeProgram({ tuitionK: 0 })
    expect(adjustInitialCapital(free, 'expected', 0)).toBe(20_000)
  })
})

describe('projectAllPrograms', () => {
  const programs = [
    makeProgram({ id: 1 }),
    makeProgram({ id: 2, y1K: 0, y5K: 50, y10K: 0 }),
    makeProgram({ id: 3, tuitionK: 0, field: 'Data' }),
  ]

  it('skips programs without income data and sorts by net benefit', () => {
    const batch = projectAllPrograms(ctx, programs)
    expect(batch.programs.map((p) => p.programId)).toEqual([3, 1])
    expect(batch.summary.total).toBe(2)
    expect(batch.summary.top.map((h) => h.programId)).toEqual([3, 1])
  })

  it('projects every program against one shared baseline', () => {
    const batch = projectAllPrograms(ctx, programs)
    for (const p of batch.programs) {
      expect(p.baselineNetworthK).toBe(batch.baseline.totalNetworthK)
    }
  })

  it('groups by field, highest average first', () => {
    const batch = projectAllPrograms(ctx, programs)
    expect(batch.summary.byField.map((g) => g.key)).toEqual(['Data', 'CS'])
    expect(batch.summary.byWorkCountry).toHaveLength(1)
  })

  it('echoes the assumptions', () => {
    const batch = projectAllPrograms(ctx, programs, { lifestyle: 'comfortable', baselineGrowth: 0 })
    expect(batch.assumptions).toEqual({
      baselineSalaryK: 9.5,
      baselineGrowth: 0,
      horizonYears: 12,
      defaultStudyYears: 2,
      familyTransitionYear: 5,
      lifestyle: 'comfortable',
      aidScenario: 'no_aid',
    })
  })

  it('applies an extra filter', () => {
    const batch = projectAllPrograms(ctx, programs, {}, (p) => p.field === 'CS')
    expect(batch.programs.map((p) => p.programId)).toEqual([1])
  })
})

describe('bundled dataset', () => {
  const data = loadReferenceContext(DEFAULT_DATA_DIR)
  const seattle = makeProgram({
    tuitionK: 50,
    y1K: 180,
    y5K: 250,
    y10K: 350,
    primaryMarket: 'USA (Seattle/National)',
  })

  it('a well-paid Seattle program builds substantial net worth', () => {
    const result = projectProgram(data, seattle)
    expect(result.mastersNetworthK).toBeGreaterThan(500)
    expect(result.netBenefitK).toBeGreaterThan(0)
  })

  it('comfortable living lowers net worth', () => {
    const frugal = projectProgram(data, seattle, { lifestyle: 'frugal' })
    const comfortable = projectProgram(data, seattle, { lifestyle: 'comfortable' })
    expect(comfortable.mastersNetworthK).toBeLessThan(frugal.mastersNetworthK)
  })
})
