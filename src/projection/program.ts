/**
 * Graduate-program track: study abroad, then work in the program's market.
 *
 * Calendar years 1..studyYears are study years (tuition plus student living
 * cost, no income); the remaining years up to the horizon are work years.
 */

import { MissingIncomeDataError, ValidationError } from '../errors'
import { annualLivingCost, studyCountryFor, studyLivingCost } from '../living/livingCosts'
import { resolveMarket } from '../market/marketMapper'
import { programScenarioSchema } from '../model/schemas'
import type { ProgramScenario, ProgramScenarioInput } from '../model/schemas'
import type {
  AidScenario,
  CashFlowYear,
  GraduateProgram,
  ProgramBatchResult,
  ProgramProjection,
} from '../model/types'
import type { ReferenceContext } from '../reference/context'
import { afterTaxIncome, effectiveTaxRate } from '../rules/engine'
import { logger } from '../utils/logger'
import { round2, round4 } from '../utils/math'
import { householdFor, projectBaseline } from './baseline'
import {
  BASELINE_GROWTH,
  BASELINE_SALARY_K,
  CAPITAL_TUITION_SHARE,
  GUARANTEED_FUNDING_CAPITAL_CAP_USD,
  PROGRAM_DEFAULT_DURATION_YEARS,
  PROGRAM_HORIZON_YEARS,
} from './constants'
import { interpolateSalary } from './interpolate'
import { byNetBenefitDesc, countPositive, groupSummary, highlights } from './summary'

const log = logger.child({ component: 'projection' })

// ── Scenario ─────────────────────────────────────────────────────

export function parseProgramScenario(input: unknown = {}): ProgramScenario {
  const result = programScenarioSchema.safeParse(input)
  if (!result.success) throw ValidationError.fromZod('Invalid program scenario', result.error)
  return result.data
}

export function projectProgramBaseline(ctx: ReferenceContext, scenario: ProgramScenario) {
  return projectBaseline(ctx, PROGRAM_HORIZON_YEARS, scenario.familyTransitionYear, scenario)
}

// ── Aid ──────────────────────────────────────────────────────────

/** Aid figure the scenario grants, before capping at sticker price. */
function scenarioAid(program: GraduateProgram, aidScenario: AidScenario): number {
  switch (aidScenario) {
    case 'no_aid':
      return 0
    case 'expected':
      return program.expectedAidK
    case 'best_case':
      return program.bestCaseAidK
  }
}

/**
 * Upfront capital (whole USD) after aid.
 *
 * Guaranteed funding caps it outright. Otherwise the tuition-driven share of
 * the base figure shrinks in proportion to the share of tuition waived; the
 * rest (visa, travel, proof of funds) is unaffected.
 */
export function adjustInitialCapital(
  program: GraduateProgram,
  aidScenario: AidScenario,
  appliedAidK: number,
): number {
  const base = program.initialCapitalUsd
  if (aidScenario === 'no_aid') return base
  if (program.aidType === 'guaranteed_funding') return Math.min(base, GUARANTEED_FUNDING_CAPITAL_CAP_USD)

  const waived = Math.min(1, appliedAidK / Math.max(program.tuitionK, 1))
  const tuitionPart = base * CAPITAL_TUITION_SHARE
  const otherPart = base * (1 - CAPITAL_TUITION_SHARE)
  return Math.trunc(otherPart + tuitionPart * (1 - waived))
}

export function hasProgramIncomeData(program: GraduateProgram): boolean {
  return program.y1K !== 0 || program.y10K !== 0
}

// ── Projection ───────────────────────────────────────────────────

export interface ProjectProgramOptions {
  /** Baseline total for the same scenario; computed when omitted. */
  baselineTotalK?: number
}

export function projectProgram(
  ctx: ReferenceContext,
  program: GraduateProgram,
  scenarioInput: ProgramScenarioInput = {},
  options: ProjectProgramOptions = {},
): ProgramProjection {
  const scenario = parseProgramScenario(scenarioInput)
  if (!hasProgramIncomeData(program)) throw new MissingIncomeDataError(program.id)

  const { lifestyle, aidScenario, familyTransitionYear } = scenario
  const location = resolveMarket(ctx, program.primaryMarket, program.country)
  const { workCountry, workCity, subJurisdiction } = location

  const rawTuition = program.tuitionK
  const appliedAid = Math.min(scenarioAid(program, aidScenario), rawTuition)
  const tuition = Math.max(0, rawTuition - appliedAid)
  const coop = aidScenario === 'no_aid' ? 0 : program.coopEarningsK
  const initialCapital = adjustInitialCapital(program, aidScenario, appliedAid)

  const yearly: CashFlowYear[] = []
  let cumulative = 0
  const push = (row: Omit<CashFlowYear, 'cumulativeK'>) => {
    cumulative += row.netSavingsK
    yearly.push({ ...row, cumulativeK: round2(cumulative) })
  }

  // ── Study phase ──
  const studyYears = Math.max(1, Math.floor(program.durationYears))
  const tuitionPerYear = tuition / studyYears
  const coopPerYear = coop / studyYears
  const studentLiving = studyLivingCost(ctx, studyCountryFor(program.country), 'student', lifestyle)

  let studyLiving = 0
  let totalStudyCost = 0
  for (let year = 1; year <= studyYears; year++) {
    const otherCost = tuitionPerYear - coopPerYear
    const yearCost = studentLiving + otherCost
    studyLiving += studentLiving
    totalStudyCost += yearCost
    push({
      year,
      phase: 'study',
      workYear: null,
      household: 'student',
      grossIncomeK: 0,
      afterTaxK: 0,
      livingCostK: round2(studentLiving),
      otherCostK: round2(otherCost),
      netSavingsK: round2(-yearCost),
    })
  }

  // ── Work phase ──
  let totalWorkSavings = 0
  for (let workYear = 1; workYear <= PROGRAM_HORIZON_YEARS - studyYears; workYear++) {
    const year = studyYears + workYear
    const gross = interpolateSalary(program.y1K, program.y5K, program.y10K, workYear)
    const afterTax = afterTaxIncome(ctx, gross, workCountry, subJurisdiction, workCity)
    const household = householdFor(year, familyTransitionYear)
    const livingCost = annualLivingCost(ctx, workCity, household, workCountry, lifestyle)
    const netSavings = afterTax - livingCost
    totalWorkSavings += netSavings
    push({
      year,
      phase: 'work',
      workYear,
      household,
      grossIncomeK: round2(gross),
      afterTaxK: round2(afterTax),
      livingCostK: round2(livingCost),
      otherCostK: 0,
      netSavingsK: round2(netSavings),
    })
  }

  const mastersNetworth = totalWorkSavings - totalStudyCost
  const baselineTotal = options.baselineTotalK ?? projectProgramBaseline(ctx, scenario).totalNetworthK

  return {
    programId: program.id,
    university: program.university,
    programName: program.programName,
    country: program.country,
    field: program.field,
    fundingTier: program.fundingTier,
    durationYears: program.durationYears,
    location,
    primaryMarket: program.primaryMarket,
    initialCapitalBaseUsd: program.initialCapitalUsd,
    initialCapitalUsd: initialCapital,
    rawTuitionK: rawTuition,
    tuitionK: tuition,
    studyLivingCostK: round2(studyLiving),
    totalStudyCostK: round2(totalStudyCost),
    aidScenario,
    aidType: program.aidType,
    scholarshipAppliedK: appliedAid,
    coopEarningsK: coop,
    expectedAidK: program.expectedAidK,
    bestCaseAidK: program.bestCaseAidK,
    totalWorkSavingsK: round2(totalWorkSavings),
    mastersNetworthK: round2(mastersNetworth),
    baselineNetworthK: round2(baselineTotal),
    netBenefitK: round2(mastersNetworth - baselineTotal),
    effectiveTaxRateY1: round4(effectiveTaxRate(ctx, program.y1K, workCountry, subJurisdiction, workCity)),
    effectiveTaxRateY10: round4(effectiveTaxRate(ctx, program.y10K, workCountry, subJurisdiction, workCity)),
    y1K: program.y1K,
    y5K: program.y5K,
    y10K: program.y10K,
    yearly,
  }
}

// ── Batch ────────────────────────────────────────────────────────

/**
 * Project every program with income data against one shared baseline,
 * sorted by net benefit descending, with grouped summaries.
 */
export function projectAllPrograms(
  ctx: ReferenceContext,
  programs: readonly GraduateProgram[],
  scenarioInput: ProgramScenarioInput = {},
  filter?: (program: GraduateProgram) => boolean,
): ProgramBatchResult {
  const scenario = parseProgramScenario(scenarioInput)
  const baseline = projectProgramBaseline(ctx, scenario)

  const eligible = programs.filter((p) => hasProgramIncomeData(p) && (filter ? filter(p) : true))
  const projected = byNetBenefitDesc(
    eligible.map((p) => projectProgram(ctx, p, scenario, { baselineTotalK: baseline.totalNetworthK })),
  )
  log.debug('Projected programs', {
    total: programs.length,
    projected: projected.length,
    aidScenario: scenario.aidScenario,
  })

  const { top, bottom } = highlights(projected, (r) => ({
    programId: r.programId,
    university: r.university,
    programName: r.programName,
    netBenefitK: r.netBenefitK,
    field: r.field,
    workCountry: r.location.workCountry,
  }))

  return {
    baseline,
    assumptions: {
      baselineSalaryK: scenario.baselineSalaryK ?? BASELINE_SALARY_K,
      baselineGrowth: scenario.baselineGrowth ?? BASELINE_GROWTH,
      horizonYears: PROGRAM_HORIZON_YEARS,
      defaultStudyYears: PROGRAM_DEFAULT_DURATION_YEARS,
      familyTransitionYear: scenario.familyTransitionYear,
      lifestyle: scenario.lifestyle,
      aidScenario: scenario.aidScenario,
    },
    programs: projected,
    summary: {
      total: projected.length,
      positiveCount: countPositive(projected),
      top,
      bottom,
      byTier: groupSummary(projected, (r) => r.fundingTier, (r) => r.netBenefitK),
      byField: groupSummary(projected, (r) => r.field, (r) => r.netBenefitK),
      byWorkCountry: groupSummary(projected, (r) => r.location.workCountry, (r) => r.netBenefitK),
    },
  }
}
