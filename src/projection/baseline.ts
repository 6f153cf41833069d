/**
 * Baseline: staying in the home market on the current salary.
 *
 * One routine serves both tracks; they differ only in horizon and default
 * family-transition year.
 */

import { homeLivingCost } from '../living/livingCosts'
import type { BaselineResult, BaselineYear, HouseholdType, Lifestyle } from '../model/types'
import type { ReferenceContext } from '../reference/context'
import { afterTaxIncome } from '../rules/engine'
import { round2 } from '../utils/math'
import { BASELINE_GROWTH, BASELINE_SALARY_K } from './constants'

export interface BaselineOptions {
  lifestyle?: Lifestyle
  /** First year lived as a family; horizon + 1 means always single. */
  familyTransitionYear?: number
  baselineSalaryK?: number
  baselineGrowth?: number
}

export function householdFor(year: number, familyTransitionYear: number): HouseholdType {
  return year < familyTransitionYear ? 'single' : 'family'
}

export function projectBaseline(
  ctx: ReferenceContext,
  horizonYears: number,
  defaultTransitionYear: number,
  options: BaselineOptions = {},
): BaselineResult {
  const lifestyle = options.lifestyle ?? 'frugal'
  const transition = options.familyTransitionYear ?? defaultTransitionYear
  const growth = options.baselineGrowth ?? BASELINE_GROWTH

  const yearly: BaselineYear[] = []
  let salary = options.baselineSalaryK ?? BASELINE_SALARY_K
  let total = 0

  for (let year = 1; year <= horizonYears; year++) {
    const household = householdFor(year, transition)
    const afterTax = afterTaxIncome(ctx, salary, ctx.home.country)
    const livingCost = homeLivingCost(ctx, household, lifestyle)
    const netSavings = afterTax - livingCost
    total += netSavings

    yearly.push({
      year,
      grossIncomeK: round2(salary),
      afterTaxK: round2(afterTax),
      livingCostK: round2(livingCost),
      household,
      netSavingsK: round2(netSavings),
      cumulativeK: round2(total),
    })

    salary *= 1 + growth
  }

  return { totalNetworthK: round2(total), yearly }
}
