/**
 * US composite: federal + state + city income tax + FICA.
 *
 * Kept outside the strategy union because it depends on the caller's
 * sub-jurisdiction and city, not just on gross income.
 */

import {
  findBrackets,
  findConfig,
  getBrackets,
  getConfig,
} from '../reference/context'
import type { ReferenceContext } from '../reference/context'
import { applyBrackets } from './brackets'

export const US = 'USA'
export const DEFAULT_US_STATE = 'CA'
const FEDERAL = 'federal'
const NYC_SCOPE = 'city_NYC'
const NYC_CITY_NAMES: ReadonlySet<string> = new Set(['NYC', 'New York'])

export interface UsTaxBreakdown {
  federal: number
  state: number
  city: number
  socialSecurity: number
  medicare: number
  total: number
}

function stateScope(state: string): string {
  return `state_${state}`
}

/** Social Security up to the wage base plus Medicare with its high-income surtax. */
export function usPayroll(ctx: ReferenceContext, gross: number): { socialSecurity: number; medicare: number } {
  const wageBase = getConfig(ctx, US, FEDERAL, 'ss_wage_base')
  const ssRate = getConfig(ctx, US, FEDERAL, 'ss_rate')
  const medicareRate = getConfig(ctx, US, FEDERAL, 'medicare_rate')
  const surtaxThreshold = getConfig(ctx, US, FEDERAL, 'medicare_surtax_threshold')
  const surtaxRate = getConfig(ctx, US, FEDERAL, 'medicare_surtax_rate')

  const socialSecurity = Math.min(gross, wageBase) * ssRate
  let medicare = gross * medicareRate
  if (gross > surtaxThreshold) medicare += (gross - surtaxThreshold) * surtaxRate
  return { socialSecurity, medicare }
}

export function usTaxBreakdown(
  ctx: ReferenceContext,
  gross: number,
  state: string = DEFAULT_US_STATE,
  city?: string | null,
): UsTaxBreakdown {
  const federalTaxable = Math.max(0, gross - getConfig(ctx, US, FEDERAL, 'standard_deduction'))
  const federal = applyBrackets(federalTaxable, getBrackets(ctx, US, FEDERAL).brackets)

  // States without a bracket table (TX, WA) levy no income tax.
  let stateTax = 0
  let cityTax = 0
  const stateBrackets = findBrackets(ctx, US, stateScope(state))
  if (stateBrackets) {
    const deduction = findConfig(ctx, US, stateScope(state), 'standard_deduction') ?? 0
    const taxable = Math.max(0, gross - deduction)
    stateTax = applyBrackets(taxable, stateBrackets.brackets)
    if (state === 'NY' && city && NYC_CITY_NAMES.has(city)) {
      cityTax = applyBrackets(taxable, getBrackets(ctx, US, NYC_SCOPE).brackets)
    }
  }

  const { socialSecurity, medicare } = usPayroll(ctx, gross)
  return {
    federal,
    state: stateTax,
    city: cityTax,
    socialSecurity,
    medicare,
    total: federal + stateTax + cityTax + socialSecurity + medicare,
  }
}

export function usTotalTax(
  ctx: ReferenceContext,
  gross: number,
  state?: string | null,
  city?: string | null,
): number {
  return usTaxBreakdown(ctx, gross, state ?? DEFAULT_US_STATE, city).total
}
