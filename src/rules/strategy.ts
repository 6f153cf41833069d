/**
 * Tax calculation strategies.
 *
 * One variant per family of national tax systems, each carrying only the
 * parameters it needs (already in USD). `applyStrategy` is the single dispatch
 * point; jurisdictions.ts builds a strategy from the reference data.
 */

import type { Bracket } from '../model/types'
import { applyBrackets, withFirstThreshold } from './brackets'

// ── Building blocks ──────────────────────────────────────────────

/** Flat-rate contribution on gross, optionally capped. */
export interface Contribution {
  rate: number
  /** Only income up to this amount is assessed. */
  incomeCap?: number
  /** The contribution itself never exceeds this amount. */
  amountCap?: number
}

export const NO_CONTRIBUTION: Contribution = { rate: 0 }

export function contribution(gross: number, c: Contribution): number {
  const base = c.incomeCap !== undefined ? Math.min(gross, c.incomeCap) : gross
  const amount = base * c.rate
  return c.amountCap !== undefined ? Math.min(amount, c.amountCap) : amount
}

/**
 * One tier of a stepped levy: for income up to `upTo`, the levy is `base`
 * plus `rate` on income above `from`, the increment limited to `maxIncrement`.
 */
export interface LevyTier {
  upTo: number
  base: number
  from: number
  rate: number
  maxIncrement: number
}

export function steppedLevy(income: number, tiers: readonly LevyTier[]): number {
  for (const tier of tiers) {
    if (income <= tier.upTo) {
      return tier.base + Math.min(tier.maxIncrement, Math.max(0, tier.rate * (income - tier.from)))
    }
  }
  return 0
}

/** Surtax on the part of a TAX amount above a threshold. */
export interface SurtaxStep {
  threshold: number
  rate: number
}

// ── Strategy variants ────────────────────────────────────────────

/** Brackets after an optional allowance, minus a credit, plus flat layers on gross. */
export interface StandardStrategy {
  kind: 'standard'
  brackets: Bracket[]
  allowance?: number
  /** Subtracted from bracket tax, floored at 0. */
  credit?: number
  /** Flat rate on gross (municipal or cantonal surcharge). */
  surchargeRate?: number
  social: Contribution
  /** Health contribution on gross minus social contribution. */
  healthRate?: number
}

/** Personal allowance shrinks above a taper start; a second schedule covers payroll insurance. */
export interface AllowanceTaperStrategy {
  kind: 'allowance-taper'
  /** Income brackets whose first threshold is the untapered allowance. */
  brackets: Bracket[]
  allowance: number
  taperStart: number
  /** Allowance lost per unit of income above the taper start. */
  taperRate: number
  payrollBrackets: Bracket[]
}

/** One level of government in a tiered system: bracket tax less a basic credit. */
export interface CreditedLayer {
  brackets: Bracket[]
  /** Basic personal amount; credit = amount × lowest rate. */
  personalAmount: number
}

export interface TieredSurtaxStrategy {
  kind: 'tiered-surtax'
  national: CreditedLayer
  regional: CreditedLayer
  /** Applied to the regional basic tax. */
  surtaxSteps: SurtaxStep[]
  /** Levy tiers in local currency; `levyFxRate` converts gross into it. */
  levyTiers: LevyTier[]
  levyFxRate: number
  contributions: Contribution[]
}

/** Deductions and, optionally, social contribution come off gross before brackets. */
export interface DeductionBeforeTaxStrategy {
  kind: 'deduction-before-tax'
  brackets: Bracket[]
  /** Fraction of gross deducted (professional expenses). */
  deductionRate?: number
  /** Fixed amount deducted. */
  deductionAmount?: number
  social: Contribution
  socialDeductible: boolean
}

export interface EmploymentDeductionTiers {
  lowThreshold: number
  lowAmount: number
  midRate: number
  midAdd: number
  highThreshold: number
  highAmount: number
}

export interface EmploymentIncomeDeductionStrategy {
  kind: 'employment-income-deduction'
  brackets: Bracket[]
  deduction: EmploymentDeductionTiers
  basicExemption: number
  /** Percentage surtax on the national tax. */
  nationalSurtaxRate: number
  /** Flat resident tax on taxable income. */
  residentRate: number
  social: Contribution
}

export interface SocialInsuranceOnlyStrategy {
  kind: 'social-insurance-only'
  social: Contribution
}

export interface ZeroTaxStrategy {
  kind: 'zero-tax'
}

/** Lower of progressive tax after allowance and a flat standard rate on gross. */
export interface StandardRateCapStrategy {
  kind: 'standard-rate-cap'
  brackets: Bracket[]
  allowance: number
  standardRate: number
  social: Contribution
}

/** Local tax as a percentage of the national tax amount. */
export interface LocalTaxOnNationalStrategy {
  kind: 'local-tax-on-national'
  brackets: Bracket[]
  allowance?: number
  localRate: number
  /** Local tax only applies once national tax exceeds this amount. */
  localThreshold?: number
  social: Contribution
}

/** Nordic split: labour-market contribution, municipal and state layers, optional ceiling. */
export interface MunicipalStateStrategy {
  kind: 'municipal-state'
  labourMarketRate: number
  allowance: number
  municipalRate: number
  stateBottomRate: number
  stateTopThreshold: number
  stateTopRate: number
  /** Combined municipal + state tax never exceeds taxable × ceiling. */
  ceiling?: number
  /** Annual flat contribution. */
  fixedContribution: number
  /** Step tax on gross, walked like brackets. */
  stepBrackets?: Bracket[]
  social: Contribution
}

export type CalculationStrategy =
  | StandardStrategy
  | AllowanceTaperStrategy
  | TieredSurtaxStrategy
  | DeductionBeforeTaxStrategy
  | EmploymentIncomeDeductionStrategy
  | SocialInsuranceOnlyStrategy
  | ZeroTaxStrategy
  | StandardRateCapStrategy
  | LocalTaxOnNationalStrategy
  | MunicipalStateStrategy

export type StrategyKind = CalculationStrategy['kind']

// ── Dispatch ─────────────────────────────────────────────────────

/** Total annual tax (income tax plus contributions) in USD for a gross income in USD. */
export function applyStrategy(strategy: CalculationStrategy, gross: number): number {
  switch (strategy.kind) {
    case 'standard':
      return standardTax(strategy, gross)
    case 'allowance-taper':
      return allowanceTaperTax(strategy, gross)
    case 'tiered-surtax':
      return tieredSurtaxTax(strategy, gross)
    case 'deduction-before-tax':
      return deductionBeforeTax(strategy, gross)
    case 'employment-income-deduction':
      return employmentIncomeDeductionTax(strategy, gross)
    case 'social-insurance-only':
      return contribution(gross, strategy.social)
    case 'zero-tax':
      return 0
    case 'standard-rate-cap':
      return standardRateCapTax(strategy, gross)
    case 'local-tax-on-national':
      return localTaxOnNationalTax(strategy, gross)
    case 'municipal-state':
      return municipalStateTax(strategy, gross)
  }
}

// ── Variant implementations ──────────────────────────────────────

function standardTax(s: StandardStrategy, gross: number): number {
  const taxable = Math.max(0, gross - (s.allowance ?? 0))
  const incomeTax = Math.max(0, applyBrackets(taxable, s.brackets) - (s.credit ?? 0))
  const surcharge = gross * (s.surchargeRate ?? 0)
  const social = contribution(gross, s.social)
  const health = (gross - social) * (s.healthRate ?? 0)
  return incomeTax + surcharge + social + health
}

export function taperedAllowance(s: AllowanceTaperStrategy, gross: number): number {
  if (gross <= s.taperStart) return s.allowance
  return Math.max(0, s.allowance - (gross - s.taperStart) * s.taperRate)
}

function allowanceTaperTax(s: AllowanceTaperStrategy, gross: number): number {
  const brackets = withFirstThreshold(s.brackets, taperedAllowance(s, gross))
  return applyBrackets(gross, brackets) + applyBrackets(gross, s.payrollBrackets)
}

function creditedLayerTax(layer: CreditedLayer, gross: number): number {
  const lowestRate = layer.brackets.length > 0 ? layer.brackets[0].rate : 0
  return Math.max(0, applyBrackets(gross, layer.brackets) - layer.personalAmount * lowestRate)
}

function tieredSurtaxTax(s: TieredSurtaxStrategy, gross: number): number {
  const national = creditedLayerTax(s.national, gross)
  const regionalBasic = creditedLayerTax(s.regional, gross)

  let surtax = 0
  for (const step of s.surtaxSteps) {
    if (regionalBasic > step.threshold) surtax += step.rate * (regionalBasic - step.threshold)
  }

  const levy = steppedLevy(gross * s.levyFxRate, s.levyTiers) / s.levyFxRate
  const contributions = s.contributions.reduce((sum, c) => sum + contribution(gross, c), 0)

  return national + regionalBasic + surtax + levy + contributions
}

function deductionBeforeTax(s: DeductionBeforeTaxStrategy, gross: number): number {
  const social = contribution(gross, s.social)
  const taxable = Math.max(
    0,
    gross * (1 - (s.deductionRate ?? 0)) - (s.deductionAmount ?? 0) - (s.socialDeductible ? social : 0),
  )
  return applyBrackets(taxable, s.brackets) + social
}

export function employmentDeduction(tiers: EmploymentDeductionTiers, gross: number): number {
  if (gross < tiers.lowThreshold) return tiers.lowAmount
  if (gross < tiers.highThreshold) return gross * tiers.midRate + tiers.midAdd
  return tiers.highAmount
}

function employmentIncomeDeductionTax(s: EmploymentIncomeDeductionStrategy, gross: number): number {
  const social = contribution(gross, s.social)
  const taxable = Math.max(0, gross - employmentDeduction(s.deduction, gross) - social - s.basicExemption)
  const national = applyBrackets(taxable, s.brackets) * (1 + s.nationalSurtaxRate)
  const resident = taxable * s.residentRate
  return national + resident + social
}

function standardRateCapTax(s: StandardRateCapStrategy, gross: number): number {
  const progressive = applyBrackets(Math.max(0, gross - s.allowance), s.brackets)
  const standard = gross * s.standardRate
  return Math.min(progressive, standard) + contribution(gross, s.social)
}

function localTaxOnNationalTax(s: LocalTaxOnNationalStrategy, gross: number): number {
  const national = applyBrackets(Math.max(0, gross - (s.allowance ?? 0)), s.brackets)
  const local = national > (s.localThreshold ?? 0) ? national * s.localRate : 0
  return national + local + contribution(gross, s.social)
}

function municipalStateTax(s: MunicipalStateStrategy, gross: number): number {
  const labourMarket = gross * s.labourMarketRate
  const taxable = Math.max(0, gross - labourMarket - s.allowance)

  let incomeTax =
    taxable * (s.municipalRate + s.stateBottomRate) +
    Math.max(0, taxable - s.stateTopThreshold) * s.stateTopRate
  if (s.ceiling !== undefined) incomeTax = Math.min(incomeTax, taxable * s.ceiling)

  const step = s.stepBrackets ? applyBrackets(gross, s.stepBrackets) : 0
  return labourMarket + incomeTax + step + s.fixedContribution + contribution(gross, s.social)
}
