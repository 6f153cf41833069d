/**
 * Tax engine entry points.
 *
 * Gross and after-tax income are in USD thousands per year; strategies work
 * in whole USD.
 */

import { ValidationError } from '../errors'
import { GENERIC_JURISDICTION, getConfig } from '../reference/context'
import type { ReferenceContext } from '../reference/context'
import { logger } from '../utils/logger'
import { resolveStrategy } from './jurisdictions'
import { applyStrategy } from './strategy'
import { US, usTotalTax } from './us'

const log = logger.child({ component: 'tax-engine' })

/** Total annual tax in whole USD. */
export function annualTax(
  ctx: ReferenceContext,
  gross: number,
  jurisdiction: string,
  subJurisdiction?: string | null,
  city?: string | null,
): number {
  if (jurisdiction === US) return usTotalTax(ctx, gross, subJurisdiction, city)

  const strategy = resolveStrategy(ctx, jurisdiction)
  if (strategy) return applyStrategy(strategy, gross)

  log.debug('Unlisted jurisdiction, using generic effective rate', { jurisdiction })
  return gross * getConfig(ctx, GENERIC_JURISDICTION, 'income', 'effective_rate')
}

/**
 * After-tax annual income in USD thousands, never negative.
 *
 * @param subJurisdiction - US state code; ignored elsewhere
 * @param city - only consulted for the New York City layer
 */
export function afterTaxIncome(
  ctx: ReferenceContext,
  grossK: number,
  jurisdiction: string,
  subJurisdiction?: string | null,
  city?: string | null,
): number {
  if (!Number.isFinite(grossK)) {
    throw new ValidationError('Invalid gross income', [`grossK must be a finite number, got ${grossK}`])
  }
  if (grossK <= 0) return 0

  const gross = grossK * 1000
  const tax = annualTax(ctx, gross, jurisdiction, subJurisdiction, city)
  return Math.max(0, gross - tax) / 1000
}

/** 1 − after-tax / gross, as a fraction; 0 when gross is not positive. */
export function effectiveTaxRate(
  ctx: ReferenceContext,
  grossK: number,
  jurisdiction: string,
  subJurisdiction?: string | null,
  city?: string | null,
): number {
  if (grossK <= 0) return 0
  return 1 - afterTaxIncome(ctx, grossK, jurisdiction, subJurisdiction, city) / grossK
}
