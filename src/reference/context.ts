/**
 * Reference context: the immutable lookup tables every engine call reads.
 *
 * Built once by the loader and passed explicitly to every function; nothing
 * in the engine keeps its own module-level copy.
 */

import { ConfigurationError } from '../errors'
import type {
  BracketTable,
  LivingCostProfile,
  MarketLocation,
  RegionKeyword,
} from '../model/types'

export interface HomeJurisdiction {
  /** Country used for the home tax strategy. */
  country: string
  /** Living-cost table key for the home market. */
  city: string
}

export interface ReferenceContext {
  readonly exchangeRates: ReadonlyMap<string, number>
  /** country → scope → brackets with USD thresholds */
  readonly brackets: ReadonlyMap<string, ReadonlyMap<string, BracketTable>>
  /** country → scope → key → scalar (local currency where the key ends in _lc) */
  readonly taxConfig: ReadonlyMap<string, ReadonlyMap<string, ReadonlyMap<string, number>>>
  readonly livingCosts: ReadonlyMap<string, LivingCostProfile>
  readonly genericLivingCosts: LivingCostProfile
  /** University countries without a work market of their own. */
  readonly studyOnlyLivingCosts: ReadonlyMap<string, LivingCostProfile>
  readonly countryDefaultCities: ReadonlyMap<string, string>
  readonly marketMappings: ReadonlyMap<string, MarketLocation>
  readonly regionKeywords: readonly RegionKeyword[]
  readonly home: HomeJurisdiction
}

export const GENERIC_JURISDICTION = '_generic'

// ── Lookups ──────────────────────────────────────────────────────

export function findBrackets(
  ctx: ReferenceContext,
  country: string,
  scope: string,
): BracketTable | undefined {
  return ctx.brackets.get(country)?.get(scope)
}

export function getBrackets(ctx: ReferenceContext, country: string, scope: string): BracketTable {
  const table = findBrackets(ctx, country, scope)
  if (!table) {
    throw new ConfigurationError(`No tax brackets for ${country}/${scope}`, country)
  }
  return table
}

export function findConfig(
  ctx: ReferenceContext,
  country: string,
  scope: string,
  key: string,
): number | undefined {
  return ctx.taxConfig.get(country)?.get(scope)?.get(key)
}

export function getConfig(ctx: ReferenceContext, country: string, scope: string, key: string): number {
  const value = findConfig(ctx, country, scope, key)
  if (value === undefined) {
    throw new ConfigurationError(`No tax config ${country}/${scope}/${key}`, country)
  }
  return value
}

export function getExchangeRate(ctx: ReferenceContext, currency: string): number {
  const rate = ctx.exchangeRates.get(currency)
  if (rate === undefined) {
    throw new ConfigurationError(`No exchange rate for ${currency}`, currency)
  }
  return rate
}

export function toUsd(ctx: ReferenceContext, amountLc: number, currency: string): number {
  return amountLc / getExchangeRate(ctx, currency)
}

/** Local currency of a jurisdiction, taken from its bracket tables. */
export function currencyOf(ctx: ReferenceContext, country: string): string {
  const scopes = ctx.brackets.get(country)
  const first = scopes?.values().next()
  if (!first || first.done) {
    throw new ConfigurationError(`No currency known for ${country}`, country)
  }
  return first.value.currency
}

/** A `_lc` config scalar converted to USD with the jurisdiction's currency. */
export function getConfigUsd(ctx: ReferenceContext, country: string, scope: string, key: string): number {
  return toUsd(ctx, getConfig(ctx, country, scope, key), currencyOf(ctx, country))
}
