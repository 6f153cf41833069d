/**
 * Market mapper: resolves a free-text "primary market" descriptor into the
 * work location used for tax and living-cost lookups.
 */

import type { MarketLocation } from '../model/types'
import type { ReferenceContext } from '../reference/context'

export const US_PREFIX = 'USA'
export const DEFAULT_US_MARKET: MarketLocation = {
  workCountry: 'USA',
  workCity: 'Bay Area',
  subJurisdiction: 'CA',
}
const DEFAULT_EMPTY_ORIGIN = 'USA'
const UNKNOWN_ORIGIN = 'Unknown'

/** Trim spaces and parentheses from both ends. */
function trimDecoration(text: string): string {
  return text.replace(/^[ ()]+|[ ()]+$/g, '')
}

/** First region keyword contained in the detail wins; table order matters. */
export function parseUsMarket(ctx: ReferenceContext, detail: string): MarketLocation {
  const needle = detail.trim().toLowerCase()
  for (const { keyword, subJurisdiction, city } of ctx.regionKeywords) {
    if (needle.includes(keyword)) {
      return { workCountry: US_PREFIX, workCity: city, subJurisdiction }
    }
  }
  return { ...DEFAULT_US_MARKET }
}

export function resolveMarket(
  ctx: ReferenceContext,
  descriptor: string | null | undefined,
  originCountry?: string | null,
): MarketLocation {
  if (!descriptor) {
    const country = originCountry || DEFAULT_EMPTY_ORIGIN
    return { workCountry: country, workCity: country, subJurisdiction: null }
  }

  const mapped = ctx.marketMappings.get(descriptor)
  if (mapped) return { ...mapped }

  const market = descriptor.trim()
  if (market.startsWith(US_PREFIX)) {
    const detail = trimDecoration(market.split(US_PREFIX).join(''))
    return detail ? parseUsMarket(ctx, detail) : { ...DEFAULT_US_MARKET }
  }

  const country = originCountry || UNKNOWN_ORIGIN
  return {
    workCountry: country,
    workCity: ctx.countryDefaultCities.get(country) ?? country,
    subJurisdiction: null,
  }
}
