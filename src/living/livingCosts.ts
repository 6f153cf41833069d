/**
 * Living-cost resolver: annual cost of living in USD thousands.
 */

import type { HouseholdType, Lifestyle, LivingCostProfile } from '../model/types'
import type { ReferenceContext } from '../reference/context'

/** Study location used for programs taught across several countries. */
export const MULTI_COUNTRY = 'Multi-country'
export const MULTI_COUNTRY_STUDY_LOCATION = 'France'

function fromProfile(profile: LivingCostProfile, household: HouseholdType, lifestyle: Lifestyle): number {
  return profile[lifestyle][household]
}

function defaultCityProfile(ctx: ReferenceContext, country: string): LivingCostProfile | undefined {
  const city = ctx.countryDefaultCities.get(country)
  return city !== undefined ? ctx.livingCosts.get(city) : undefined
}

/**
 * Resolution order: exact city, the country's default city, a study-only
 * country row, then the generic row.
 */
export function annualLivingCost(
  ctx: ReferenceContext,
  city: string,
  household: HouseholdType,
  country?: string | null,
  lifestyle: Lifestyle = 'frugal',
): number {
  const profile =
    ctx.livingCosts.get(city) ??
    (country ? defaultCityProfile(ctx, country) ?? ctx.studyOnlyLivingCosts.get(country) : undefined) ??
    ctx.genericLivingCosts
  return fromProfile(profile, household, lifestyle)
}

export function studyCountryFor(universityCountry: string): string {
  return universityCountry === MULTI_COUNTRY ? MULTI_COUNTRY_STUDY_LOCATION : universityCountry
}

/** Study-phase cost keyed on the university's country rather than a work city. */
export function studyLivingCost(
  ctx: ReferenceContext,
  universityCountry: string,
  household: HouseholdType,
  lifestyle: Lifestyle = 'frugal',
): number {
  const profile =
    ctx.studyOnlyLivingCosts.get(universityCountry) ??
    defaultCityProfile(ctx, universityCountry) ??
    ctx.genericLivingCosts
  return fromProfile(profile, household, lifestyle)
}

export function homeLivingCost(
  ctx: ReferenceContext,
  household: HouseholdType,
  lifestyle: Lifestyle = 'frugal',
): number {
  return annualLivingCost(ctx, ctx.home.city, household, ctx.home.country, lifestyle)
}
