/**
 * Jurisdiction registry: maps a country name to the builder that turns its
 * reference data into a CalculationStrategy.
 *
 * Builders read every parameter from the reference context, so a missing
 * bracket table or config key raises ConfigurationError for that country.
 */

import {
  getBrackets,
  getConfig,
  getConfigUsd,
  getExchangeRate,
} from '../reference/context'
import type { ReferenceContext } from '../reference/context'
import type { Bracket } from '../model/types'
import { NO_CONTRIBUTION } from './strategy'
import type {
  CalculationStrategy,
  Contribution,
  LevyTier,
  StandardStrategy,
} from './strategy'

export type StrategyBuilder = (ctx: ReferenceContext) => CalculationStrategy

// ── Helpers ──────────────────────────────────────────────────────

const INCOME = 'income'
const SOCIAL = 'social'

function brackets(ctx: ReferenceContext, country: string, scope: string = INCOME): Bracket[] {
  return getBrackets(ctx, country, scope).brackets
}

function flatSocial(ctx: ReferenceContext, country: string, rateKey: string = 'rate'): Contribution {
  return { rate: getConfig(ctx, country, SOCIAL, rateKey) }
}

function incomeCappedSocial(ctx: ReferenceContext, country: string, rateKey = 'rate', capKey = 'cap_lc'): Contribution {
  return { rate: getConfig(ctx, country, SOCIAL, rateKey), incomeCap: getConfigUsd(ctx, country, SOCIAL, capKey) }
}

/** Cap given as a monthly local-currency salary ceiling. */
function monthlyCappedSocial(ctx: ReferenceContext, country: string, rateKey: string, capKey: string): Contribution {
  return { rate: getConfig(ctx, country, SOCIAL, rateKey), incomeCap: getConfigUsd(ctx, country, SOCIAL, capKey) * 12 }
}

/** Cap given as a monthly local-currency contribution ceiling. */
function monthlyAmountCappedSocial(ctx: ReferenceContext, country: string, rateKey: string, capKey: string): Contribution {
  return { rate: getConfig(ctx, country, SOCIAL, rateKey), amountCap: getConfigUsd(ctx, country, SOCIAL, capKey) * 12 }
}

/** Brackets plus a flat social contribution. */
function bracketsPlusSocial(country: string, rateKey: string = 'rate'): StrategyBuilder {
  return (ctx) => ({
    kind: 'standard',
    brackets: brackets(ctx, country),
    social: flatSocial(ctx, country, rateKey),
  })
}

function standard(country: string, build: (ctx: ReferenceContext) => Omit<StandardStrategy, 'kind' | 'brackets'>): StrategyBuilder {
  return (ctx) => ({ kind: 'standard', brackets: brackets(ctx, country), ...build(ctx) })
}

// ── Ontario health premium ───────────────────────────────────────

/** Premium tiers on gross income in CAD; the top tier pays the configured maximum. */
function ontarioHealthPremiumTiers(maxPremium: number): LevyTier[] {
  return [
    { upTo: 20_000, base: 0, from: 0, rate: 0, maxIncrement: 0 },
    { upTo: 36_000, base: 0, from: 20_000, rate: 0.06, maxIncrement: 300 },
    { upTo: 48_000, base: 300, from: 36_000, rate: 0.06, maxIncrement: 150 },
    { upTo: 72_000, base: 450, from: 48_000, rate: 0.0625, maxIncrement: 150 },
    { upTo: 200_000, base: 600, from: 72_000, rate: 0.25, maxIncrement: 300 },
    { upTo: Infinity, base: maxPremium, from: 200_000, rate: 0, maxIncrement: 0 },
  ]
}

// ── Registry ─────────────────────────────────────────────────────

const JURISDICTIONS: Map<string, StrategyBuilder> = new Map<string, StrategyBuilder>([
  ['UK', (ctx) => ({
    kind: 'allowance-taper',
    brackets: brackets(ctx, 'UK'),
    allowance: getConfigUsd(ctx, 'UK', INCOME, 'personal_allowance_lc'),
    taperStart: getConfigUsd(ctx, 'UK', INCOME, 'pa_taper_start_lc'),
    taperRate: getConfig(ctx, 'UK', INCOME, 'pa_taper_rate'),
    payrollBrackets: brackets(ctx, 'UK', 'national_insurance'),
  })],

  ['Canada', (ctx) => ({
    kind: 'tiered-surtax',
    national: {
      brackets: brackets(ctx, 'Canada', 'federal'),
      personalAmount: getConfigUsd(ctx, 'Canada', 'federal', 'personal_amount_lc'),
    },
    regional: {
      brackets: brackets(ctx, 'Canada', 'provincial_ontario'),
      personalAmount: getConfigUsd(ctx, 'Canada', 'provincial_ontario', 'personal_amount_lc'),
    },
    surtaxSteps: [
      {
        threshold: getConfigUsd(ctx, 'Canada', 'provincial_ontario', 'surtax_threshold1_lc'),
        rate: getConfig(ctx, 'Canada', 'provincial_ontario', 'surtax_rate1'),
      },
      {
        threshold: getConfigUsd(ctx, 'Canada', 'provincial_ontario', 'surtax_threshold2_lc'),
        rate: getConfig(ctx, 'Canada', 'provincial_ontario', 'surtax_rate2'),
      },
    ],
    levyTiers: ontarioHealthPremiumTiers(getConfig(ctx, 'Canada', 'provincial_ontario', 'ohp_max_lc')),
    levyFxRate: getExchangeRate(ctx, 'CAD'),
    contributions: [
      { rate: getConfig(ctx, 'Canada', SOCIAL, 'cpp_rate'), amountCap: getConfigUsd(ctx, 'Canada', SOCIAL, 'cpp_max_lc') },
      { rate: getConfig(ctx, 'Canada', SOCIAL, 'ei_rate'), amountCap: getConfigUsd(ctx, 'Canada', SOCIAL, 'ei_max_lc') },
    ],
  })],

  ['Germany', (ctx) => ({
    kind: 'local-tax-on-national',
    brackets: brackets(ctx, 'Germany'),
    localRate: getConfig(ctx, 'Germany', INCOME, 'soli_rate'),
    localThreshold: getConfigUsd(ctx, 'Germany', INCOME, 'soli_threshold_lc'),
    social: incomeCappedSocial(ctx, 'Germany'),
  })],

  ['Switzerland', (ctx) => ({
    kind: 'standard',
    brackets: brackets(ctx, 'Switzerland', 'federal'),
    surchargeRate: getConfig(ctx, 'Switzerland', 'cantonal', 'effective_rate'),
    social: incomeCappedSocial(ctx, 'Switzerland'),
  })],

  ['France', (ctx) => ({
    kind: 'deduction-before-tax',
    brackets: brackets(ctx, 'France'),
    deductionRate: getConfig(ctx, 'France', INCOME, 'professional_deduction_rate'),
    social: flatSocial(ctx, 'France'),
    socialDeductible: false,
  })],

  // Box 1 rates already include social insurance.
  ['Netherlands', (ctx) => ({
    kind: 'standard',
    brackets: brackets(ctx, 'Netherlands'),
    social: NO_CONTRIBUTION,
  })],

  ['India', (ctx) => ({
    kind: 'local-tax-on-national',
    brackets: brackets(ctx, 'India'),
    localRate: getConfig(ctx, 'India', INCOME, 'cess_rate'),
    social: flatSocial(ctx, 'India', 'epf_rate'),
  })],

  ['Australia', bracketsPlusSocial('Australia', 'medicare_rate')],

  ['Singapore', standard('Singapore', (ctx) => ({
    social: monthlyCappedSocial(ctx, 'Singapore', 'cpf_rate', 'cpf_cap_monthly_lc'),
  }))],

  ['Hong Kong', (ctx) => ({
    kind: 'standard-rate-cap',
    brackets: brackets(ctx, 'Hong Kong'),
    allowance: getConfigUsd(ctx, 'Hong Kong', INCOME, 'personal_allowance_lc'),
    standardRate: getConfig(ctx, 'Hong Kong', INCOME, 'standard_rate'),
    social: monthlyCappedSocial(ctx, 'Hong Kong', 'mpf_rate', 'mpf_cap_monthly_lc'),
  })],

  ['Japan', (ctx) => ({
    kind: 'employment-income-deduction',
    brackets: brackets(ctx, 'Japan'),
    deduction: {
      lowThreshold: getConfigUsd(ctx, 'Japan', INCOME, 'employment_deduction_low_threshold_lc'),
      lowAmount: getConfigUsd(ctx, 'Japan', INCOME, 'employment_deduction_low_lc'),
      midRate: getConfig(ctx, 'Japan', INCOME, 'employment_deduction_mid_rate'),
      midAdd: getConfigUsd(ctx, 'Japan', INCOME, 'employment_deduction_mid_add_lc'),
      highThreshold: getConfigUsd(ctx, 'Japan', INCOME, 'employment_deduction_high_threshold_lc'),
      highAmount: getConfigUsd(ctx, 'Japan', INCOME, 'employment_deduction_high_lc'),
    },
    basicExemption: getConfigUsd(ctx, 'Japan', INCOME, 'basic_exemption_lc'),
    nationalSurtaxRate: getConfig(ctx, 'Japan', INCOME, 'reconstruction_surtax_rate'),
    residentRate: getConfig(ctx, 'Japan', INCOME, 'resident_tax_rate'),
    social: monthlyCappedSocial(ctx, 'Japan', 'rate', 'cap_monthly_lc'),
  })],

  ['South Korea', (ctx) => ({
    kind: 'local-tax-on-national',
    brackets: brackets(ctx, 'South Korea'),
    localRate: getConfig(ctx, 'South Korea', INCOME, 'local_tax_rate'),
    social: monthlyCappedSocial(ctx, 'South Korea', 'rate', 'cap_monthly_lc'),
  })],

  ['Israel', bracketsPlusSocial('Israel')],

  ['China', (ctx) => ({
    kind: 'deduction-before-tax',
    brackets: brackets(ctx, 'China'),
    deductionAmount: getConfigUsd(ctx, 'China', INCOME, 'standard_deduction_lc'),
    social: incomeCappedSocial(ctx, 'China'),
    socialDeductible: true,
  })],

  ['Sweden', (ctx) => ({
    kind: 'municipal-state',
    labourMarketRate: 0,
    allowance: 0,
    municipalRate: getConfig(ctx, 'Sweden', INCOME, 'municipal_rate'),
    stateBottomRate: 0,
    stateTopThreshold: getConfigUsd(ctx, 'Sweden', INCOME, 'state_threshold_lc'),
    stateTopRate: getConfig(ctx, 'Sweden', INCOME, 'state_rate'),
    fixedContribution: 0,
    social: incomeCappedSocial(ctx, 'Sweden', 'pension_rate', 'pension_cap_lc'),
  })],

  ['Denmark', (ctx) => ({
    kind: 'municipal-state',
    labourMarketRate: getConfig(ctx, 'Denmark', INCOME, 'am_bidrag_rate'),
    allowance: getConfigUsd(ctx, 'Denmark', INCOME, 'personal_allowance_lc'),
    municipalRate: getConfig(ctx, 'Denmark', INCOME, 'municipal_rate'),
    stateBottomRate: getConfig(ctx, 'Denmark', INCOME, 'state_bottom_rate'),
    stateTopThreshold: getConfigUsd(ctx, 'Denmark', INCOME, 'top_threshold_lc'),
    stateTopRate: getConfig(ctx, 'Denmark', INCOME, 'top_rate'),
    ceiling: getConfig(ctx, 'Denmark', INCOME, 'tax_ceiling'),
    fixedContribution: getConfigUsd(ctx, 'Denmark', SOCIAL, 'atp_annual_lc'),
    social: NO_CONTRIBUTION,
  })],

  ['Norway', (ctx) => ({
    kind: 'municipal-state',
    labourMarketRate: 0,
    allowance: getConfigUsd(ctx, 'Norway', INCOME, 'personal_allowance_lc'),
    municipalRate: getConfig(ctx, 'Norway', INCOME, 'flat_rate'),
    stateBottomRate: 0,
    stateTopThreshold: Infinity,
    stateTopRate: 0,
    fixedContribution: 0,
    stepBrackets: brackets(ctx, 'Norway', 'trinnskatt'),
    social: flatSocial(ctx, 'Norway'),
  })],

  ['Finland', standard('Finland', (ctx) => ({
    surchargeRate: getConfig(ctx, 'Finland', INCOME, 'municipal_rate'),
    social: flatSocial(ctx, 'Finland'),
  }))],

  ['Belgium', (ctx) => ({
    kind: 'local-tax-on-national',
    brackets: brackets(ctx, 'Belgium'),
    allowance: getConfigUsd(ctx, 'Belgium', INCOME, 'personal_allowance_lc'),
    localRate: getConfig(ctx, 'Belgium', INCOME, 'municipal_surcharge_rate'),
    social: flatSocial(ctx, 'Belgium'),
  })],

  ['Austria', standard('Austria', (ctx) => ({ social: incomeCappedSocial(ctx, 'Austria') }))],

  ['Italy', standard('Italy', (ctx) => ({
    surchargeRate: getConfig(ctx, 'Italy', INCOME, 'surcharge_rate'),
    social: flatSocial(ctx, 'Italy'),
  }))],

  ['Spain', standard('Spain', (ctx) => ({
    allowance: getConfigUsd(ctx, 'Spain', INCOME, 'personal_allowance_lc'),
    social: incomeCappedSocial(ctx, 'Spain'),
  }))],

  ['Portugal', bracketsPlusSocial('Portugal')],

  ['Poland', standard('Poland', (ctx) => ({
    allowance: getConfigUsd(ctx, 'Poland', INCOME, 'personal_allowance_lc'),
    social: incomeCappedSocial(ctx, 'Poland'),
    healthRate: getConfig(ctx, 'Poland', SOCIAL, 'health_rate'),
  }))],

  // Two-tier flat split and flat-above-exemption both fit the bracket walk.
  ['Czech Republic', bracketsPlusSocial('Czech Republic')],
  ['Estonia', bracketsPlusSocial('Estonia')],

  ['New Zealand', bracketsPlusSocial('New Zealand', 'acc_rate')],

  ['Taiwan', standard('Taiwan', (ctx) => ({
    allowance: getConfigUsd(ctx, 'Taiwan', INCOME, 'standard_deduction_lc'),
    social: flatSocial(ctx, 'Taiwan'),
  }))],

  ['Saudi Arabia', (ctx) => ({
    kind: 'social-insurance-only',
    social: flatSocial(ctx, 'Saudi Arabia', 'gosi_rate'),
  })],

  ['UAE', () => ({ kind: 'zero-tax' })],

  ['South Africa', standard('South Africa', (ctx) => ({
    credit: getConfigUsd(ctx, 'South Africa', INCOME, 'primary_rebate_lc'),
    social: monthlyAmountCappedSocial(ctx, 'South Africa', 'uif_rate', 'uif_cap_monthly_lc'),
  }))],

  ['Egypt', bracketsPlusSocial('Egypt')],

  ['Brazil', standard('Brazil', (ctx) => ({
    social: monthlyAmountCappedSocial(ctx, 'Brazil', 'inss_rate', 'inss_cap_monthly_lc'),
  }))],

  ['Mexico', bracketsPlusSocial('Mexico', 'imss_rate')],
  ['Chile', bracketsPlusSocial('Chile', 'afp_rate')],
  ['Colombia', bracketsPlusSocial('Colombia')],

  ['Pakistan', (ctx) => ({
    kind: 'standard',
    brackets: brackets(ctx, 'Pakistan'),
    social: NO_CONTRIBUTION,
  })],
])

// ── Public API ───────────────────────────────────────────────────

/** Build the strategy for a listed country, or undefined for an unlisted one. */
export function resolveStrategy(ctx: ReferenceContext, country: string): CalculationStrategy | undefined {
  return JURISDICTIONS.get(country)?.(ctx)
}

/** Countries with a dedicated strategy (the US composite excluded). */
export function getSupportedJurisdictions(): string[] {
  return [...JURISDICTIONS.keys()]
}
