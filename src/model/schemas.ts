/**
 * Zod runtime validation schemas, mirroring the types in types.ts.
 *
 * Reference tables are validated once on load; scenario and profile input is
 * validated before any simulation work starts.
 *
 * Conventions:
 *  - Money fields ending in K are USD thousands per year.
 *  - Fields ending in Usd are whole USD; fields ending in Lc are local currency.
 *  - Bracket thresholds are stored in local currency; 999999999999 means unbounded.
 */

import { z } from 'zod'
import {
  AID_SCENARIOS,
  AID_TYPES,
  ENGLISH_LEVELS,
  LIFESTYLES,
  LINK_TYPES,
  NODE_TYPES,
  PERFORMANCE_RATINGS,
  QUANT_APTITUDES,
  RISK_TOLERANCES,
} from './types'
import {
  PATH_DEFAULT_TRANSITION_YEAR,
  PATH_HORIZON_YEARS,
  PROGRAM_DEFAULT_DURATION_YEARS,
  PROGRAM_DEFAULT_TRANSITION_YEAR,
  PROGRAM_HORIZON_YEARS,
} from '../projection/constants'

// ── Reusable validators ──────────────────────────────────────────

const rate = z.number().min(0).max(1)
const nonNeg = z.number().min(0, 'Must be non-negative')
const nonEmpty = z.string().min(1)

export const lifestyleSchema = z.enum(LIFESTYLES)
export const aidScenarioSchema = z.enum(AID_SCENARIOS)

// ── Reference tables ─────────────────────────────────────────────

/** Currency code → units of local currency per 1 USD. */
export const exchangeRatesSchema = z.record(
  z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter code'),
  z.number().positive('Exchange rate must be positive'),
)

const rawBracketTableSchema = z.object({
  currency: z.string().regex(/^[A-Z]{3}$/),
  brackets: z
    .array(z.tuple([z.number().positive(), rate]))
    .min(1, 'Bracket table must not be empty')
    .refine(
      (rows) => rows.every((row, i) => i === 0 || row[0] > rows[i - 1][0]),
      'Bracket thresholds must be strictly ascending',
    ),
})

/** country → scope → bracket table */
export const taxBracketsSchema = z.record(nonEmpty, z.record(nonEmpty, rawBracketTableSchema))

/** country → scope → key → scalar */
export const taxConfigSchema = z.record(nonEmpty, z.record(nonEmpty, z.record(nonEmpty, z.number())))

const householdCostsSchema = z.object({
  student: z.number().positive(),
  single: z.number().positive(),
  family: z.number().positive(),
})

export const livingCostProfileSchema = z.object({
  frugal: householdCostsSchema,
  comfortable: householdCostsSchema,
})

export const livingCostsSchema = z.record(nonEmpty, livingCostProfileSchema)

export const livingCostFallbacksSchema = z.object({
  generic: livingCostProfileSchema,
  studyOnly: z.record(nonEmpty, livingCostProfileSchema),
})

export const countryDefaultCitiesSchema = z.record(nonEmpty, nonEmpty)

export const marketMappingsSchema = z.array(
  z.object({
    descriptor: nonEmpty,
    country: nonEmpty,
    city: nonEmpty,
    subJurisdiction: z.string().regex(/^[A-Z]{2}$/).nullable(),
  }),
)

export const regionKeywordsSchema = z.array(
  z.object({
    keyword: nonEmpty.transform((k) => k.toLowerCase()),
    subJurisdiction: z.string().regex(/^[A-Z]{2}$/),
    city: nonEmpty,
  }),
)

// ── Projection entities ──────────────────────────────────────────

export const graduateProgramSchema = z.object({
  id: z.number().int().positive(),
  university: nonEmpty,
  country: nonEmpty,
  programName: nonEmpty,
  field: nonEmpty,
  fundingTier: nonEmpty,
  durationYears: z
    .number()
    .positive()
    .max(PROGRAM_HORIZON_YEARS - 1, 'Program must leave at least one work year')
    .default(PROGRAM_DEFAULT_DURATION_YEARS),
  tuitionK: nonNeg,
  y1K: nonNeg,
  y5K: nonNeg,
  y10K: nonNeg,
  primaryMarket: z.string(),
  aidType: z.enum(AID_TYPES),
  expectedAidK: nonNeg,
  bestCaseAidK: nonNeg,
  coopEarningsK: nonNeg,
  initialCapitalUsd: nonNeg,
})

export const graduateProgramsSchema = z.array(graduateProgramSchema)

export const careerNodeSchema = z.object({
  id: nonEmpty,
  phase: z.number().int().min(0).nullable(),
  label: nonEmpty,
  nodeType: z.enum(NODE_TYPES),
  note: z.string(),
  y1IncomeK: nonNeg.nullable(),
  y5IncomeK: nonNeg.nullable(),
  y10IncomeK: nonNeg.nullable(),
  initialCapitalUsd: nonNeg,
  ongoingCostUsd: nonNeg,
})

export const edgeSchema = z.object({
  id: z.number().int().positive(),
  sourceId: nonEmpty,
  targetId: nonEmpty,
  probability: rate,
  linkType: z.enum(LINK_TYPES),
  note: z.string(),
})

export const careerNodesSchema = z.array(careerNodeSchema)
export const edgesSchema = z.array(edgeSchema)

// ── Scenario configuration ───────────────────────────────────────

const baselineOverrides = {
  baselineSalaryK: z.number().positive().optional(),
  baselineGrowth: z.number().min(-1).optional(),
}

/** Transition year horizon + 1 means "never". */
function transitionYear(horizon: number, fallback: number) {
  return z.number().int().min(1).max(horizon + 1).default(fallback)
}

export const programScenarioSchema = z.object({
  lifestyle: lifestyleSchema.default('frugal'),
  aidScenario: aidScenarioSchema.default('no_aid'),
  familyTransitionYear: transitionYear(PROGRAM_HORIZON_YEARS, PROGRAM_DEFAULT_TRANSITION_YEAR),
  ...baselineOverrides,
})

export const pathScenarioSchema = z.object({
  lifestyle: lifestyleSchema.default('frugal'),
  familyTransitionYear: transitionYear(PATH_HORIZON_YEARS, PATH_DEFAULT_TRANSITION_YEAR),
  ...baselineOverrides,
})

export type ProgramScenarioInput = z.input<typeof programScenarioSchema>
export type ProgramScenario = z.output<typeof programScenarioSchema>
export type PathScenarioInput = z.input<typeof pathScenarioSchema>
export type PathScenario = z.output<typeof pathScenarioSchema>

// ── User profile ─────────────────────────────────────────────────

export const userProfileSchema = z.object({
  yearsExperience: z.number().min(0, 'yearsExperience must be >= 0'),
  performanceRating: z.enum(PERFORMANCE_RATINGS),
  riskTolerance: z.enum(RISK_TOLERANCES),
  availableSavingsUsd: z.number().min(0, 'availableSavingsUsd must be >= 0'),
  englishLevel: z.enum(ENGLISH_LEVELS),
  gpa: z.number().min(0).max(4).nullable(),
  greScore: z.number().int().min(260).max(340).nullable(),
  ieltsScore: z.number().min(0).max(9).nullable(),
  hasPublications: z.boolean(),
  hasFreelanceProfile: z.boolean(),
  hasSideProjects: z.boolean(),
  quantAptitude: z.enum(QUANT_APTITUDES),
  currentSalaryPkr: z.number().int().min(0),
})

/** Partial update: every field optional, and `null` means "leave unchanged". */
export const userProfileUpdateSchema = z
  .object({
    yearsExperience: userProfileSchema.shape.yearsExperience.nullable(),
    performanceRating: userProfileSchema.shape.performanceRating.nullable(),
    riskTolerance: userProfileSchema.shape.riskTolerance.nullable(),
    availableSavingsUsd: userProfileSchema.shape.availableSavingsUsd.nullable(),
    englishLevel: userProfileSchema.shape.englishLevel.nullable(),
    gpa: userProfileSchema.shape.gpa,
    greScore: userProfileSchema.shape.greScore,
    ieltsScore: userProfileSchema.shape.ieltsScore,
    hasPublications: userProfileSchema.shape.hasPublications.nullable(),
    hasFreelanceProfile: userProfileSchema.shape.hasFreelanceProfile.nullable(),
    hasSideProjects: userProfileSchema.shape.hasSideProjects.nullable(),
    quantAptitude: userProfileSchema.shape.quantAptitude.nullable(),
    currentSalaryPkr: userProfileSchema.shape.currentSalaryPkr.nullable(),
  })
  .partial()
  .strict()

export type UserProfileUpdate = z.input<typeof userProfileUpdateSchema>
