/**
 * Query schemas for the service facade. Scenario fields come from the
 * projection schemas; the rest are filters, sorting and paging.
 */

import { z } from 'zod'
import { ValidationError } from '../errors'
import { aidScenarioSchema, pathScenarioSchema, programScenarioSchema } from '../model/schemas'
import { NODE_TYPES } from '../model/types'

export const PROGRAM_SORT_KEYS = ['net_benefit', 'cost', 'y1', 'y10', 'networth', 'initial_capital'] as const
export const PATH_SORT_KEYS = ['net_benefit', 'y1', 'y10', 'networth'] as const

export type ProgramSortKey = (typeof PROGRAM_SORT_KEYS)[number]
export type PathSortKey = (typeof PATH_SORT_KEYS)[number]

const limit = z.number().int().positive().optional()

export const programListQuerySchema = programScenarioSchema.extend({
  field: z.string().min(1).optional(),
  fundingTier: z.string().min(1).optional(),
  workCountry: z.string().min(1).optional(),
  /** Whole USD. */
  maxInitialCapital: z.number().int().min(0).optional(),
  sortBy: z.enum(PROGRAM_SORT_KEYS).default('net_benefit'),
  limit,
  compact: z.boolean().default(false),
})

export const pathListQuerySchema = pathScenarioSchema.extend({
  nodeType: z.enum(NODE_TYPES).optional(),
  leafOnly: z.boolean().default(true),
  sortBy: z.enum(PATH_SORT_KEYS).default('net_benefit'),
  limit,
  compact: z.boolean().default(false),
})

export const affordabilityQuerySchema = z.object({
  /** Whole USD; defaults to the stored profile's savings. */
  availableSavings: z.number().int().min(0).optional(),
  monthlySideIncome: z.number().int().min(0).default(0),
  prepMonths: z.number().int().min(0).default(6),
  aidScenario: aidScenarioSchema.default('expected'),
})

export type ProgramListQuery = z.input<typeof programListQuerySchema>
export type PathListQuery = z.input<typeof pathListQuerySchema>
export type AffordabilityQuery = z.input<typeof affordabilityQuerySchema>

/** Parse with `schema`, turning zod failures into `ValidationError`. */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input ?? {})
  if (!result.success) throw ValidationError.fromZod(`Invalid ${what}`, result.error)
  return result.data
}
