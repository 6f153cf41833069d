/**
 * Reference dataset loader.
 *
 * Reads the JSON tables under the data directory, validates them, converts
 * bracket thresholds to USD and returns an immutable ReferenceContext.
 */

import { readFileSync } from 'node:fs'
import path from 'node:path'
import type { z } from 'zod'
import { ValidationError } from '../errors'
import {
  careerNodesSchema,
  countryDefaultCitiesSchema,
  edgesSchema,
  exchangeRatesSchema,
  graduateProgramsSchema,
  livingCostFallbacksSchema,
  livingCostsSchema,
  marketMappingsSchema,
  regionKeywordsSchema,
  taxBracketsSchema,
  taxConfigSchema,
} from '../model/schemas'
import type {
  Bracket,
  BracketTable,
  DecisionGraph,
  GraduateProgram,
  LivingCostProfile,
  MarketLocation,
} from '../model/types'
import { logger } from '../utils/logger'
import type { HomeJurisdiction, ReferenceContext } from './context'

const log = logger.child({ component: 'reference' })

/** Stored upper threshold that stands for "no upper bound". */
export const UNBOUNDED_SENTINEL = 999_999_999_999

export const DATA_FILES = {
  exchangeRates: 'exchange-rates.json',
  taxBrackets: 'tax-brackets.json',
  taxConfig: 'tax-config.json',
  livingCosts: 'living-costs.json',
  livingCostFallbacks: 'living-cost-fallbacks.json',
  countryDefaultCities: 'country-default-cities.json',
  marketMappings: 'market-mappings.json',
  regionKeywords: 'region-keywords.json',
  programs: 'programs.json',
  careerNodes: 'career-nodes.json',
  edges: 'edges.json',
} as const

export const DEFAULT_HOME: HomeJurisdiction = { country: 'Pakistan', city: 'Pakistan' }

// ── Raw shapes ───────────────────────────────────────────────────

/** Parsed but unvalidated JSON, one entry per reference table. */
export type RawReferenceData = Record<Exclude<keyof typeof DATA_FILES, 'programs' | 'careerNodes' | 'edges'>, unknown>

export interface BuildOptions {
  home?: HomeJurisdiction
}

// ── Helpers ──────────────────────────────────────────────────────

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown, source: string): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw ValidationError.fromZod(`Invalid reference data in ${source}`, result.error)
  }
  return result.data
}

function readJson(dataDir: string, file: string): unknown {
  const raw = readFileSync(path.join(dataDir, file), 'utf-8')
  return JSON.parse(raw)
}

function toUsdBrackets(
  rows: [number, number][],
  currency: string,
  fx: ReadonlyMap<string, number>,
  where: string,
): Bracket[] {
  const rate = fx.get(currency)
  if (rate === undefined) {
    throw new ValidationError(`Invalid reference data in ${DATA_FILES.taxBrackets}`, [
      `${where}: no exchange rate for ${currency}`,
    ])
  }
  return rows.map(([threshold, r]) => ({
    threshold: threshold >= UNBOUNDED_SENTINEL ? Infinity : threshold / rate,
    rate: r,
  }))
}

function toMap<V>(record: Record<string, V>): Map<string, V> {
  return new Map(Object.entries(record))
}

// ── Public API ───────────────────────────────────────────────────

/** Validate raw tables and build the context. Tests pass synthetic tables here. */
export function buildReferenceContext(
  raw: RawReferenceData,
  options: BuildOptions = {},
): ReferenceContext {
  const exchangeRates = toMap(parse(exchangeRatesSchema, raw.exchangeRates, DATA_FILES.exchangeRates))
  if (!exchangeRates.has('USD')) exchangeRates.set('USD', 1)

  const rawBrackets = parse(taxBracketsSchema, raw.taxBrackets, DATA_FILES.taxBrackets)
  const brackets = new Map<string, Map<string, BracketTable>>()
  for (const [country, scopes] of Object.entries(rawBrackets)) {
    const byScope = new Map<string, BracketTable>()
    for (const [scope, table] of Object.entries(scopes)) {
      const converted = toUsdBrackets(table.brackets, table.currency, exchangeRates, `${country}/${scope}`)
      if (converted[converted.length - 1].threshold !== Infinity) {
        throw new ValidationError(`Invalid reference data in ${DATA_FILES.taxBrackets}`, [
          `${country}/${scope}: last bracket must be unbounded`,
        ])
      }
      byScope.set(scope, { currency: table.currency, brackets: converted })
    }
    brackets.set(country, byScope)
  }

  const rawConfig = parse(taxConfigSchema, raw.taxConfig, DATA_FILES.taxConfig)
  const taxConfig = new Map<string, Map<string, Map<string, number>>>()
  for (const [country, scopes] of Object.entries(rawConfig)) {
    taxConfig.set(
      country,
      new Map(Object.entries(scopes).map(([scope, keys]) => [scope, toMap(keys)])),
    )
  }

  const livingCosts = toMap<LivingCostProfile>(parse(livingCostsSchema, raw.livingCosts, DATA_FILES.livingCosts))
  const fallbacks = parse(livingCostFallbacksSchema, raw.livingCostFallbacks, DATA_FILES.livingCostFallbacks)
  const countryDefaultCities = toMap(
    parse(countryDefaultCitiesSchema, raw.countryDefaultCities, DATA_FILES.countryDefaultCities),
  )

  const marketMappings = new Map<string, MarketLocation>()
  for (const row of parse(marketMappingsSchema, raw.marketMappings, DATA_FILES.marketMappings)) {
    marketMappings.set(row.descriptor, {
      workCountry: row.country,
      workCity: row.city,
      subJurisdiction: row.subJurisdiction,
    })
  }

  const regionKeywords = parse(regionKeywordsSchema, raw.regionKeywords, DATA_FILES.regionKeywords)

  const home = options.home ?? DEFAULT_HOME
  if (!livingCosts.has(home.city)) {
    throw new ValidationError(`Invalid reference data in ${DATA_FILES.livingCosts}`, [
      `home market '${home.city}' has no living-cost row`,
    ])
  }

  return {
    exchangeRates,
    brackets,
    taxConfig,
    livingCosts,
    genericLivingCosts: fallbacks.generic,
    studyOnlyLivingCosts: toMap(fallbacks.studyOnly),
    countryDefaultCities,
    marketMappings,
    regionKeywords,
    home,
  }
}

export function readReferenceData(dataDir: string): RawReferenceData {
  return {
    exchangeRates: readJson(dataDir, DATA_FILES.exchangeRates),
    taxBrackets: readJson(dataDir, DATA_FILES.taxBrackets),
    taxConfig: readJson(dataDir, DATA_FILES.taxConfig),
    livingCosts: readJson(dataDir, DATA_FILES.livingCosts),
    livingCostFallbacks: readJson(dataDir, DATA_FILES.livingCostFallbacks),
    countryDefaultCities: readJson(dataDir, DATA_FILES.countryDefaultCities),
    marketMappings: readJson(dataDir, DATA_FILES.marketMappings),
    regionKeywords: readJson(dataDir, DATA_FILES.regionKeywords),
  }
}

export function loadReferenceContext(dataDir: string, options: BuildOptions = {}): ReferenceContext {
  const ctx = buildReferenceContext(readReferenceData(dataDir), options)
  log.info('Reference data loaded', {
    dataDir,
    exchangeRates: ctx.exchangeRates.size,
    jurisdictions: ctx.brackets.size,
    cities: ctx.livingCosts.size,
    marketMappings: ctx.marketMappings.size,
    regionKeywords: ctx.regionKeywords.length,
  })
  return ctx
}

export function loadPrograms(dataDir: string): GraduateProgram[] {
  const programs = parse(graduateProgramsSchema, readJson(dataDir, DATA_FILES.programs), DATA_FILES.programs)
  const ids = new Set<number>()
  for (const p of programs) {
    if (ids.has(p.id)) {
      throw new ValidationError(`Invalid reference data in ${DATA_FILES.programs}`, [
        `duplicate program id ${p.id}`,
      ])
    }
    ids.add(p.id)
  }
  log.info('Programs loaded', { count: programs.length })
  return programs
}

export function buildDecisionGraph(rawNodes: unknown, rawEdges: unknown): DecisionGraph {
  const nodes = parse(careerNodesSchema, rawNodes, DATA_FILES.careerNodes)
  const edges = parse(edgesSchema, rawEdges, DATA_FILES.edges)

  const nodeIds = new Set(nodes.map((n) => n.id))
  const issues: string[] = []
  if (nodeIds.size !== nodes.length) issues.push('duplicate node ids')
  for (const e of edges) {
    if (!nodeIds.has(e.sourceId)) issues.push(`edge ${e.id}: unknown source '${e.sourceId}'`)
    if (!nodeIds.has(e.targetId)) issues.push(`edge ${e.id}: unknown target '${e.targetId}'`)
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid reference data in ${DATA_FILES.edges}`, issues)
  }
  return { nodes, edges }
}

export function loadDecisionGraph(dataDir: string): DecisionGraph {
  const graph = buildDecisionGraph(
    readJson(dataDir, DATA_FILES.careerNodes),
    readJson(dataDir, DATA_FILES.edges),
  )
  log.info('Decision graph loaded', { nodes: graph.nodes.length, edges: graph.edges.length })
  return graph
}
