/**
 * Home-career-path track: every year is a work year in the home market.
 *
 * Upfront capital is charged once in year 1; recurring fees every year.
 */

import { MissingIncomeDataError, ValidationError } from '../errors'
import { homeLivingCost } from '../living/livingCosts'
import { pathScenarioSchema } from '../model/schemas'
import type { PathScenario, PathScenarioInput } from '../model/schemas'
import type {
  CareerNode,
  CashFlowYear,
  DecisionGraph,
  LinkedPathProjection,
  NodeType,
  ParentEdge,
  PathBatchResult,
  PathProjection,
} from '../model/types'
import type { ReferenceContext } from '../reference/context'
import { afterTaxIncome, effectiveTaxRate } from '../rules/engine'
import { logger } from '../utils/logger'
import { round2, round4 } from '../utils/math'
import { householdFor, projectBaseline } from './baseline'
import { BASELINE_GROWTH, BASELINE_SALARY_K, PATH_HORIZON_YEARS } from './constants'
import { interpolateSalary } from './interpolate'
import { byNetBenefitDesc, countPositive, groupSummary, highlights } from './summary'

const log = logger.child({ component: 'projection' })

export function parsePathScenario(input: unknown = {}): PathScenario {
  const result = pathScenarioSchema.safeParse(input)
  if (!result.success) throw ValidationError.fromZod('Invalid path scenario', result.error)
  return result.data
}

export function projectPathBaseline(ctx: ReferenceContext, scenario: PathScenario) {
  return projectBaseline(ctx, PATH_HORIZON_YEARS, scenario.familyTransitionYear, scenario)
}

/** A node needs a non-zero year-1 or year-10 income to be projected. */
export function hasIncomeData(node: CareerNode): boolean {
  return (node.y1IncomeK ?? 0) !== 0 || (node.y10IncomeK ?? 0) !== 0
}

export interface ProjectPathOptions {
  baselineTotalK?: number
}

export function projectPath(
  ctx: ReferenceContext,
  node: CareerNode,
  scenarioInput: PathScenarioInput = {},
  options: ProjectPathOptions = {},
): PathProjection {
  const scenario = parsePathScenario(scenarioInput)
  if (!hasIncomeData(node)) throw new MissingIncomeDataError(node.id)

  const home = ctx.home.country
  const y1 = node.y1IncomeK ?? 0
  const y5 = node.y5IncomeK ?? 0
  const y10 = node.y10IncomeK ?? 0
  const initialCapital = node.initialCapitalUsd / 1000
  const ongoingAnnual = (node.ongoingCostUsd * 12) / 1000

  const yearly: CashFlowYear[] = []
  let totalWorkSavings = 0
  let cumulative = 0

  for (let year = 1; year <= PATH_HORIZON_YEARS; year++) {
    const gross = interpolateSalary(y1, y5, y10, year)
    const afterTax = afterTaxIncome(ctx, gross, home)
    const household = householdFor(year, scenario.familyTransitionYear)
    const livingCost = homeLivingCost(ctx, household, scenario.lifestyle)
    const netSavings = afterTax - livingCost - ongoingAnnual
    totalWorkSavings += netSavings

    const otherCost = ongoingAnnual + (year === 1 ? initialCapital : 0)
    const netSavingsK = round2(afterTax - livingCost - otherCost)
    cumulative += netSavingsK
    yearly.push({
      year,
      phase: 'work',
      workYear: year,
      household,
      grossIncomeK: round2(gross),
      afterTaxK: round2(afterTax),
      livingCostK: round2(livingCost),
      otherCostK: round2(otherCost),
      netSavingsK,
      cumulativeK: round2(cumulative),
    })
  }

  const pathNetworth = totalWorkSavings - initialCapital
  const baselineTotal = options.baselineTotalK ?? projectPathBaseline(ctx, scenario).totalNetworthK

  return {
    nodeId: node.id,
    label: node.label,
    nodeType: node.nodeType,
    phase: node.phase,
    note: node.note,
    y1IncomeK: y1,
    y5IncomeK: y5,
    y10IncomeK: y10,
    initialCapitalK: round2(initialCapital),
    ongoingAnnualK: round2(ongoingAnnual),
    totalWorkSavingsK: round2(totalWorkSavings),
    pathNetworthK: round2(pathNetworth),
    baselineNetworthK: round2(baselineTotal),
    netBenefitK: round2(pathNetworth - baselineTotal),
    effectiveTaxRateY1: round4(effectiveTaxRate(ctx, y1, home)),
    effectiveTaxRateY10: round4(effectiveTaxRate(ctx, y10, home)),
    yearly,
  }
}

// ── Graph helpers ────────────────────────────────────────────────

/** Nodes that are not the source of any child edge. */
export function leafNodes(graph: DecisionGraph): CareerNode[] {
  const parents = new Set(graph.edges.filter((e) => e.linkType === 'child').map((e) => e.sourceId))
  return graph.nodes.filter((n) => !parents.has(n.id))
}

/** Child edges leading into a node. */
export function parentEdgesOf(graph: DecisionGraph, nodeId: string): ParentEdge[] {
  return graph.edges
    .filter((e) => e.linkType === 'child' && e.targetId === nodeId)
    .map((e) => ({ parentId: e.sourceId, probability: e.probability }))
}

// ── Batch ────────────────────────────────────────────────────────

export interface ProjectAllPathsOptions {
  nodeType?: NodeType | null
  /** Only project outcome nodes. Defaults to true. */
  leafOnly?: boolean
}

export function projectAllPaths(
  ctx: ReferenceContext,
  graph: DecisionGraph,
  scenarioInput: PathScenarioInput = {},
  options: ProjectAllPathsOptions = {},
): PathBatchResult {
  const scenario = parsePathScenario(scenarioInput)
  const leafOnly = options.leafOnly ?? true
  const nodeType = options.nodeType ?? null
  const baseline = projectPathBaseline(ctx, scenario)

  const candidates = (leafOnly ? leafNodes(graph) : graph.nodes).filter(
    (n) => nodeType === null || n.nodeType === nodeType,
  )
  const eligible = candidates.filter(hasIncomeData)

  const projected = byNetBenefitDesc(
    eligible.map(
      (node): LinkedPathProjection => ({
        ...projectPath(ctx, node, scenario, { baselineTotalK: baseline.totalNetworthK }),
        parentEdges: parentEdgesOf(graph, node.id),
      }),
    ),
  )
  log.debug('Projected career paths', {
    candidates: candidates.length,
    skippedWithoutIncome: candidates.length - eligible.length,
    projected: projected.length,
  })

  const { top, bottom } = highlights(projected, (r) => ({
    nodeId: r.nodeId,
    label: r.label,
    nodeType: r.nodeType,
    netBenefitK: r.netBenefitK,
    y10IncomeK: r.y10IncomeK,
  }))

  return {
    baseline,
    assumptions: {
      baselineSalaryK: scenario.baselineSalaryK ?? BASELINE_SALARY_K,
      baselineGrowth: scenario.baselineGrowth ?? BASELINE_GROWTH,
      horizonYears: PATH_HORIZON_YEARS,
      familyTransitionYear: scenario.familyTransitionYear,
      lifestyle: scenario.lifestyle,
      jurisdiction: ctx.home.country,
      leafOnly,
      nodeType,
    },
    paths: projected,
    summary: {
      total: projected.length,
      positiveCount: countPositive(projected),
      top,
      bottom,
      byType: groupSummary(projected, (r) => r.nodeType, (r) => r.netBenefitK),
      byPhase: groupSummary(projected, (r) => (r.phase === null ? 'unknown' : String(r.phase)), (r) => r.netBenefitK),
    },
  }
}
