/**
 * CareerService: the facade callers use.
 *
 * Holds the reference context, the program list, the decision graph and the
 * profile store, and exposes listing, lookup, comparison and calibration
 * operations on top of the pure engine functions.
 */

import { calibrate, calibratedEdgeMap, calibrationDiff } from '../calibration/calibrate'
import type { AppConfig } from '../config'
import { NotFoundError } from '../errors'
import type { PathScenarioInput, ProgramScenarioInput } from '../model/schemas'
import type {
  AidScenario,
  BaselineResult,
  CalibratedEdge,
  CalibrationSummary,
  CashFlowYear,
  DecisionGraph,
  GraduateProgram,
  LinkedPathProjection,
  PathBatchResult,
  ProgramBatchResult,
  ProgramProjection,
  UserProfile,
} from '../model/types'
import { parsePathScenario, parentEdgesOf, projectAllPaths, projectPath, projectPathBaseline } from '../projection/path'
import {
  parseProgramScenario,
  projectAllPrograms,
  projectProgram,
  projectProgramBaseline,
} from '../projection/program'
import type { ReferenceContext } from '../reference/context'
import { loadDecisionGraph, loadPrograms, loadReferenceContext } from '../reference/loader'
import { logger } from '../utils/logger'
import { round1, round2 } from '../utils/math'
import { ProfileStore } from './ProfileStore'
import {
  affordabilityQuerySchema,
  parseQuery,
  pathListQuerySchema,
  programListQuerySchema,
} from './queries'
import type { AffordabilityQuery, PathListQuery, PathSortKey, ProgramListQuery, ProgramSortKey } from './queries'

// ── Result shapes ────────────────────────────────────────────────

/** A projection whose yearly ledger may have been dropped. */
export type Compactable<T extends { yearly: CashFlowYear[] }> = Omit<T, 'yearly'> & { yearly?: CashFlowYear[] }

export type ProgramListResult = Omit<ProgramBatchResult, 'programs'> & {
  programs: Compactable<ProgramProjection>[]
  totalFiltered: number
}

export type PathListResult = Omit<PathBatchResult, 'paths'> & {
  paths: Compactable<LinkedPathProjection>[]
  totalFiltered: number
}

export interface AidComparison {
  programId: number
  university: string
  programName: string
  country: string
  rawTuitionK: number
  aidType: GraduateProgram['aidType']
  expectedAidK: number
  bestCaseAidK: number
  coopEarningsK: number
  baseline: BaselineResult
  scenarios: Record<AidScenario, Omit<ProgramProjection, 'yearly'>>
  aidImpact: { expectedVsNoAidK: number; bestCaseVsNoAidK: number }
}

export type AffordabilityTier = 'affordable' | 'stretch' | 'needs_funding'

export type AffordabilityEntry = Omit<ProgramProjection, 'yearly'> & {
  shortfallUsd: number
  affordabilityPct: number
  affordabilityTier: AffordabilityTier
}

export interface AffordabilityReport {
  availableSavingsUsd: number
  monthlySideIncomeUsd: number
  prepMonths: number
  totalAvailableUsd: number
  aidScenario: AidScenario
  counts: Record<AffordabilityTier, number> & { total: number }
  affordable: AffordabilityEntry[]
  stretch: AffordabilityEntry[]
  /** Best {@link NEEDS_FUNDING_LIMIT} by net benefit. */
  needsFunding: AffordabilityEntry[]
}

export const NEEDS_FUNDING_LIMIT = 20

// ── Helpers ──────────────────────────────────────────────────────

function withoutLedger<T extends { yearly: CashFlowYear[] }>(entry: T): Omit<T, 'yearly'> {
  const { yearly: _ledger, ...rest } = entry
  return rest
}

const PROGRAM_SORT: Record<ProgramSortKey, { key: (p: ProgramProjection) => number; ascending: boolean }> = {
  net_benefit: { key: (p) => p.netBenefitK, ascending: false },
  cost: { key: (p) => p.totalStudyCostK, ascending: true },
  y1: { key: (p) => p.y1K, ascending: false },
  y10: { key: (p) => p.y10K, ascending: false },
  networth: { key: (p) => p.mastersNetworthK, ascending: false },
  initial_capital: { key: (p) => p.initialCapitalUsd, ascending: true },
}

const PATH_SORT: Record<PathSortKey, (p: LinkedPathProjection) => number> = {
  net_benefit: (p) => p.netBenefitK,
  y1: (p) => p.y1IncomeK,
  y10: (p) => p.y10IncomeK,
  networth: (p) => p.pathNetworthK,
}

// ── Service ──────────────────────────────────────────────────────

export interface CareerServiceDeps {
  context: ReferenceContext
  programs: GraduateProgram[]
  graph: DecisionGraph
  profiles: ProfileStore
}

export class CareerService {
  readonly context: ReferenceContext
  readonly profiles: ProfileStore
  private programs: GraduateProgram[]
  private graph: DecisionGraph

  constructor(deps: CareerServiceDeps) {
    this.context = deps.context
    this.programs = deps.programs
    this.graph = deps.graph
    this.profiles = deps.profiles
  }

  /** Apply the log level, load the dataset and open the profile database. */
  static open(config: AppConfig): CareerService {
    logger.setLevel(config.logLevel)
    return new CareerService({
      context: loadReferenceContext(config.dataDir),
      programs: loadPrograms(config.dataDir),
      graph: loadDecisionGraph(config.dataDir),
      profiles: new ProfileStore(config.dbPath),
    })
  }

  close(): void {
    this.profiles.close()
  }

  // ── Profile ────────────────────────────────────────────────────

  getProfile(): UserProfile {
    return this.profiles.get()
  }

  updateProfile(input: unknown): UserProfile {
    return this.profiles.update(input)
  }

  // ── Graduate programs ──────────────────────────────────────────

  private findProgram(id: number): GraduateProgram {
    const program = this.programs.find((p) => p.id === id)
    if (!program) throw new NotFoundError('Program', id)
    return program
  }

  listPrograms(query: ProgramListQuery = {}): ProgramListResult {
    const q = parseQuery(programListQuerySchema, query, 'program query')
    const batch = projectAllPrograms(this.context, this.programs, q)

    let programs = batch.programs.filter(
      (p) =>
        (q.field === undefined || p.field === q.field) &&
        (q.fundingTier === undefined || p.fundingTier === q.fundingTier) &&
        (q.workCountry === undefined || p.location.workCountry === q.workCountry) &&
        (q.maxInitialCapital === undefined || p.initialCapitalUsd <= q.maxInitialCapital),
    )

    const sort = PROGRAM_SORT[q.sortBy]
    programs = [...programs].sort((a, b) =>
      sort.ascending ? sort.key(a) - sort.key(b) : sort.key(b) - sort.key(a),
    )
    if (q.limit !== undefined) programs = programs.slice(0, q.limit)

    return {
      ...batch,
      programs: q.compact ? programs.map(withoutLedger) : programs,
      totalFiltered: programs.length,
    }
  }

  programNetworth(id: number, scenarioInput: ProgramScenarioInput = {}): ProgramProjection & { baseline: BaselineResult } {
    const program = this.findProgram(id)
    const scenario = parseProgramScenario(scenarioInput)
    const baseline = projectProgramBaseline(this.context, scenario)
    const projection = projectProgram(this.context, program, scenario, { baselineTotalK: baseline.totalNetworthK })
    return { ...projection, baseline }
  }

  /** The program under all three aid scenarios against one baseline. */
  compareAidScenarios(id: number, scenarioInput: Omit<ProgramScenarioInput, 'aidScenario'> = {}): AidComparison {
    const program = this.findProgram(id)
    const scenario = parseProgramScenario(scenarioInput)
    const baseline = projectProgramBaseline(this.context, scenario)

    const project = (aidScenario: AidScenario) =>
      withoutLedger(
        projectProgram(this.context, program, { ...scenario, aidScenario }, { baselineTotalK: baseline.totalNetworthK }),
      )
    const scenarios: Record<AidScenario, Omit<ProgramProjection, 'yearly'>> = {
      no_aid: project('no_aid'),
      expected: project('expected'),
      best_case: project('best_case'),
    }

    return {
      programId: program.id,
      university: program.university,
      programName: program.programName,
      country: program.country,
      rawTuitionK: program.tuitionK,
      aidType: program.aidType,
      expectedAidK: program.expectedAidK,
      bestCaseAidK: program.bestCaseAidK,
      coopEarningsK: program.coopEarningsK,
      baseline,
      scenarios,
      aidImpact: {
        expectedVsNoAidK: round2(scenarios.expected.netBenefitK - scenarios.no_aid.netBenefitK),
        bestCaseVsNoAidK: round2(scenarios.best_case.netBenefitK - scenarios.no_aid.netBenefitK),
      },
    }
  }

  /**
   * Group programs by whether their upfront capital fits the user's funds:
   * savings alone, savings plus side income saved over the prep period, or
   * neither.
   */
  affordability(query: AffordabilityQuery = {}): AffordabilityReport {
    const q = parseQuery(affordabilityQuerySchema, query, 'affordability query')
    const savings = q.availableSavings ?? this.profiles.get().availableSavingsUsd
    const totalAvailable = savings + q.monthlySideIncome * q.prepMonths

    const { programs } = projectAllPrograms(this.context, this.programs, { aidScenario: q.aidScenario })
    const groups: Record<AffordabilityTier, AffordabilityEntry[]> = {
      affordable: [],
      stretch: [],
      needs_funding: [],
    }

    // Already sorted by net benefit, so each group stays sorted.
    for (const p of programs) {
      const capital = p.initialCapitalUsd
      const tier: AffordabilityTier =
        capital <= savings ? 'affordable' : capital <= totalAvailable ? 'stretch' : 'needs_funding'
      groups[tier].push({
        ...withoutLedger(p),
        shortfallUsd: Math.max(0, capital - totalAvailable),
        affordabilityPct: round1(Math.min(100, (totalAvailable / Math.max(capital, 1)) * 100)),
        affordabilityTier: tier,
      })
    }

    return {
      availableSavingsUsd: savings,
      monthlySideIncomeUsd: q.monthlySideIncome,
      prepMonths: q.prepMonths,
      totalAvailableUsd: totalAvailable,
      aidScenario: q.aidScenario,
      counts: {
        affordable: groups.affordable.length,
        stretch: groups.stretch.length,
        needs_funding: groups.needs_funding.length,
        total: programs.length,
      },
      affordable: groups.affordable,
      stretch: groups.stretch,
      needsFunding: groups.needs_funding.slice(0, NEEDS_FUNDING_LIMIT),
    }
  }

  // ── Career paths ───────────────────────────────────────────────

  listPaths(query: PathListQuery = {}): PathListResult {
    const q = parseQuery(pathListQuerySchema, query, 'path query')
    const batch = projectAllPaths(this.context, this.graph, q, { nodeType: q.nodeType, leafOnly: q.leafOnly })

    const key = PATH_SORT[q.sortBy]
    let paths = [...batch.paths].sort((a, b) => key(b) - key(a))
    if (q.limit !== undefined) paths = paths.slice(0, q.limit)

    return {
      ...batch,
      paths: q.compact ? paths.map(withoutLedger) : paths,
      totalFiltered: paths.length,
    }
  }

  pathNetworth(nodeId: string, scenarioInput: PathScenarioInput = {}): LinkedPathProjection & { baseline: BaselineResult } {
    const node = this.graph.nodes.find((n) => n.id === nodeId)
    if (!node) throw new NotFoundError('Career node', nodeId)

    const scenario = parsePathScenario(scenarioInput)
    const baseline = projectPathBaseline(this.context, scenario)
    const projection = projectPath(this.context, node, scenario, { baselineTotalK: baseline.totalNetworthK })
    return { ...projection, parentEdges: parentEdgesOf(this.graph, nodeId), baseline }
  }

  // ── Calibration ────────────────────────────────────────────────

  calibratedEdges(): CalibratedEdge[] {
    return calibrate(this.graph, this.profiles.get())
  }

  calibratedEdgeMap(): Record<string, Record<string, number>> {
    return calibratedEdgeMap(this.calibratedEdges())
  }

  calibrationSummary(): CalibrationSummary {
    return calibrationDiff(this.calibratedEdges())
  }
}
