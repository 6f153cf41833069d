/**
 * Domain types for the career projection engine.
 *
 * Units: money is in reference-currency (USD) thousands per year unless the
 * field name carries another unit (`Usd` = whole dollars, `Lc` = local currency).
 */

// ── Scenario enums ──────────────────────────────────────────────

export const LIFESTYLES = ['frugal', 'comfortable'] as const
export const HOUSEHOLD_TYPES = ['student', 'single', 'family'] as const
export const AID_SCENARIOS = ['no_aid', 'expected', 'best_case'] as const

export type Lifestyle = (typeof LIFESTYLES)[number]
export type HouseholdType = (typeof HOUSEHOLD_TYPES)[number]
export type AidScenario = (typeof AID_SCENARIOS)[number]

export type Phase = 'study' | 'work'

// ── Tax reference data ──────────────────────────────────────────

/** Upper threshold (in USD, `Infinity` for the last one) and marginal rate. */
export interface Bracket {
  threshold: number
  rate: number
}

/** Brackets for one (jurisdiction, scope) pair, already converted to USD. */
export interface BracketTable {
  currency: string
  brackets: Bracket[]
}

// ── Living costs ────────────────────────────────────────────────

export type HouseholdCosts = Record<HouseholdType, number>

export type LivingCostProfile = Record<Lifestyle, HouseholdCosts>

// ── Market mapping ──────────────────────────────────────────────

export interface MarketLocation {
  workCountry: string
  workCity: string
  /** US state code when the work country is the USA, otherwise null. */
  subJurisdiction: string | null
}

export interface RegionKeyword {
  keyword: string
  subJurisdiction: string
  city: string
}

// ── Projection entities ─────────────────────────────────────────

export const AID_TYPES = ['none', 'partial', 'ta_ra', 'coop', 'guaranteed_funding'] as const
export type AidType = (typeof AID_TYPES)[number]

export interface GraduateProgram {
  id: number
  university: string
  /** Country of the university (study location). */
  country: string
  programName: string
  field: string
  fundingTier: string
  durationYears: number
  tuitionK: number
  y1K: number
  y5K: number
  y10K: number
  primaryMarket: string
  aidType: AidType
  expectedAidK: number
  bestCaseAidK: number
  coopEarningsK: number
  /** Upfront funds needed before the program starts, whole USD. */
  initialCapitalUsd: number
}

export const NODE_TYPES = ['career', 'trading', 'startup', 'freelance'] as const
export type NodeType = (typeof NODE_TYPES)[number]

export interface CareerNode {
  id: string
  phase: number | null
  label: string
  nodeType: NodeType
  note: string
  y1IncomeK: number | null
  y5IncomeK: number | null
  y10IncomeK: number | null
  /** One-time cost, whole USD. */
  initialCapitalUsd: number
  /** Recurring cost, whole USD per month. */
  ongoingCostUsd: number
}

// ── Decision graph ──────────────────────────────────────────────

export const LINK_TYPES = ['child', 'transition', 'enables', 'fallback'] as const
export type LinkType = (typeof LINK_TYPES)[number]

export interface Edge {
  id: number
  sourceId: string
  targetId: string
  probability: number
  linkType: LinkType
  note: string
}

export interface DecisionGraph {
  nodes: CareerNode[]
  edges: Edge[]
}

// ── User profile ────────────────────────────────────────────────

export const PERFORMANCE_RATINGS = ['top', 'strong', 'average', 'below'] as const
export const RISK_TOLERANCES = ['high', 'moderate', 'low'] as const
export const ENGLISH_LEVELS = ['native', 'professional', 'intermediate', 'basic'] as const
export const QUANT_APTITUDES = ['strong', 'moderate', 'weak'] as const

export type PerformanceRating = (typeof PERFORMANCE_RATINGS)[number]
export type RiskTolerance = (typeof RISK_TOLERANCES)[number]
export type EnglishLevel = (typeof ENGLISH_LEVELS)[number]
export type QuantAptitude = (typeof QUANT_APTITUDES)[number]

export interface UserProfile {
  yearsExperience: number
  performanceRating: PerformanceRating
  riskTolerance: RiskTolerance
  availableSavingsUsd: number
  englishLevel: EnglishLevel
  gpa: number | null
  greScore: number | null
  ieltsScore: number | null
  hasPublications: boolean
  hasFreelanceProfile: boolean
  hasSideProjects: boolean
  quantAptitude: QuantAptitude
  currentSalaryPkr: number
}

// ── Projection output ───────────────────────────────────────────

export interface CashFlowYear {
  year: number
  phase: Phase
  /** Years of work experience; null during study. */
  workYear: number | null
  household: HouseholdType
  grossIncomeK: number
  afterTaxK: number
  livingCostK: number
  /** Tuition, upfront capital or recurring fees charged this year. */
  otherCostK: number
  netSavingsK: number
  cumulativeK: number
}

export interface BaselineYear {
  year: number
  grossIncomeK: number
  afterTaxK: number
  livingCostK: number
  household: HouseholdType
  netSavingsK: number
  cumulativeK: number
}

export interface BaselineResult {
  totalNetworthK: number
  yearly: BaselineYear[]
}

export interface ProgramProjection {
  programId: number
  university: string
  programName: string
  country: string
  field: string
  fundingTier: string
  durationYears: number
  location: MarketLocation
  primaryMarket: string
  initialCapitalBaseUsd: number
  initialCapitalUsd: number
  rawTuitionK: number
  tuitionK: number
  studyLivingCostK: number
  totalStudyCostK: number
  aidScenario: AidScenario
  aidType: AidType
  scholarshipAppliedK: number
  coopEarningsK: number
  expectedAidK: number
  bestCaseAidK: number
  totalWorkSavingsK: number
  mastersNetworthK: number
  baselineNetworthK: number
  netBenefitK: number
  effectiveTaxRateY1: number
  effectiveTaxRateY10: number
  y1K: number
  y5K: number
  y10K: number
  yearly: CashFlowYear[]
}

export interface ParentEdge {
  parentId: string
  probability: number
}

export interface PathProjection {
  nodeId: string
  label: string
  nodeType: NodeType
  phase: number | null
  note: string
  y1IncomeK: number
  y5IncomeK: number
  y10IncomeK: number
  initialCapitalK: number
  ongoingAnnualK: number
  totalWorkSavingsK: number
  pathNetworthK: number
  baselineNetworthK: number
  netBenefitK: number
  effectiveTaxRateY1: number
  effectiveTaxRateY10: number
  yearly: CashFlowYear[]
}

/** A path projection together with the child edges that lead into the node. */
export interface LinkedPathProjection extends PathProjection {
  parentEdges: ParentEdge[]
}

// ── Summaries ───────────────────────────────────────────────────

export interface GroupStats {
  key: string
  avg: number
  count: number
  min: number
  max: number
}

/** Ordered by average, highest first. */
export type GroupSummary = GroupStats[]

export interface ProgramHighlight {
  programId: number
  university: string
  programName: string
  netBenefitK: number
  field: string
  workCountry: string
}

export interface PathHighlight {
  nodeId: string
  label: string
  nodeType: NodeType
  netBenefitK: number
  y10IncomeK: number
}

export interface ProgramAssumptions {
  baselineSalaryK: number
  baselineGrowth: number
  horizonYears: number
  defaultStudyYears: number
  familyTransitionYear: number
  lifestyle: Lifestyle
  aidScenario: AidScenario
}

export interface PathAssumptions {
  baselineSalaryK: number
  baselineGrowth: number
  horizonYears: number
  familyTransitionYear: number
  lifestyle: Lifestyle
  /** Home jurisdiction used for both tax and living cost. */
  jurisdiction: string
  leafOnly: boolean
  nodeType: NodeType | null
}

export interface ProgramBatchSummary {
  total: number
  positiveCount: number
  top: ProgramHighlight[]
  bottom: ProgramHighlight[]
  byTier: GroupSummary
  byField: GroupSummary
  byWorkCountry: GroupSummary
}

export interface PathBatchSummary {
  total: number
  positiveCount: number
  top: PathHighlight[]
  bottom: PathHighlight[]
  byType: GroupSummary
  byPhase: GroupSummary
}

export interface ProgramBatchResult {
  baseline: BaselineResult
  assumptions: ProgramAssumptions
  /** Sorted by net benefit, highest first. */
  programs: ProgramProjection[]
  summary: ProgramBatchSummary
}

export interface PathBatchResult {
  baseline: BaselineResult
  assumptions: PathAssumptions
  /** Sorted by net benefit, highest first. */
  paths: LinkedPathProjection[]
  summary: PathBatchSummary
}

// ── Calibration output ──────────────────────────────────────────

export interface CalibratedEdge extends Edge {
  calibratedProbability: number
  multiplier: number
}

export interface CalibrationChange {
  sourceId: string
  targetId: string
  baseProbability: number
  calibratedProbability: number
  change: number
  changePct: number
  multiplier: number
}

export interface CalibrationSummary {
  totalEdges: number
  childEdges: number
  edgesChanged: number
  changes: CalibrationChange[]
}
