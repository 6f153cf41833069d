/**
 * Calibration multipliers and the node sets they target.
 *
 * A multiplier above 1 boosts an edge, below 1 suppresses it. These are
 * policy choices, tuned by hand; change them here, never inline in a rule.
 */

import type { UserProfile } from '../model/types'

// ── Neutral profile ──────────────────────────────────────────────

/** Every rule returns exactly 1 for this profile. */
export const DEFAULT_PROFILE: UserProfile = {
  yearsExperience: 2,
  performanceRating: 'strong',
  riskTolerance: 'moderate',
  availableSavingsUsd: 5000,
  englishLevel: 'professional',
  gpa: 3.5,
  greScore: null,
  ieltsScore: null,
  hasPublications: false,
  hasFreelanceProfile: false,
  hasSideProjects: false,
  quantAptitude: 'moderate',
  currentSalaryPkr: 220_000,
}

export const ROOT_NODE = 'root'

// ── Risk tolerance ───────────────────────────────────────────────

export const RISKY_ENTRY_TARGETS: ReadonlySet<string> = new Set(['p1_trading', 'p1_startup', 'p1_freelance'])
export const STABLE_ENTRY_TARGETS: ReadonlySet<string> = new Set([
  'p1_promoted',
  'p1_notpromoted_stay',
  'p1_switch_local',
])
export const STARTUP_SUCCESS_TARGETS: ReadonlySet<string> = new Set(['p4_startup_scale', 'p3_startup_funded'])

export const RISK_HIGH = {
  riskyEntry: 1.4,
  stableEntry: 0.85,
  tradeFulltime: 1.3,
  tradeQuit: 0.7,
  startupSuccess: 1.2,
  startupAbandon: 0.8,
} as const

export const RISK_LOW = {
  riskyEntry: 0.6,
  stableEntry: 1.2,
  tradeFulltime: 0.7,
  tradeQuit: 1.3,
  startupSuccess: 0.8,
  startupAbandon: 1.2,
} as const

// ── Performance rating ───────────────────────────────────────────

export const SENIOR_TARGETS: ReadonlySet<string> = new Set([
  'p3_l5_achieved',
  'p3_local_senior_rise',
  'p4_current_staff',
  'p4_local_staff',
])

/** Keyed by rating; `strong` is neutral. */
export const PERF_PROMOTED = { top: 1.35, average: 0.65, below: 0.35 } as const
export const PERF_NOT_PROMOTED = { top: 0.7, average: 1.4, below: 1.7 } as const
export const PERF_RETRY_PROMOTED = { top: 1.3, average: 0.7, below: 0.45 } as const
export const PERF_RETRY_LEAVE = { top: 0.75, average: 1.25, below: 1.5 } as const
export const PERF_SENIOR = { top: 1.2, average: 0.8, below: 0.6 } as const

// ── English level ────────────────────────────────────────────────

export const REMOTE_TARGETS: ReadonlySet<string> = new Set([
  'p2_l4_remoteUSD',
  'p2_np_remote',
  'p2_local_remote',
  'p3_remote_senior',
  'p3_local_switch_remote',
  'p3_local_pivot_remote',
  'p3_stagnate_remote',
  'p4_remote_staff',
  'p4_remote_stable_senior',
  'p4_l5_goremote',
  'p4_l4stall_remote',
  'p4_local_sr_remote',
  'p4_remote_sr_direct',
])

/** Client-facing freelance outcomes move with the remote set. */
export const CLIENT_FACING_FREELANCE_TARGETS: ReadonlySet<string> = new Set([
  'p3_freelance_fulltime',
  'p4_freelance_premium',
  'p4_freelance_stable',
])

export const LOCAL_TARGETS: ReadonlySet<string> = new Set([
  'p2_l4_switchlocal',
  'p2_l4_stay_current',
  'p3_l5_stalled_current',
  'p4_l4stall_local_sr',
])

/** Keyed by level; `professional` is neutral. */
export const ENGLISH_REMOTE = { native: 1.25, intermediate: 0.65, basic: 0.35 } as const
export const ENGLISH_LOCAL = { native: 0.9, intermediate: 1.15, basic: 1.3 } as const

// ── Years of experience ──────────────────────────────────────────

export const EXPERIENCE_NEUTRAL_BAND = { low: 1.5, high: 2.5 } as const
export const EXPERIENCE_SENIOR_YEARS = 5
export const EXPERIENCE_MID_YEARS = 3
export const EXPERIENCE_JUNIOR_YEARS = 1

export const EXPERIENCE_PROMOTION_TARGETS: ReadonlySet<string> = new Set([
  'p1_promoted',
  'p3_retry_promoted',
  'p2_local_promoted',
])
export const EXPERIENCE_REMOTE_TARGETS: ReadonlySet<string> = new Set([
  'p2_l4_remoteUSD',
  'p2_np_remote',
  'p3_remote_senior',
  'p4_remote_staff',
])
export const EXPERIENCE_STAGNATION_TARGETS: ReadonlySet<string> = new Set([
  'p2_local_stagnate',
  'p3_teamswitch_stuck',
  'p3_l5_stalled_current',
])

export interface ExperienceTiers {
  senior: number
  mid: number
  junior: number
}

export const EXP_PROMOTED: ExperienceTiers = { senior: 1.35, mid: 1.15, junior: 0.65 }
export const EXP_REMOTE: ExperienceTiers = { senior: 1.3, mid: 1.1, junior: 0.7 }
export const EXP_STAGNATE: ExperienceTiers = { senior: 0.7, mid: 0.85, junior: 1.3 }

// ── Available savings (whole USD) ────────────────────────────────

export const SAVINGS_TRADING_ENTRY = {
  highAt: 20_000,
  high: 1.3,
  midAt: 10_000,
  mid: 1.15,
  minimalAt: 1_000,
  minimal: 0.3,
  lowAt: 2_000,
  low: 0.6,
} as const

export const SAVINGS_STARTUP_ENTRY = {
  highAt: 15_000,
  high: 1.25,
  midAt: 10_000,
  mid: 1.1,
  lowAt: 2_000,
  low: 0.65,
} as const

export const SAVINGS_STOCKS = { highAt: 20_000, high: 1.3, lowAt: 3_000, low: 0.6 } as const
export const SAVINGS_CRYPTO = { lowAt: 1_000, low: 0.7, highAt: 10_000, high: 1.1 } as const
export const SAVINGS_PROFITABLE = { highAt: 20_000, high: 1.2, lowAt: 2_000, low: 0.75 } as const

// ── Quantitative aptitude ────────────────────────────────────────

export const ALGO_TRADING_TARGETS: ReadonlySet<string> = new Set([
  'p2_trade_algo',
  'p3_trade_algo_edge',
  'p4_trade_quant_fund',
])

/** Keyed by aptitude; `moderate` is neutral. */
export const QUANT_ALGO = { strong: 1.4, weak: 0.55 } as const
export const QUANT_PROFITABLE = { strong: 1.2, weak: 0.8 } as const
export const QUANT_LOSS = { strong: 0.75, weak: 1.35 } as const

// ── Profile flags ────────────────────────────────────────────────

export const PROJECTS_STARTUP_TRACTION = 1.3
export const PROJECTS_STARTUP_FAILED = 0.75
export const PROJECTS_REMOTE = 1.15
export const PROJECTS_STARTUP_ENTRY = 1.2
export const PROJECTS_TRACTION_TARGETS: ReadonlySet<string> = new Set(['p3_startup_traction', 'p3_startup_funded'])
export const PROJECTS_REMOTE_TARGETS: ReadonlySet<string> = new Set(['p2_l4_remoteUSD', 'p2_np_remote'])

export const FREELANCE_ENTRY = 1.35
export const FREELANCE_SUCCESS = 1.4
export const FREELANCE_SIDE = 1.15
export const FREELANCE_DRIED = 0.65
export const FREELANCE_PLATFORM = 1.2
export const FREELANCE_SUCCESS_TARGETS: ReadonlySet<string> = new Set([
  'p3_freelance_fulltime',
  'p4_freelance_premium',
])

export const PUBS_CAREER = 1.15
export const PUBS_REMOTE = 1.2
export const PUBS_STARTUP_AI = 1.15
export const PUBS_CAREER_TARGETS: ReadonlySet<string> = new Set([
  'p1_promoted',
  'p3_l5_achieved',
  'p4_current_staff',
])
export const PUBS_REMOTE_TARGETS: ReadonlySet<string> = new Set([
  'p2_l4_remoteUSD',
  'p3_remote_senior',
  'p4_remote_staff',
])

// ── GPA ──────────────────────────────────────────────────────────

export const GPA_NEUTRAL_BAND = { low: 3.3, high: 3.7 } as const
export const GPA_HIGH_AT = 3.8
export const GPA_LOW_AT = 2.5
export const GPA_HIGH_PROMOTED = 1.1
export const GPA_LOW_PROMOTED = 0.9

// ── Diff view ────────────────────────────────────────────────────

/** Smallest calibrated-minus-base move reported as a change. */
export const MATERIAL_CHANGE = 0.005
