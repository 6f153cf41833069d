/**
 * Calibration rule registry.
 *
 * Each rule is a pure function of (profile, source node, target node) that
 * returns a multiplier; 1 means no effect. Registry order is application order.
 */

import type { UserProfile } from '../model/types'
import {
  ALGO_TRADING_TARGETS,
  CLIENT_FACING_FREELANCE_TARGETS,
  ENGLISH_LOCAL,
  ENGLISH_REMOTE,
  EXP_PROMOTED,
  EXP_REMOTE,
  EXP_STAGNATE,
  EXPERIENCE_JUNIOR_YEARS,
  EXPERIENCE_MID_YEARS,
  EXPERIENCE_NEUTRAL_BAND,
  EXPERIENCE_PROMOTION_TARGETS,
  EXPERIENCE_REMOTE_TARGETS,
  EXPERIENCE_SENIOR_YEARS,
  EXPERIENCE_STAGNATION_TARGETS,
  FREELANCE_DRIED,
  FREELANCE_ENTRY,
  FREELANCE_PLATFORM,
  FREELANCE_SIDE,
  FREELANCE_SUCCESS,
  FREELANCE_SUCCESS_TARGETS,
  GPA_HIGH_AT,
  GPA_HIGH_PROMOTED,
  GPA_LOW_AT,
  GPA_LOW_PROMOTED,
  GPA_NEUTRAL_BAND,
  LOCAL_TARGETS,
  PERF_NOT_PROMOTED,
  PERF_PROMOTED,
  PERF_RETRY_LEAVE,
  PERF_RETRY_PROMOTED,
  PERF_SENIOR,
  PROJECTS_REMOTE,
  PROJECTS_REMOTE_TARGETS,
  PROJECTS_STARTUP_ENTRY,
  PROJECTS_STARTUP_FAILED,
  PROJECTS_STARTUP_TRACTION,
  PROJECTS_TRACTION_TARGETS,
  PUBS_CAREER,
  PUBS_CAREER_TARGETS,
  PUBS_REMOTE,
  PUBS_REMOTE_TARGETS,
  PUBS_STARTUP_AI,
  QUANT_ALGO,
  QUANT_LOSS,
  QUANT_PROFITABLE,
  REMOTE_TARGETS,
  RISK_HIGH,
  RISK_LOW,
  RISKY_ENTRY_TARGETS,
  ROOT_NODE,
  SAVINGS_CRYPTO,
  SAVINGS_PROFITABLE,
  SAVINGS_STARTUP_ENTRY,
  SAVINGS_STOCKS,
  SAVINGS_TRADING_ENTRY,
  SENIOR_TARGETS,
  STABLE_ENTRY_TARGETS,
  STARTUP_SUCCESS_TARGETS,
} from './constants'
import type { ExperienceTiers } from './constants'

export type MultiplierRule = (profile: UserProfile, sourceId: string, targetId: string) => number

export const RULE_NAMES = [
  'risk',
  'performance',
  'english',
  'experience',
  'savings',
  'quant',
  'sideProjects',
  'freelanceProfile',
  'publications',
  'gpa',
] as const

export type RuleName = (typeof RULE_NAMES)[number]

// ── Rules ────────────────────────────────────────────────────────

/** Shifts weight between stable and risky entries, and within trading and startup branches. */
export const riskRule: MultiplierRule = (profile, sourceId, targetId) => {
  if (profile.riskTolerance === 'moderate') return 1
  const m = profile.riskTolerance === 'high' ? RISK_HIGH : RISK_LOW

  if (sourceId === ROOT_NODE) {
    if (RISKY_ENTRY_TARGETS.has(targetId)) return m.riskyEntry
    if (STABLE_ENTRY_TARGETS.has(targetId)) return m.stableEntry
  }
  if (targetId === 'p4_trade_fulltime') return m.tradeFulltime
  if (targetId === 'p4_trade_quit') return m.tradeQuit
  if (STARTUP_SUCCESS_TARGETS.has(targetId)) return m.startupSuccess
  if (targetId === 'p4_startup_abandoned') return m.startupAbandon
  return 1
}

export const performanceRule: MultiplierRule = (profile, sourceId, targetId) => {
  const rating = profile.performanceRating
  if (rating === 'strong') return 1

  if (sourceId === ROOT_NODE && targetId === 'p1_promoted') return PERF_PROMOTED[rating]
  if (sourceId === ROOT_NODE && targetId === 'p1_notpromoted_stay') return PERF_NOT_PROMOTED[rating]
  if (targetId === 'p3_retry_promoted') return PERF_RETRY_PROMOTED[rating]
  if (targetId === 'p3_retry_failed_leave') return PERF_RETRY_LEAVE[rating]
  if (SENIOR_TARGETS.has(targetId)) return PERF_SENIOR[rating]
  return 1
}

/** Strong English favours remote and client-facing work; weak English favours local roles. */
export const englishRule: MultiplierRule = (profile, _sourceId, targetId) => {
  const level = profile.englishLevel
  if (level === 'professional') return 1

  if (REMOTE_TARGETS.has(targetId) || CLIENT_FACING_FREELANCE_TARGETS.has(targetId)) {
    return ENGLISH_REMOTE[level]
  }
  if (LOCAL_TARGETS.has(targetId)) return ENGLISH_LOCAL[level]
  return 1
}

function experienceTier(years: number, tiers: ExperienceTiers): number {
  if (years >= EXPERIENCE_SENIOR_YEARS) return tiers.senior
  if (years >= EXPERIENCE_MID_YEARS) return tiers.mid
  if (years <= EXPERIENCE_JUNIOR_YEARS) return tiers.junior
  return 1
}

export const experienceRule: MultiplierRule = (profile, _sourceId, targetId) => {
  const years = profile.yearsExperience
  if (years >= EXPERIENCE_NEUTRAL_BAND.low && years <= EXPERIENCE_NEUTRAL_BAND.high) return 1

  if (EXPERIENCE_PROMOTION_TARGETS.has(targetId)) return experienceTier(years, EXP_PROMOTED)
  if (EXPERIENCE_REMOTE_TARGETS.has(targetId)) return experienceTier(years, EXP_REMOTE)
  if (EXPERIENCE_STAGNATION_TARGETS.has(targetId)) return experienceTier(years, EXP_STAGNATE)
  return 1
}

/** Capital-intensive entries; thresholds differ per branch. */
export const savingsRule: MultiplierRule = (profile, sourceId, targetId) => {
  const savings = profile.availableSavingsUsd

  if (sourceId === ROOT_NODE && targetId === 'p1_trading') {
    const t = SAVINGS_TRADING_ENTRY
    if (savings >= t.highAt) return t.high
    if (savings >= t.midAt) return t.mid
    if (savings <= t.minimalAt) return t.minimal
    if (savings <= t.lowAt) return t.low
    return 1
  }
  if (sourceId === ROOT_NODE && targetId === 'p1_startup') {
    const t = SAVINGS_STARTUP_ENTRY
    if (savings >= t.highAt) return t.high
    if (savings >= t.midAt) return t.mid
    if (savings <= t.lowAt) return t.low
    return 1
  }
  if (sourceId === 'p1_trading' && targetId === 'p2_trade_stocks') {
    if (savings >= SAVINGS_STOCKS.highAt) return SAVINGS_STOCKS.high
    if (savings <= SAVINGS_STOCKS.lowAt) return SAVINGS_STOCKS.low
    return 1
  }
  if (sourceId === 'p1_trading' && targetId === 'p2_trade_crypto') {
    if (savings <= SAVINGS_CRYPTO.lowAt) return SAVINGS_CRYPTO.low
    if (savings >= SAVINGS_CRYPTO.highAt) return SAVINGS_CRYPTO.high
    return 1
  }
  if (targetId === 'p3_trade_profitable') {
    if (savings >= SAVINGS_PROFITABLE.highAt) return SAVINGS_PROFITABLE.high
    if (savings <= SAVINGS_PROFITABLE.lowAt) return SAVINGS_PROFITABLE.low
  }
  return 1
}

export const quantRule: MultiplierRule = (profile, _sourceId, targetId) => {
  const aptitude = profile.quantAptitude
  if (aptitude === 'moderate') return 1

  if (ALGO_TRADING_TARGETS.has(targetId)) return QUANT_ALGO[aptitude]
  if (targetId === 'p3_trade_profitable') return QUANT_PROFITABLE[aptitude]
  if (targetId === 'p3_trade_loss') return QUANT_LOSS[aptitude]
  return 1
}

export const sideProjectsRule: MultiplierRule = (profile, sourceId, targetId) => {
  if (!profile.hasSideProjects) return 1

  if (PROJECTS_TRACTION_TARGETS.has(targetId)) return PROJECTS_STARTUP_TRACTION
  if (targetId === 'p3_startup_failed') return PROJECTS_STARTUP_FAILED
  if (PROJECTS_REMOTE_TARGETS.has(targetId)) return PROJECTS_REMOTE
  if (sourceId === ROOT_NODE && targetId === 'p1_startup') return PROJECTS_STARTUP_ENTRY
  return 1
}

export const freelanceProfileRule: MultiplierRule = (profile, sourceId, targetId) => {
  if (!profile.hasFreelanceProfile) return 1

  if (sourceId === ROOT_NODE && targetId === 'p1_freelance') return FREELANCE_ENTRY
  if (FREELANCE_SUCCESS_TARGETS.has(targetId)) return FREELANCE_SUCCESS
  if (targetId === 'p3_freelance_side') return FREELANCE_SIDE
  if (targetId === 'p3_freelance_dried') return FREELANCE_DRIED
  if (targetId === 'p2_freelance_platform') return FREELANCE_PLATFORM
  return 1
}

export const publicationsRule: MultiplierRule = (profile, _sourceId, targetId) => {
  if (!profile.hasPublications) return 1

  if (PUBS_CAREER_TARGETS.has(targetId)) return PUBS_CAREER
  if (PUBS_REMOTE_TARGETS.has(targetId)) return PUBS_REMOTE
  if (targetId === 'p2_startup_ai_saas') return PUBS_STARTUP_AI
  return 1
}

/** Only moves the first promotion edge, and only outside the neutral band. */
export const gpaRule: MultiplierRule = (profile, _sourceId, targetId) => {
  const gpa = profile.gpa
  if (gpa === null || (gpa >= GPA_NEUTRAL_BAND.low && gpa <= GPA_NEUTRAL_BAND.high)) return 1
  if (targetId !== 'p1_promoted') return 1
  if (gpa >= GPA_HIGH_AT) return GPA_HIGH_PROMOTED
  if (gpa <= GPA_LOW_AT) return GPA_LOW_PROMOTED
  return 1
}

// ── Registry ─────────────────────────────────────────────────────

const RULES: Map<RuleName, MultiplierRule> = new Map<RuleName, MultiplierRule>([
  ['risk', riskRule],
  ['performance', performanceRule],
  ['english', englishRule],
  ['experience', experienceRule],
  ['savings', savingsRule],
  ['quant', quantRule],
  ['sideProjects', sideProjectsRule],
  ['freelanceProfile', freelanceProfileRule],
  ['publications', publicationsRule],
  ['gpa', gpaRule],
])

export function getRule(name: RuleName): MultiplierRule | undefined {
  return RULES.get(name)
}

export function getRuleNames(): RuleName[] {
  return [...RULES.keys()]
}

/** Each rule's multiplier for one edge, in application order. */
export function ruleBreakdown(
  profile: UserProfile,
  sourceId: string,
  targetId: string,
): Array<{ rule: RuleName; multiplier: number }> {
  return [...RULES.entries()].map(([rule, apply]) => ({ rule, multiplier: apply(profile, sourceId, targetId) }))
}

/** Product of every rule's multiplier for one edge. */
export function combinedMultiplier(profile: UserProfile, sourceId: string, targetId: string): number {
  let product = 1
  for (const apply of RULES.values()) product *= apply(profile, sourceId, targetId)
  return product
}
