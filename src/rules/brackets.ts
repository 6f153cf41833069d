/**
 * Progressive bracket math.
 *
 * Brackets carry an UPPER threshold; the first bracket starts at 0 and the
 * last one is unbounded (Infinity). All amounts are whole USD.
 */

import type { Bracket } from '../model/types'

/**
 * Tax owed on `income` under progressive brackets.
 *
 * Each bracket taxes only the slice of income in (previous threshold, threshold].
 * The walk stops as soon as income no longer reaches the previous threshold.
 */
export function applyBrackets(income: number, brackets: readonly Bracket[]): number {
  let tax = 0
  let prev = 0
  for (const { threshold, rate } of brackets) {
    if (income <= prev) break
    const slice = Math.min(income, threshold) - prev
    if (slice > 0) tax += slice * rate
    prev = threshold
  }
  return tax
}

/** Same brackets with the first upper threshold replaced (e.g. a tapered allowance). */
export function withFirstThreshold(brackets: readonly Bracket[], threshold: number): Bracket[] {
  if (brackets.length === 0) return []
  const [first, ...rest] = brackets
  return [{ threshold, rate: first.rate }, ...rest]
}
