import type { GroupStats, GroupSummary } from '../model/types'
import { round1 } from '../utils/math'
import { HIGHLIGHT_COUNT } from './constants'

/**
 * Average, count, min and max per group, one decimal, groups ordered by
 * (unrounded) average descending. Ties keep first-seen order.
 */
export function groupSummary<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  valueOf: (item: T) => number,
): GroupSummary {
  const groups = new Map<string, number[]>()
  for (const item of items) {
    const key = keyOf(item)
    const values = groups.get(key)
    if (values) values.push(valueOf(item))
    else groups.set(key, [valueOf(item)])
  }

  const stats: Array<{ mean: number; row: GroupStats }> = []
  for (const [key, values] of groups) {
    const mean = values.reduce((acc, v) => acc + v, 0) / values.length
    stats.push({
      mean,
      row: {
        key,
        avg: round1(mean),
        count: values.length,
        min: round1(Math.min(...values)),
        max: round1(Math.max(...values)),
      },
    })
  }
  return stats.sort((a, b) => b.mean - a.mean).map((s) => s.row)
}

/** First and last entries of an already-sorted list. */
export function highlights<T, H>(
  sorted: readonly T[],
  pick: (item: T) => H,
  count: number = HIGHLIGHT_COUNT,
): { top: H[]; bottom: H[] } {
  return {
    top: sorted.slice(0, count).map(pick),
    bottom: sorted.slice(Math.max(0, sorted.length - count)).map(pick),
  }
}

/** Stable sort by net benefit, highest first. */
export function byNetBenefitDesc<T extends { netBenefitK: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.netBenefitK - a.netBenefitK)
}

export function countPositive(items: readonly { netBenefitK: number }[]): number {
  return items.filter((item) => item.netBenefitK > 0).length
}
