/**
 * Profile calibration of decision-graph edge weights.
 *
 * Child edges are scaled by the combined rule multiplier, then each source
 * node's child set is renormalized to sum to 1. Other edge types pass through.
 * The input graph is never mutated.
 */

import type {
  CalibratedEdge,
  CalibrationChange,
  CalibrationSummary,
  DecisionGraph,
  Edge,
  UserProfile,
} from '../model/types'
import { round1, round4 } from '../utils/math'
import { MATERIAL_CHANGE } from './constants'
import { combinedMultiplier } from './rules'

export function calibrate(graph: DecisionGraph, profile: UserProfile): CalibratedEdge[] {
  const multipliers = new Map<Edge, number>()
  const groups = new Map<string, Edge[]>()

  for (const edge of graph.edges) {
    if (edge.linkType !== 'child') continue
    multipliers.set(edge, combinedMultiplier(profile, edge.sourceId, edge.targetId))
    const group = groups.get(edge.sourceId)
    if (group) group.push(edge)
    else groups.set(edge.sourceId, [edge])
  }

  const calibrated = new Map<Edge, number>()
  for (const group of groups.values()) {
    const raw = group.map((e) => e.probability * (multipliers.get(e) ?? 1))
    const total = raw.reduce((acc, w) => acc + w, 0)
    group.forEach((edge, i) => {
      calibrated.set(edge, total > 0 ? raw[i] / total : 1 / group.length)
    })
  }

  return graph.edges.map((edge) => ({
    ...edge,
    calibratedProbability: calibrated.get(edge) ?? edge.probability,
    multiplier: round4(multipliers.get(edge) ?? 1),
  }))
}

/** source id → target id → calibrated weight */
export function calibratedEdgeMap(edges: readonly CalibratedEdge[]): Record<string, Record<string, number>> {
  const map: Record<string, Record<string, number>> = {}
  for (const edge of edges) {
    map[edge.sourceId] ??= {}
    map[edge.sourceId][edge.targetId] = edge.calibratedProbability
  }
  return map
}

/** Child edges whose weight moved materially, largest move first. */
export function calibrationDiff(edges: readonly CalibratedEdge[]): CalibrationSummary {
  const children = edges.filter((e) => e.linkType === 'child')
  const changes: CalibrationChange[] = []

  for (const edge of children) {
    const base = edge.probability
    const delta = edge.calibratedProbability - base
    if (Math.abs(delta) <= MATERIAL_CHANGE) continue
    changes.push({
      sourceId: edge.sourceId,
      targetId: edge.targetId,
      baseProbability: base,
      calibratedProbability: round4(edge.calibratedProbability),
      change: round4(delta),
      changePct: base > 0 ? round1((delta / base) * 100) : 0,
      multiplier: edge.multiplier,
    })
  }
  changes.sort((a, b) => Math.abs(b.change) - Math.abs(a.change))

  return {
    totalEdges: edges.length,
    childEdges: children.length,
    edgesChanged: changes.length,
    changes,
  }
}
