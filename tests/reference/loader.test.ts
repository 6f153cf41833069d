import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_DIR } from '../../src/config'
import { ValidationError } from '../../src/errors'
import {
  buildDecisionGraph,
  buildReferenceContext,
  loadDecisionGraph,
  loadPrograms,
  loadReferenceContext,
} from '../../src/reference/loader'
import { findBrackets, getConfigUsd, toUsd } from '../../src/reference/context'
import { makeEdge, makeNode, syntheticRaw } from '../fixtures/reference'

describe('buildReferenceContext', () => {
  it('converts bracket thresholds to USD and maps the sentinel to Infinity', () => {
    const ctx = buildReferenceContext(syntheticRaw())
    const table = findBrackets(ctx, 'Pakistan', 'income')

    expect(table?.currency).toBe('PKR')
    expect(table?.brackets).toEqual([
      { threshold: 10_000, rate: 0 },
      { threshold: Infinity, rate: 0.1 },
    ])
  })

  it('lower-cases region keywords', () => {
    const ctx = buildReferenceContext(syntheticRaw())
    expect(ctx.regionKeywords[0].keyword).toBe('new york')
  })

  it('defaults the home market to Pakistan', () => {
    const ctx = buildReferenceContext(syntheticRaw())
    expect(ctx.home).toEqual({ country: 'Pakistan', city: 'Pakistan' })
  })

  it('rejects a bracket table whose currency has no exchange rate', () => {
    const raw = syntheticRaw()
    raw.exchangeRates = { USD: 1 }
    expect(() => buildReferenceContext(raw)).toThrow(/no exchange rate for PKR/)
  })

  it('rejects a bracket table without an unbounded top bracket', () => {
    const raw = syntheticRaw()
    raw.taxBrackets = { Pakistan: { income: { currency: 'USD', brackets: [[10_000, 0.1]] } } }
    expect(() => buildReferenceContext(raw)).toThrow(/last bracket must be unbounded/)
  })

  it('rejects descending thresholds', () => {
    const raw = syntheticRaw()
    raw.taxBrackets = {
      Pakistan: { income: { currency: 'USD', brackets: [[20_000, 0.1], [10_000, 0.2]] } },
    }
    expect(() => buildReferenceContext(raw)).toThrow(ValidationError)
  })

  it('rejects a home market without a living-cost row', () => {
    expect(() =>
      buildReferenceContext(syntheticRaw(), { home: { country: 'Pakistan', city: 'Karachi' } }),
    ).toThrow(/home market 'Karachi' has no living-cost row/)
  })
})

describe('context lookups', () => {
  it('converts local-currency config scalars through the jurisdiction currency', () => {
    const raw = syntheticRaw()
    raw.taxConfig = {
      _generic: { income: { effective_rate: 0.3 } },
      Pakistan: { social: { cap_lc: 560_000 } },
    }
    const ctx = buildReferenceContext(raw)

    expect(toUsd(ctx, 2_800, 'PKR')).toBe(10)
    expect(getConfigUsd(ctx, 'Pakistan', 'social', 'cap_lc')).toBe(2_000)
  })
})

describe('buildDecisionGraph', () => {
  it('rejects edges that point at unknown nodes', () => {
    const nodes = [makeNode({ id: 'root' })]
    const edges = [makeEdge(1, 'root', 'missing', 1)]
    expect(() => buildDecisionGraph(nodes, edges)).toThrow(/edge 1: unknown target 'missing'/)
  })

  it('rejects duplicate node ids', () => {
    const nodes = [makeNode({ id: 'a' }), makeNode({ id: 'a' })]
    expect(() => buildDecisionGraph(nodes, [])).toThrow(/duplicate node ids/)
  })
})

describe('bundled dataset', () => {
  it('loads and validates every table', () => {
    const ctx = loadReferenceContext(DEFAULT_DATA_DIR)
    expect(ctx.exchangeRates.get('USD')).toBe(1)
    expect(ctx.brackets.has('USA')).toBe(true)
    expect(ctx.livingCosts.has(ctx.home.city)).toBe(true)
  })

  it('ships 16 programs with unique ids', () => {
    const programs = loadPrograms(DEFAULT_DATA_DIR)
    expect(programs).toHaveLength(16)
    expect(new Set(programs.map((p) => p.id)).size).toBe(16)
  })

  it('ships a decision graph rooted at "root"', () => {
    const graph = loadDecisionGraph(DEFAULT_DATA_DIR)
    expect(graph.nodes).toHaveLength(57)
    expect(graph.edges).toHaveLength(71)

    const root = graph.nodes.find((n) => n.id === 'root')
    expect(root?.phase).toBe(0)
    expect(root?.y1IncomeK).toBeNull()
  })

  it('child edges out of each node sum to 1', () => {
    const graph = loadDecisionGraph(DEFAULT_DATA_DIR)
    const totals = new Map<string, number>()
    for (const e of graph.edges) {
      if (e.linkType !== 'child') continue
      totals.set(e.sourceId, (totals.get(e.sourceId) ?? 0) + e.probability)
    }
    for (const total of totals.values()) expect(total).toBeCloseTo(1, 6)
  })
})
