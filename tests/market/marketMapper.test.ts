import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_DIR } from '../../src/config'
import { resolveMarket } from '../../src/market/marketMapper'
import { loadReferenceContext } from '../../src/reference/loader'
import { syntheticContext } from '../fixtures/reference'

const ctx = syntheticContext()

describe('resolveMarket', () => {
  it('uses the exact mapping first', () => {
    expect(resolveMarket(ctx, 'USA (Seattle)')).toEqual({
      workCountry: 'USA',
      workCity: 'Seattle',
      subJurisdiction: 'WA',
    })
  })

  it('returns a copy of the mapping', () => {
    const first = resolveMarket(ctx, 'Germany')
    first.workCity = 'Hamburg'
    expect(resolveMarket(ctx, 'Germany').workCity).toBe('Berlin')
  })

  describe('empty descriptor', () => {
    it('uses the origin country as country and city', () => {
      expect(resolveMarket(ctx, '', 'Canada')).toEqual({
        workCountry: 'Canada',
        workCity: 'Canada',
        subJurisdiction: null,
      })
    })

    it('defaults to the USA without an origin', () => {
      expect(resolveMarket(ctx, null)).toEqual({ workCountry: 'USA', workCity: 'USA', subJurisdiction: null })
    })
  })

  describe('unmapped US descriptors', () => {
    it('matches region keywords case-insensitively', () => {
      expect(resolveMarket(ctx, 'USA - New York')).toEqual({
        workCountry: 'USA',
        workCity: 'NYC',
        subJurisdiction: 'NY',
      })
    })

    it('takes the first keyword in table order', () => {
      expect(resolveMarket(ctx, 'USA (York)')).toEqual({
        workCountry: 'USA',
        workCity: 'York',
        subJurisdiction: 'PA',
      })
    })

    it('defaults to the Bay Area without a keyword match', () => {
      expect(resolveMarket(ctx, 'USA (Austin)')).toEqual({
        workCountry: 'USA',
        workCity: 'Bay Area',
        subJurisdiction: 'CA',
      })
      expect(resolveMarket(ctx, 'USA')).toEqual({
        workCountry: 'USA',
        workCity: 'Bay Area',
        subJurisdiction: 'CA',
      })
    })
  })

  describe('other descriptors', () => {
    it("use the origin country and its default city", () => {
      expect(resolveMarket(ctx, 'Remote, EU', 'Germany')).toEqual({
        workCountry: 'Germany',
        workCity: 'Berlin',
        subJurisdiction: null,
      })
    })

    it('use the origin country as city when it has no default city', () => {
      expect(resolveMarket(ctx, 'Remote', 'Chile')).toEqual({
        workCountry: 'Chile',
        workCity: 'Chile',
        subJurisdiction: null,
      })
    })

    it('report an unknown country without an origin', () => {
      expect(resolveMarket(ctx, 'Somewhere')).toEqual({
        workCountry: 'Unknown',
        workCity: 'Unknown',
        subJurisdiction: null,
      })
    })
  })

  it('resolves the bundled Seattle descriptor', () => {
    const data = loadReferenceContext(DEFAULT_DATA_DIR)
    expect(resolveMarket(data, 'USA (Seattle/National)')).toEqual({
      workCountry: 'USA',
      workCity: 'Seattle',
      subJurisdiction: 'WA',
    })
  })
})
