import { describe, it, expect } from 'vitest'
import { round, round1, round2, round4 } from '../../src/utils/math'

describe('round', () => {
  it('rounds half away from zero', () => {
    expect(round(2.5, 0)).toBe(3)
    expect(round(-2.5, 0)).toBe(-3)
    expect(round2(0.125)).toBe(0.13)
  })

  it('is not fooled by binary representation error', () => {
    expect(round2(1.005)).toBe(1.01)
  })

  it('keeps the requested number of decimals', () => {
    expect(round1(-24.444)).toBe(-24.4)
    expect(round4(0.123456)).toBe(0.1235)
    expect(round2(7)).toBe(7)
  })
})
