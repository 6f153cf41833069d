/** Round half away from zero to a fixed number of decimals. */
export function round(value: number, digits: number): number {
  const factor = 10 ** digits
  const scaled = Math.abs(value) * factor
  // Nudge past binary representation error so 1.005 rounds to 1.01.
  const rounded = Math.round(scaled + Number.EPSILON * scaled) / factor
  return value < 0 ? -rounded : rounded
}

export const round1 = (value: number): number => round(value, 1)
export const round2 = (value: number): number => round(value, 2)
export const round4 = (value: number): number => round(value, 4)
