/**
 * Piecewise-linear salary between the year-1, year-5 and year-10 data points.
 * Work years below 1 clamp to y1; above 10 clamp to y10.
 */
export function interpolateSalary(y1: number, y5: number, y10: number, workYear: number): number {
  if (workYear <= 1) return y1
  if (workYear <= 5) return y1 + ((workYear - 1) / 4) * (y5 - y1)
  if (workYear <= 10) return y5 + ((workYear - 5) / 5) * (y10 - y5)
  return y10
}
