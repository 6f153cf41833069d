/**
 * Projection assumptions. Money in USD thousands per year unless noted.
 */

// ── Graduate-program track ──────────────────────────────────────

/** Study years plus work years. */
export const PROGRAM_HORIZON_YEARS = 12
export const PROGRAM_DEFAULT_TRANSITION_YEAR = 5
export const PROGRAM_DEFAULT_DURATION_YEARS = 2

/** Upfront capital ceiling (whole USD) when funding is guaranteed. */
export const GUARANTEED_FUNDING_CAPITAL_CAP_USD = 3000

/**
 * Share of upfront capital assumed to be tuition-driven. An approximation:
 * the program records carry no breakdown of the upfront figure.
 */
export const CAPITAL_TUITION_SHARE = 0.5

// ── Home-career-path track ──────────────────────────────────────

export const PATH_HORIZON_YEARS = 10
export const PATH_DEFAULT_TRANSITION_YEAR = 3

// ── Baseline ────────────────────────────────────────────────────

/** Current home salary (220K PKR/month) in USD thousands per year. */
export const BASELINE_SALARY_K = 9.5
export const BASELINE_GROWTH = 0.08

// ── Summaries ───────────────────────────────────────────────────

export const HIGHLIGHT_COUNT = 5
