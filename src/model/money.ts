/**
 * Money helpers.
 *
 * Every amount inside the engine is an integer number of cents. Dollars
 * only appear at the edges (reference tables, test fixtures, display).
 * Any multiplication by a rate is rounded back to a whole cent right away,
 * so balances never accumulate floating-point dust.
 */

// ── Conversion ─────────────────────────────────────────────────

/**
 * Convert a dollar amount to integer cents.
 * Rounds to nearest cent to handle floating-point imprecision.
 *
 *   cents(100.10) → 10010
 *   cents(0)      → 0
 *   cents(-50.5)  → -5050
 */
export function cents(dollars: number): number {
  return Math.round(dollars * 100)
}

/**
 * Convert integer cents back to dollars for display.
 *
 *   dollars(10010)  → 100.10
 *   dollars(0)      → 0
 *   dollars(-5050)  → -50.50
 */
export function dollars(amountInCents: number): number {
  return amountInCents / 100
}

// ── Arithmetic ─────────────────────────────────────────────────

/**
 * Multiply an amount by a rate and round to the nearest cent.
 *
 *   applyRate(150_000_000, 0.06) → 9_000_000
 */
export function applyRate(amountInCents: number, rate: number): number {
  return Math.round(amountInCents * rate)
}

/** Compound an amount by `rate` over `periods` years, rounded once at the end. */
export function compound(amountInCents: number, rate: number, periods: number): number {
  if (periods <= 0 || rate === 0) return amountInCents
  return Math.round(amountInCents * Math.pow(1 + rate, periods))
}

export function sumCents(values: Iterable<number>): number {
  let total = 0
  for (const v of values) total += v
  return total
}

export function isCents(value: number): boolean {
  return Number.isSafeInteger(value)
}
