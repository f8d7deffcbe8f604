/**
 * Tax Computation — bracket math
 *
 * Ordinary income tax via progressive brackets, plus the marginal-rate
 * lookup used for reporting. Bracket tables come from the resolved year
 * tables, so the same functions serve every simulated year.
 *
 * Source: 2025 Form 1040 instructions, Tax Computation Worksheet
 */

import type { TaxBracket } from './constants'

// ── Ordinary bracket computation ────────────────────────────────

/**
 * Compute tax using progressive tax brackets.
 *
 * @param taxableIncome - amount in cents (must be ≥ 0)
 * @param brackets - ordered bracket array (ascending by floor)
 * @returns tax in cents (rounded to nearest cent)
 */
export function computeBracketTax(taxableIncome: number, brackets: TaxBracket[]): number {
  if (taxableIncome <= 0) return 0

  let tax = 0
  for (let i = 0; i < brackets.length; i++) {
    const floor = brackets[i].floor
    const ceiling = i + 1 < brackets.length ? brackets[i + 1].floor : Infinity
    if (taxableIncome <= floor) break
    const taxableInBracket = Math.min(taxableIncome, ceiling) - floor
    tax += taxableInBracket * brackets[i].rate
  }

  return Math.round(tax)
}

/**
 * Rate of the bracket holding the top dollar of `taxableIncome`.
 * Zero when there is no taxable income.
 */
export function marginalRate(taxableIncome: number, brackets: TaxBracket[]): number {
  if (taxableIncome <= 0) return 0

  let rate = 0
  for (const bracket of brackets) {
    if (taxableIncome <= bracket.floor) break
    rate = bracket.rate
  }
  return rate
}
