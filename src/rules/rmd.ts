/**
 * Required Minimum Distributions
 *
 * Uniform Lifetime Table method: the distribution for a year is the
 * balance divided by the divisor for the owner's age in that year.
 *
 * Start age depends on birth year (SECURE Act 2.0, §107):
 *   born 1950 or earlier → 72
 *   born 1951–1959       → 73
 *   born 1960 or later   → 75
 *
 * Source: 26 CFR 1.401(a)(9)-9(c)
 */

import type { Account } from '../model/types'
import type { RmdTable } from '../data/referenceData'
import { ConfigurationError } from '../model/errors'
import { isRmdEligible } from '../model/types'

// ── Start age ──────────────────────────────────────────────────

export function rmdStartAge(birthYear: number): number {
  if (birthYear <= 1950) return 72
  if (birthYear <= 1959) return 73
  return 75
}

// ── Divisor lookup ─────────────────────────────────────────────

/**
 * Divisor for an age. Ages past the last row use the last divisor;
 * a gap inside the table is a configuration error.
 */
export function lifeExpectancyDivisor(age: number, table: RmdTable): number {
  const lookupAge = Math.min(age, table.maxAge)
  const divisor = table.divisors.get(lookupAge)
  if (divisor === undefined) {
    throw new ConfigurationError(`No RMD divisor for age ${age} (table covers ${table.minAge}–${table.maxAge})`)
  }
  return divisor
}

// ── Required withdrawal ────────────────────────────────────────

/**
 * Minimum distribution due for the year, in cents.
 *
 * Zero when the account is not RMD-eligible, the balance is zero or the
 * owner has not reached the start age. Never more than the balance.
 */
export function requiredWithdrawal(
  account: Pick<Account, 'type'>,
  ownerAge: number,
  ownerBirthYear: number,
  balance: number,
  table: RmdTable,
): number {
  if (!isRmdEligible(account)) return 0
  if (balance <= 0) return 0
  if (ownerAge < rmdStartAge(ownerBirthYear)) return 0

  const divisor = lifeExpectancyDivisor(ownerAge, table)
  return Math.min(balance, Math.round(balance / divisor))
}
