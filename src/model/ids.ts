/**
 * Account and income-source identifiers.
 *
 * Real ids come from scenario input. Destination accounts the engine
 * creates live under the reserved `~` prefix, which input ids may not use.
 */

import type { AccountId, IncomeSourceId } from './types'

export const SYNTHETIC_PREFIX = '~'

const SYNTHETIC_CONVERTED = `${SYNTHETIC_PREFIX}converted/`

export function isAccountId(raw: string): raw is AccountId {
  return raw.trim().length > 0 && !raw.startsWith(SYNTHETIC_PREFIX)
}

export function isSyntheticAccountId(raw: string): raw is AccountId {
  return raw.startsWith(SYNTHETIC_CONVERTED) && /^\d+$/.test(raw.slice(SYNTHETIC_CONVERTED.length))
}

export function isIncomeSourceId(raw: string): raw is IncomeSourceId {
  return raw.trim().length > 0
}

export function accountId(raw: string): AccountId {
  if (!isAccountId(raw)) {
    throw new Error(`Invalid account id "${raw}": must be non-empty and not start with "${SYNTHETIC_PREFIX}"`)
  }
  return raw
}

/** Deterministic id for the n-th engine-created destination account (1-based). */
export function syntheticAccountId(n: number): AccountId {
  const raw = `${SYNTHETIC_CONVERTED}${n}`
  if (!Number.isInteger(n) || n < 1 || !isSyntheticAccountId(raw)) {
    throw new Error(`Invalid synthetic account ordinal: ${n}`)
  }
  return raw
}

export function incomeSourceId(raw: string): IncomeSourceId {
  if (!isIncomeSourceId(raw)) {
    throw new Error('Income source id must be non-empty')
  }
  return raw
}
