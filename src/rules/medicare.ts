/**
 * Medicare Part B / Part D premiums and IRMAA
 *
 * Premiums are charged per enrollee: each owner aged 65 or older whose
 * premiums this return pays (the spouse only on a joint return). The
 * surcharge tier comes from MAGI two years before the premium year; the
 * caller resolves that value (see resolveLookbackMagi) and passes it in
 * together with where it came from.
 *
 * Source: 42 CFR 418.1115 (Part B), 42 CFR 418.2115 (Part D)
 */

import type { FilingStatus, LookbackSource, MedicareResult } from '../model/types'
import type { IrmaaScheduleKey, IrmaaTier, MedicarePremiums } from './2025/constants'

export const MEDICARE_ELIGIBILITY_AGE = 65

// ── Schedule selection ─────────────────────────────────────────

export function irmaaScheduleKey(filingStatus: FilingStatus): IrmaaScheduleKey {
  switch (filingStatus) {
    case 'mfj':
      return 'mfj'
    case 'mfs':
      return 'mfs'
    case 'single':
    case 'hoh':
    case 'qw':
      return 'single'
  }
}

/**
 * Tier ordinal for a MAGI value: the number of tier thresholds it
 * reaches. 0 means no surcharge.
 */
export function irmaaTier(magi: number, tiers: IrmaaTier[]): number {
  for (let i = tiers.length - 1; i >= 0; i--) {
    const tier = tiers[i]
    if (tier.inclusive ? magi >= tier.threshold : magi > tier.threshold) return i + 1
  }
  return 0
}

// ── Computation ────────────────────────────────────────────────

export interface LookbackMagi {
  /** MAGI the tier is taken from; null when no value applies. */
  magi: number | null
  year: number
  source: LookbackSource
}

export interface MedicareInput {
  filingStatus: FilingStatus
  primaryAge: number
  spouseAge: number | null
  lookback: LookbackMagi
  premiums: MedicarePremiums
}

/**
 * Owners whose premiums this return pays: the primary, plus the spouse
 * on a joint return. A spouse filing separately is priced on their own
 * return and MAGI.
 */
export function countEnrollees(filingStatus: FilingStatus, primaryAge: number, spouseAge: number | null): number {
  let n = primaryAge >= MEDICARE_ELIGIBILITY_AGE ? 1 : 0
  if (filingStatus === 'mfj' && spouseAge !== null && spouseAge >= MEDICARE_ELIGIBILITY_AGE) n++
  return n
}

export function computeMedicare(input: MedicareInput): MedicareResult {
  const { premiums, lookback } = input
  const enrollees = countEnrollees(input.filingStatus, input.primaryAge, input.spouseAge)
  const tiers = premiums.tiers[irmaaScheduleKey(input.filingStatus)]

  const bracket = enrollees > 0 && lookback.magi !== null ? irmaaTier(lookback.magi, tiers) : 0
  const tier = bracket > 0 ? tiers[bracket - 1] : undefined
  const surchargeB = tier?.partB ?? 0
  const surchargeD = tier?.partD ?? 0

  // Monthly per-enrollee amounts → annual household totals
  const annual = (monthly: number): number => monthly * 12 * enrollees

  const partB = annual(premiums.partBBase + surchargeB)
  const partD = annual(premiums.partDBase + surchargeD)

  return {
    enrollees,
    medicareBase: annual(premiums.partBBase + premiums.partDBase),
    partB,
    partD,
    irmaaSurcharge: annual(surchargeB + surchargeD),
    irmaaBracket: bracket,
    total: partB + partD,
    magiUsed: lookback.magi,
    lookbackYear: lookback.year,
    lookbackSource: lookback.source,
  }
}
