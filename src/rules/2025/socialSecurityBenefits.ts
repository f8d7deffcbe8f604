/**
 * Taxable Social Security (IRC §86, Publication 915 Worksheet 1)
 *
 * Provisional income is everything else entering AGI, conversions
 * included, plus half the year's benefits. Up to 50% of benefits are
 * taxed above the first threshold and up to 85% above the second. The
 * thresholds are statutory and never indexed, so every projected year
 * uses them unchanged. MFS is treated as living with the spouse
 * (both thresholds zero).
 */

import type { FilingStatus } from '../../model/types'

interface Thresholds {
  first: number    // cents
  second: number   // cents
}

const THRESHOLDS: Record<FilingStatus, Thresholds> = {
  single: { first: 2_500_000, second: 3_400_000 },
  hoh:    { first: 2_500_000, second: 3_400_000 },
  qw:     { first: 2_500_000, second: 3_400_000 },
  mfj:    { first: 3_200_000, second: 4_400_000 },
  mfs:    { first: 0,         second: 0 },
}

export interface SocialSecurityBenefitsResult {
  grossBenefits: number
  halfBenefits: number
  otherIncome: number
  combinedIncome: number
  baseAmount: number
  additionalAmount: number
  taxableBenefits: number
  tier: 0 | 1 | 2
}

const half = (amount: number): number => Math.round(amount * 0.5)
const eightyFive = (amount: number): number => Math.round(amount * 0.85)

export function computeTaxableSocialSecurity(
  grossBenefits: number,
  otherIncome: number,
  filingStatus: FilingStatus,
): SocialSecurityBenefitsResult {
  const { first, second } = THRESHOLDS[filingStatus]
  const benefits = Math.max(0, grossBenefits)
  const halfBenefits = benefits > 0 ? Math.round(benefits / 2) : 0
  const combinedIncome = otherIncome + halfBenefits

  let tier: SocialSecurityBenefitsResult['tier'] = 0
  let taxableBenefits = 0

  if (benefits > 0 && combinedIncome > second) {
    tier = 2
    const band = Math.min(half(second - first), half(benefits))
    taxableBenefits = Math.min(eightyFive(combinedIncome - second) + band, eightyFive(benefits))
  } else if (benefits > 0 && combinedIncome > first) {
    tier = 1
    taxableBenefits = Math.min(half(combinedIncome - first), half(benefits))
  }

  return {
    grossBenefits: benefits,
    halfBenefits,
    otherIncome,
    combinedIncome,
    baseAmount: first,
    additionalAmount: second,
    taxableBenefits,
    tier,
  }
}
