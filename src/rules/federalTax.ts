/**
 * Federal Tax Calculator
 *
 * Two passes over the same bracket table: once without the year's
 * conversion ("regular tax") and once with it ("total tax"). The
 * difference is the tax attributable to the conversion alone.
 */

import type { FilingStatus } from '../model/types'
import type { TaxBracket } from './2025/constants'
import type { YearTables } from './yearModules'
import { computeBracketTax, marginalRate } from './2025/taxComputation'

// ── Input / result ─────────────────────────────────────────────

export interface FederalTaxInput {
  /** Ordinary income excluding Social Security and conversions (cents). */
  grossIncome: number
  taxableSocialSecurity: number
  conversionAmount: number
  filingStatus: FilingStatus
  standardDeduction: number
  brackets: TaxBracket[]
}

export interface FederalTaxResult {
  regularTaxableIncome: number
  taxableIncome: number
  regularTax: number
  totalTax: number
  conversionTax: number
  marginalRate: number
  effectiveRate: number
}

// ── Standard deduction ─────────────────────────────────────────

/**
 * Base standard deduction for the filing status plus the age-65
 * additional amount for each qualifying person.
 */
export function standardDeductionFor(
  tables: Pick<YearTables, 'standardDeduction' | 'additionalStandardDeduction65'>,
  filingStatus: FilingStatus,
  seniorCount: number,
): number {
  return tables.standardDeduction[filingStatus]
    + seniorCount * tables.additionalStandardDeduction65[filingStatus]
}

// ── Computation ────────────────────────────────────────────────

export function computeFederalTax(input: FederalTaxInput): FederalTaxResult {
  const baseIncome = input.grossIncome + input.taxableSocialSecurity

  const regularTaxableIncome = Math.max(0, baseIncome - input.standardDeduction)
  const taxableIncome = Math.max(0, baseIncome + input.conversionAmount - input.standardDeduction)

  const regularTax = computeBracketTax(regularTaxableIncome, input.brackets)
  const totalTax = computeBracketTax(taxableIncome, input.brackets)

  return {
    regularTaxableIncome,
    taxableIncome,
    regularTax,
    totalTax,
    conversionTax: Math.max(0, totalTax - regularTax),
    marginalRate: marginalRate(taxableIncome, input.brackets),
    effectiveRate: input.grossIncome > 0 ? totalTax / input.grossIncome : 0,
  }
}
