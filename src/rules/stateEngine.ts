/**
 * State Rules Engine — interfaces for state income tax
 *
 * Each state implements StateRulesModule. Modules are built from the
 * state rule table (see stateRegistry.ts); three kinds exist:
 *   none        — no income tax
 *   flat        — one rate on state taxable income
 *   progressive — bracket table for single and joint filers
 */

import type { FilingStatus } from '../model/types'
import type { StateRule } from '../data/referenceData'
import type { TaxBracket } from './2025/constants'
import { cents, applyRate } from '../model/money'
import { computeBracketTax } from './2025/taxComputation'

/** What a state needs to know about the year's federal picture (cents). */
export interface StateTaxInput {
  filingStatus: FilingStatus
  /** Federal AGI, conversions and taxable Social Security included. */
  agi: number
  taxableSocialSecurity: number
  /** Pre-tax distributions, conversions and pension income inside AGI. */
  retirementIncome: number
}

/** Standardised result from any state computation */
export interface StateComputeResult {
  stateCode: string
  excludedSocialSecurity: number
  excludedRetirementIncome: number
  stateDeduction: number
  stateTaxableIncome: number
  stateTax: number
}

/** Contract that each state module must implement */
export interface StateRulesModule {
  stateCode: string
  stateName: string
  kind: StateRule['kind']
  compute: (input: StateTaxInput) => StateComputeResult
}

// ── Module factory ──────────────────────────────────────────────

type BracketSchedule = 'single' | 'mfj'

/** HOH and MFS use the single schedule; QW uses the joint one. */
export function stateScheduleKey(filingStatus: FilingStatus): BracketSchedule {
  return filingStatus === 'mfj' || filingStatus === 'qw' ? 'mfj' : 'single'
}

function toCentsBrackets(brackets: { floor: number; rate: number }[]): TaxBracket[] {
  return brackets.map((b) => ({ rate: b.rate, floor: cents(b.floor) }))
}

/** Build a state module from one row of the state rule table. */
export function createStateModule(stateCode: string, rule: StateRule): StateRulesModule {
  const exclusion = cents(rule.retirementIncomeExclusion)

  const excludedAmounts = (input: StateTaxInput) => {
    const excludedSocialSecurity = rule.socialSecurityTaxed ? 0 : input.taxableSocialSecurity
    const excludedRetirementIncome = rule.retirementIncomeExempt
      ? input.retirementIncome
      : Math.min(input.retirementIncome, exclusion)
    return { excludedSocialSecurity, excludedRetirementIncome }
  }

  const finish = (input: StateTaxInput, deduction: number, tax: (taxable: number) => number): StateComputeResult => {
    const { excludedSocialSecurity, excludedRetirementIncome } = excludedAmounts(input)
    const stateTaxableIncome = Math.max(
      0,
      input.agi - excludedSocialSecurity - excludedRetirementIncome - deduction,
    )
    return {
      stateCode,
      excludedSocialSecurity,
      excludedRetirementIncome,
      stateDeduction: deduction,
      stateTaxableIncome,
      stateTax: tax(stateTaxableIncome),
    }
  }

  switch (rule.kind) {
    case 'none':
      return {
        stateCode,
        stateName: rule.name,
        kind: rule.kind,
        compute: (input) => finish(input, 0, () => 0),
      }
    case 'flat':
      return {
        stateCode,
        stateName: rule.name,
        kind: rule.kind,
        compute: (input) => finish(input, 0, (taxable) => applyRate(taxable, rule.rate)),
      }
    case 'progressive': {
      const brackets: Record<BracketSchedule, TaxBracket[]> = {
        single: toCentsBrackets(rule.brackets.single),
        mfj: toCentsBrackets(rule.brackets.mfj),
      }
      const deductions: Record<BracketSchedule, number> = {
        single: cents(rule.standardDeduction.single),
        mfj: cents(rule.standardDeduction.mfj),
      }
      return {
        stateCode,
        stateName: rule.name,
        kind: rule.kind,
        compute: (input) => {
          const key = stateScheduleKey(input.filingStatus)
          return finish(input, deductions[key], (taxable) => computeBracketTax(taxable, brackets[key]))
        },
      }
    }
  }
}
