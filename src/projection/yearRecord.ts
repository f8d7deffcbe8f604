/**
 * Year Record Assembler
 *
 * Builds one plan's record for one year from that plan's ledger, the
 * shared income schedule, the plan's MAGI history and the year's tables.
 * Every field is computed here; nothing is carried over from another
 * plan's record. Income-source amounts are copied from the income
 * schedule, which is the same for both plans.
 */

import type { AccountId, AccountYearEntry, PlanKind, Scenario, YearRecord } from '../model/types'
import type { YearTables } from '../rules/yearModules'
import type { StateRulesModule } from '../rules/stateEngine'
import type { AccountLedger } from './ledger'
import type { IncomeYear } from './incomeSchedule'
import type { MagiHistory } from './magiHistory'
import { computeFederalTax, standardDeductionFor } from '../rules/federalTax'
import { computeMedicare, MEDICARE_ELIGIBILITY_AGE } from '../rules/medicare'
import { computeTaxableSocialSecurity } from '../rules/2025/socialSecurityBenefits'
import { resolveLookbackMagi } from './magiHistory'

export interface AssembleInput {
  plan: PlanKind
  year: number
  scenario: Pick<
    Scenario,
    'filingStatus' | 'primaryBirthYear' | 'spouseBirthYear' | 'startYear' | 'priorMagi' | 'magiLookbackFallback'
  >
  /** This year's stepper output; ending balances are re-read from the ledger. */
  steps: ReadonlyMap<AccountId, AccountYearEntry>
  ledger: AccountLedger
  income: IncomeYear
  history: MagiHistory
  tables: YearTables
  stateRules: StateRulesModule
}

/** Owners counted for the age-65 additional deduction on this return. */
export function seniorCount(
  filingStatus: Scenario['filingStatus'],
  primaryAge: number,
  spouseAge: number | null,
): number {
  let n = primaryAge >= MEDICARE_ELIGIBILITY_AGE ? 1 : 0
  if (filingStatus === 'mfj' && spouseAge !== null && spouseAge >= MEDICARE_ELIGIBILITY_AGE) n++
  return n
}

export function assembleYearRecord(input: AssembleInput): YearRecord {
  const { year, scenario, income, tables } = input

  const primaryAge = year - scenario.primaryBirthYear
  const spouseAge = scenario.spouseBirthYear !== undefined ? year - scenario.spouseBirthYear : null

  // ── Accounts ──
  const accounts = new Map<AccountId, AccountYearEntry>()
  let distributions = 0
  let conversionAmount = 0
  let withdrawals = 0
  for (const [id, step] of input.steps) {
    accounts.set(id, { ...step, endingBalance: input.ledger.getBalance(id, year) })
    distributions += step.incomeContribution
    conversionAmount += step.conversionOut
    withdrawals += step.withdrawal
  }

  // ── Income ──
  const grossIncome = distributions + income.ordinary
  const socialSecurityIncome = income.socialSecurity
  const taxableSocialSecurity = computeTaxableSocialSecurity(
    socialSecurityIncome,
    grossIncome + conversionAmount,
    scenario.filingStatus,
  ).taxableBenefits
  const agi = grossIncome + conversionAmount + taxableSocialSecurity
  const magi = agi

  // ── Tax ──
  const standardDeduction = standardDeductionFor(
    tables,
    scenario.filingStatus,
    seniorCount(scenario.filingStatus, primaryAge, spouseAge),
  )
  const federal = computeFederalTax({
    grossIncome,
    taxableSocialSecurity,
    conversionAmount,
    filingStatus: scenario.filingStatus,
    standardDeduction,
    brackets: tables.incomeTaxBrackets[scenario.filingStatus],
  })
  const state = input.stateRules.compute({
    filingStatus: scenario.filingStatus,
    agi,
    taxableSocialSecurity,
    retirementIncome: distributions + conversionAmount + income.pension,
  })

  // ── Medicare ──
  const medicare = computeMedicare({
    filingStatus: scenario.filingStatus,
    primaryAge,
    spouseAge,
    lookback: resolveLookbackMagi({
      year,
      startYear: scenario.startYear,
      history: input.history,
      priorMagi: scenario.priorMagi,
      fallback: scenario.magiLookbackFallback,
      currentMagi: magi,
    }),
    premiums: tables.medicare,
  })

  // ── Cash flow ──
  // Withdrawals already include the pre-tax distributions counted in gross income
  const totalIncome = income.ordinary + socialSecurityIncome + withdrawals
  const afterTaxIncome = totalIncome - federal.totalTax - state.stateTax
  const netIncome = afterTaxIncome - medicare.total

  return {
    plan: input.plan,
    year,
    primaryAge,
    spouseAge,

    accounts,
    incomeBySource: new Map(income.bySource),

    grossIncome,
    socialSecurityIncome,
    taxableSocialSecurity,
    conversionAmount,
    agi,
    magi,
    standardDeduction,
    taxableIncome: federal.taxableIncome,

    regularTax: federal.regularTax,
    conversionTax: federal.conversionTax,
    federalTax: federal.totalTax,
    stateTax: state.stateTax,
    marginalRate: federal.marginalRate,
    effectiveRate: federal.effectiveRate,

    medicare,

    totalIncome,
    afterTaxIncome,
    netIncome,
  }
}
