/**
 * Growth & Balance Stepper — advances one account by one year.
 *
 * Order, identical for every account and year:
 *   1. prior − conversion out + conversion in
 *   2. growth on that principal
 *   3. RMD on the grown balance
 *   4. withdrawal = max(RMD, planned), capped at the balance
 *   5. clamp at zero
 */

import type { Account, AccountYearEntry } from '../model/types'
import type { RmdTable } from '../data/referenceData'
import { applyRate } from '../model/money'
import { isRmdEligible } from '../model/types'
import { requiredWithdrawal } from '../rules/rmd'

export interface StepInput {
  account: Account
  year: number
  priorBalance: number
  conversionOut: number
  conversionIn: number
  ownerAge: number
  ownerBirthYear: number
  rmdTable: RmdTable
}

export function plannedWithdrawal(account: Pick<Account, 'withdrawal'>, year: number): number {
  const w = account.withdrawal
  if (!w) return 0
  if (year < w.startYear) return 0
  if (w.endYear !== undefined && year > w.endYear) return 0
  return w.annualAmount
}

export function stepBalance(input: StepInput): AccountYearEntry {
  const { account, year } = input

  let balance = Math.max(0, input.priorBalance - input.conversionOut + input.conversionIn)

  const growth = applyRate(balance, account.growthRate)
  balance = Math.max(0, balance + growth)

  const rmd = requiredWithdrawal(account, input.ownerAge, input.ownerBirthYear, balance, input.rmdTable)

  const withdrawal = Math.min(Math.max(rmd, plannedWithdrawal(account, year)), balance)
  balance = Math.max(0, balance - withdrawal)

  return {
    beginningBalance: input.priorBalance,
    conversionOut: input.conversionOut,
    conversionIn: input.conversionIn,
    growth,
    rmd,
    withdrawal,
    endingBalance: balance,
    incomeContribution: isRmdEligible(account) ? withdrawal : 0,
  }
}
