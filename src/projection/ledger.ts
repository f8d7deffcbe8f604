/**
 * Account Ledger — per-account, per-year ending balances for one plan.
 *
 * Opening balances are seeded at `startYear − 1`. Every later year becomes
 * readable only once the driver has written it; a read ahead of that is a
 * driver-ordering bug and throws instead of falling back to the seed.
 */

import type { Account, AccountId } from '../model/types'
import { ProjectionError, StateAlreadyWrittenError, StateNotReadyError } from '../model/errors'
import { isCents } from '../model/money'

export type LedgerSnapshot = Record<string, Record<string, number>>

export class AccountLedger {
  private readonly balances = new Map<AccountId, Map<number, number>>()

  /**
   * @param openingYear year the starting balances belong to (startYear − 1)
   */
  constructor(
    readonly openingYear: number,
    accounts: readonly Pick<Account, 'id' | 'startingBalance'>[],
  ) {
    for (const account of accounts) {
      if (this.balances.has(account.id)) {
        throw new StateAlreadyWrittenError(`Account ${account.id} seeded twice`, openingYear)
      }
      assertAmount(account.id, openingYear, account.startingBalance)
      this.balances.set(account.id, new Map([[openingYear, account.startingBalance]]))
    }
  }

  accountIds(): AccountId[] {
    return [...this.balances.keys()]
  }

  has(accountId: AccountId, year: number): boolean {
    return this.balances.get(accountId)?.has(year) ?? false
  }

  getBalance(accountId: AccountId, year: number): number {
    const byYear = this.balances.get(accountId)
    if (!byYear) {
      throw new StateNotReadyError(`No ledger entries for account ${accountId}`, year)
    }
    const balance = byYear.get(year)
    if (balance === undefined) {
      throw new StateNotReadyError(`Balance for account ${accountId} in ${year} has not been computed`, year)
    }
    return balance
  }

  setBalance(accountId: AccountId, year: number, amount: number): void {
    const byYear = this.balances.get(accountId)
    if (!byYear) {
      throw new StateNotReadyError(`No ledger entries for account ${accountId}`, year)
    }
    if (byYear.has(year)) {
      throw new StateAlreadyWrittenError(`Balance for account ${accountId} in ${year} is already recorded`, year)
    }
    if (!byYear.has(year - 1)) {
      throw new StateNotReadyError(`Balance for account ${accountId} in ${year - 1} has not been computed`, year - 1)
    }
    assertAmount(accountId, year, amount)
    byYear.set(year, amount)
  }

  /** Plain nested record, account ids and years in ascending order. */
  snapshot(): LedgerSnapshot {
    const out: LedgerSnapshot = {}
    for (const id of [...this.balances.keys()].sort()) {
      const byYear = this.balances.get(id)
      if (!byYear) continue
      const years: Record<string, number> = {}
      for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
        const value = byYear.get(year)
        if (value !== undefined) years[String(year)] = value
      }
      out[id] = years
    }
    return out
  }
}

function assertAmount(accountId: AccountId, year: number, amount: number): void {
  if (!isCents(amount) || amount < 0) {
    throw new ProjectionError(`Balance for account ${accountId} in ${year} must be a non-negative integer of cents, got ${amount}`)
  }
}
