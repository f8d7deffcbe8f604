/**
 * Income Schedule — Social Security, pensions, wages and annuities.
 *
 * These streams do not depend on the plan, so they are resolved once per
 * scenario and both plans copy their amounts from the same frozen table.
 */

import type { IncomeSource, IncomeSourceId, Owner, Scenario } from '../model/types'
import { StateNotReadyError } from '../model/errors'
import { compound, sumCents } from '../model/money'

export interface IncomeYear {
  year: number
  bySource: ReadonlyMap<IncomeSourceId, number>
  socialSecurity: number
  pension: number
  /** Every non-Social-Security stream (pension, wages, annuity, other). */
  ordinary: number
}

export type IncomeSchedule = ReadonlyMap<number, IncomeYear>

export function ownerBirthYear(
  scenario: Pick<Scenario, 'primaryBirthYear' | 'spouseBirthYear'>,
  owner: Owner,
): number | undefined {
  return owner === 'primary' ? scenario.primaryBirthYear : scenario.spouseBirthYear
}

/**
 * Amount one source pays in `year`, in cents.
 *
 * Payments start in the year the owner reaches `startAge` and stop after
 * `endAge`. Wages also stop in the retirement year. COLA compounds from
 * the first payment year.
 */
export function incomeForYear(
  source: IncomeSource,
  year: number,
  birthYear: number,
  retirementYear: number,
): number {
  const age = year - birthYear
  if (age < source.startAge) return 0
  if (source.endAge !== undefined && age > source.endAge) return 0
  if (source.kind === 'wages' && year >= retirementYear) return 0

  const firstPaymentYear = birthYear + source.startAge
  return compound(source.annualAmount, source.cola, year - firstPaymentYear)
}

export function buildIncomeSchedule(
  scenario: Pick<
    Scenario,
    'incomeSources' | 'primaryBirthYear' | 'spouseBirthYear' | 'startYear' | 'endYear' | 'retirementYear'
  >,
): IncomeSchedule {
  const schedule = new Map<number, IncomeYear>()

  for (let year = scenario.startYear; year <= scenario.endYear; year++) {
    const bySource = new Map<IncomeSourceId, number>()
    let socialSecurity = 0
    let pension = 0

    for (const source of scenario.incomeSources) {
      const birthYear = ownerBirthYear(scenario, source.owner)
      const amount = birthYear === undefined
        ? 0
        : incomeForYear(source, year, birthYear, scenario.retirementYear)
      bySource.set(source.id, amount)
      if (source.kind === 'social_security') socialSecurity += amount
      if (source.kind === 'pension') pension += amount
    }

    schedule.set(year, Object.freeze({
      year,
      bySource,
      socialSecurity,
      pension,
      ordinary: sumCents(bySource.values()) - socialSecurity,
    }))
  }

  return schedule
}

export function incomeYear(schedule: IncomeSchedule, year: number): IncomeYear {
  const entry = schedule.get(year)
  if (!entry) {
    throw new StateNotReadyError(`Income schedule has no entry for ${year}`, year)
  }
  return entry
}
