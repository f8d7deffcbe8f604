/**
 * Tests for incomeSchedule.ts
 */

import { describe, it, expect } from 'vitest'
import { cents } from '../../src/model/money'
import { incomeSourceId } from '../../src/model/ids'
import { StateNotReadyError } from '../../src/model/errors'
import { buildIncomeSchedule, incomeForYear, incomeYear, ownerBirthYear } from '../../src/projection/incomeSchedule'
import { makeIncome, makeScenario } from '../fixtures/scenarios'

describe('incomeForYear', () => {
  const ss = makeIncome('ss', 'social_security', 30000, 67)

  it('starts at the start age', () => {
    expect(incomeForYear(ss, 2021, 1955, 2020)).toBe(0)
    expect(incomeForYear(ss, 2022, 1955, 2020)).toBe(cents(30000))
  })

  it('compounds COLA from the first payment year', () => {
    const withCola = makeIncome('ss', 'social_security', 30000, 67, { cola: 0.02 })
    expect(incomeForYear(withCola, 2022, 1955, 2020)).toBe(cents(30000))
    expect(incomeForYear(withCola, 2024, 1955, 2020)).toBe(cents(31212))
    expect(incomeForYear(withCola, 2025, 1955, 2020)).toBe(3183624)
  })

  it('stops after the end age', () => {
    const annuity = makeIncome('annuity', 'annuity', 10000, 60, { endAge: 62 })
    expect(incomeForYear(annuity, 2032, 1970, 2025)).toBe(cents(10000))
    expect(incomeForYear(annuity, 2033, 1970, 2025)).toBe(0)
  })

  it('stops wages in the retirement year', () => {
    const wages = makeIncome('job', 'wages', 80000, 0)
    expect(incomeForYear(wages, 2025, 1970, 2026)).toBe(cents(80000))
    expect(incomeForYear(wages, 2026, 1970, 2026)).toBe(0)
  })
})

describe('buildIncomeSchedule', () => {
  const scenario = makeScenario({
    primaryBirthYear: 1958,
    spouseBirthYear: 1960,
    filingStatus: 'mfj',
    startYear: 2025,
    endYear: 2026,
    retirementYear: 2026,
    incomeSources: [
      makeIncome('ss', 'social_security', 24000, 67),
      makeIncome('pension', 'pension', 12000, 65, { owner: 'spouse' }),
      makeIncome('job', 'wages', 50000, 0),
    ],
  })
  const schedule = buildIncomeSchedule(scenario)

  it('totals each year by kind', () => {
    const y2025 = incomeYear(schedule, 2025)
    expect(y2025.socialSecurity).toBe(cents(24000))
    expect(y2025.pension).toBe(cents(12000))
    expect(y2025.ordinary).toBe(cents(62000))
    expect(y2025.bySource.get(incomeSourceId('job'))).toBe(cents(50000))

    const y2026 = incomeYear(schedule, 2026)
    expect(y2026.ordinary).toBe(cents(12000))
    expect(y2026.bySource.get(incomeSourceId('job'))).toBe(0)
  })

  it('covers exactly the projection years', () => {
    expect([...schedule.keys()]).toEqual([2025, 2026])
    expect(() => incomeYear(schedule, 2027)).toThrow(StateNotReadyError)
  })
})

describe('ownerBirthYear', () => {
  it('selects the owner', () => {
    const scenario = { primaryBirthYear: 1960, spouseBirthYear: 1962 }
    expect(ownerBirthYear(scenario, 'primary')).toBe(1960)
    expect(ownerBirthYear(scenario, 'spouse')).toBe(1962)
    expect(ownerBirthYear({ primaryBirthYear: 1960 }, 'spouse')).toBeUndefined()
  })
})
