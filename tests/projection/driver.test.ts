/**
 * Tests for driver.ts — whole-scenario projections
 */

import { describe, it, expect } from 'vitest'
import { cents } from '../../src/model/money'
import { accountId, syntheticAccountId } from '../../src/model/ids'
import { ConfigurationError, ScenarioInputError } from '../../src/model/errors'
import { prepareScenario, runPlan, runProjection } from '../../src/projection/driver'
import {
  captureLogger,
  makeAccount,
  makeConversion,
  makeIncome,
  makeScenario,
  silentLogger,
} from '../fixtures/scenarios'
import type { PlanResult } from '../../src/projection/driver'
import type { AccountId, YearRecord } from '../../src/model/types'

const ira = accountId('ira')
const converted = syntheticAccountId(1)
const quiet = { logger: silentLogger }

function recordFor(plan: PlanResult, year: number): YearRecord {
  const record = plan.records.find((r) => r.year === year)
  if (!record) throw new Error(`No record for ${year}`)
  return record
}

function endingBalances(plan: PlanResult, id: AccountId): (number | undefined)[] {
  return plan.records.map((r) => r.accounts.get(id)?.endingBalance)
}

// ── Balances ─────────────────────────────────────────────────────

describe('runProjection balances', () => {
  it('moves the whole account when the full balance is converted', () => {
    const result = runProjection(makeScenario({
      accounts: [makeAccount('ira', 2000000)],
      conversions: [makeConversion('ira', 2000000, 2025, 1, { destinationGrowthRate: 0.06 })],
    }), quiet)

    expect(endingBalances(result.conversion, ira)).toEqual([0, 0, 0])
    expect(endingBalances(result.conversion, converted)).toEqual([212000000, 224720000, 238203200])
    expect(recordFor(result.baseline, 2025).accounts.get(ira)?.endingBalance).toBe(212000000)
  })

  it('splits a partial conversion between source and destination', () => {
    const result = runProjection(makeScenario({
      endYear: 2025,
      accounts: [makeAccount('ira', 2000000)],
      conversions: [makeConversion('ira', 500000, 2025, 1, { destinationGrowthRate: 0.06 })],
    }), quiet)

    const record = recordFor(result.conversion, 2025)
    expect(record.accounts.get(ira)?.endingBalance).toBe(159000000)
    expect(record.accounts.get(converted)?.endingBalance).toBe(53000000)
    expect(record.conversionAmount).toBe(cents(500000))
  })

  it('grows a synthetic destination at 5% by default', () => {
    const result = runProjection(makeScenario({
      endYear: 2025,
      accounts: [makeAccount('ira', 2000000)],
      conversions: [makeConversion('ira', 500000, 2025, 1)],
    }), quiet)
    expect(recordFor(result.conversion, 2025).accounts.get(converted)?.endingBalance).toBe(52500000)
  })

  it('spreads a multi-year conversion evenly', () => {
    const result = runProjection(makeScenario({
      accounts: [makeAccount('ira', 2000000)],
      conversions: [makeConversion('ira', 600000, 2025, 3)],
    }), quiet)

    expect(result.conversion.records.map((r) => r.conversionAmount)).toEqual([20000000, 20000000, 20000000])
    expect(endingBalances(result.conversion, ira)).toEqual([190800000, 181048000, 170710880])
  })

  it('leaves the baseline without conversions or synthetic flows', () => {
    const result = runProjection(makeScenario({
      accounts: [makeAccount('ira', 2000000)],
      conversions: [makeConversion('ira', 600000, 2025, 3)],
    }), quiet)

    for (const record of result.baseline.records) {
      expect(record.conversionAmount).toBe(0)
      expect(record.accounts.get(converted)?.endingBalance).toBe(0)
    }
  })

  it('takes RMDs once the owner reaches the start age', () => {
    const result = runProjection(makeScenario({
      primaryBirthYear: 1952,
      endYear: 2025,
      accounts: [makeAccount('ira', 50000, { growthRate: 0 })],
    }), quiet)

    const entry = recordFor(result.baseline, 2025).accounts.get(ira)
    expect(entry?.rmd).toBe(188679)
    expect(recordFor(result.baseline, 2025).grossIncome).toBe(188679)
  })
})

// ── One year in full ─────────────────────────────────────────────

describe('runProjection year record', () => {
  const result = runProjection(makeScenario({
    primaryBirthYear: 1955,
    accounts: [makeAccount('ira', 1000000, { growthRate: 0 })],
    incomeSources: [makeIncome('ss', 'social_security', 30000, 67)],
    conversions: [makeConversion('ira', 100000, 2025, 1)],
    priorMagi: { 2023: cents(120000) },
  }), quiet)

  it('taxes the conversion year', () => {
    const record = recordFor(result.conversion, 2025)
    expect(record.accounts.get(ira)?.endingBalance).toBe(cents(900000))
    expect(record.accounts.get(converted)?.endingBalance).toBe(cents(105000))
    expect(record.grossIncome).toBe(0)
    expect(record.socialSecurityIncome).toBe(cents(30000))
    expect(record.taxableSocialSecurity).toBe(cents(25500))
    expect(record.agi).toBe(cents(125500))
    expect(record.magi).toBe(cents(125500))
    expect(record.standardDeduction).toBe(cents(17000))
    expect(record.taxableIncome).toBe(cents(108500))
    expect(record.regularTax).toBe(cents(850))
    expect(record.federalTax).toBe(cents(18887))
    expect(record.conversionTax).toBe(cents(18037))
    expect(record.marginalRate).toBe(0.24)
    expect(record.effectiveRate).toBe(0)
    expect(record.stateTax).toBe(0)
  })

  it('prices Medicare from seeded prior MAGI', () => {
    const { medicare } = recordFor(result.conversion, 2025)
    expect(medicare.lookbackSource).toBe('seeded')
    expect(medicare.lookbackYear).toBe(2023)
    expect(medicare.irmaaBracket).toBe(1)
    expect(medicare.partB).toBe(cents(3108))
    expect(medicare.partD).toBe(cents(605.76))
    expect(medicare.irmaaSurcharge).toBe(cents(1052.40))
    expect(medicare.medicareBase).toBe(cents(2661.36))
    expect(medicare.total).toBe(cents(3713.76))
  })

  it('derives cash flow', () => {
    const record = recordFor(result.conversion, 2025)
    expect(record.totalIncome).toBe(cents(30000))
    expect(record.afterTaxIncome).toBe(cents(11113))
    expect(record.netIncome).toBe(cents(7399.24))
  })

  it('computes the baseline independently', () => {
    const record = recordFor(result.baseline, 2025)
    expect(record.taxableSocialSecurity).toBe(0)
    expect(record.agi).toBe(0)
    expect(record.federalTax).toBe(0)
    expect(record.medicare.total).toBe(cents(3713.76))
    expect(record.netIncome).toBe(cents(26286.24))
  })

  it('charges base premiums when the lookback year was never seeded', () => {
    const { medicare } = recordFor(result.conversion, 2026)
    expect(medicare.lookbackSource).toBe('unavailable')
    expect(medicare.magiUsed).toBeNull()
    expect(medicare.irmaaBracket).toBe(0)
    expect(medicare.partB).toBe(cents(2434.80))
    expect(medicare.partD).toBe(cents(467.88))
    expect(medicare.total).toBe(cents(2902.68))
  })

  it('reads MAGI from two years earlier in the same plan', () => {
    const conversion = recordFor(result.conversion, 2027).medicare
    expect(conversion.lookbackSource).toBe('history')
    expect(conversion.magiUsed).toBe(cents(125500))
    expect(conversion.irmaaBracket).toBe(1)

    const baseline = recordFor(result.baseline, 2027).medicare
    expect(baseline.magiUsed).toBe(0)
    expect(baseline.irmaaBracket).toBe(0)
  })

  it('copies income sources into every record', () => {
    for (const plan of [result.baseline, result.conversion]) {
      for (const record of plan.records) {
        expect([...record.incomeBySource.values()]).toEqual([cents(30000)])
      }
    }
  })

  it('returns the carried state', () => {
    expect(result.conversion.state.magiHistory.snapshot()).toEqual({
      '2025': cents(125500),
      '2026': 0,
      '2027': 0,
    })
    expect(result.conversion.state.ledger.getBalance(converted, 2024)).toBe(0)
  })
})

// ── Clamping ─────────────────────────────────────────────────────

describe('conversion clamping', () => {
  it('clamps a second leg that over-draws the same source', () => {
    const { logger, lines } = captureLogger('warn')
    const result = runProjection(makeScenario({
      endYear: 2025,
      accounts: [makeAccount('ira', 100000, { growthRate: 0 })],
      conversions: [
        makeConversion('ira', 100000, 2025, 1),
        makeConversion('ira', 100000, 2025, 1),
      ],
    }), { logger })

    expect(result.conversion.warnings).toHaveLength(1)
    expect(result.conversion.warnings[0]).toMatchObject({
      code: 'CONVERSION_CLAMPED',
      plan: 'conversion',
      year: 2025,
      accountId: ira,
      requested: cents(100000),
      applied: 0,
    })
    expect(result.baseline.warnings).toEqual([])
    expect(recordFor(result.conversion, 2025).conversionAmount).toBe(cents(100000))
    expect(lines.filter((l) => l.level === 'warn')).toHaveLength(1)
    expect(lines[0].entry.plan).toBe('conversion')
  })

  it('clamps an installment when withdrawals have emptied the source', () => {
    const result = runProjection(makeScenario({
      endYear: 2026,
      accounts: [makeAccount('ira', 100000, {
        growthRate: 0,
        withdrawal: { annualAmount: cents(60000), startYear: 2025 },
      })],
      conversions: [makeConversion('ira', 80000, 2025, 2)],
    }), quiet)

    expect(result.conversion.records.map((r) => r.conversionAmount)).toEqual([cents(40000), 0])
    expect(result.conversion.warnings).toEqual([{
      code: 'CONVERSION_CLAMPED',
      plan: 'conversion',
      year: 2026,
      accountId: ira,
      requested: cents(40000),
      applied: 0,
      message: 'Conversion from ira in 2026 clamped from 4000000 to 0 cents',
    }])
    expect(recordFor(result.conversion, 2025).accounts.get(ira)?.endingBalance).toBe(0)
    expect(result.baseline.records.map((r) => r.accounts.get(ira)?.withdrawal)).toEqual([cents(60000), cents(40000)])
  })

  it('lengthens a capped conversion', () => {
    const prepared = prepareScenario(makeScenario({
      accounts: [makeAccount('ira', 500000)],
      conversions: [makeConversion('ira', 300000, 2025, 1, { maxAnnualAmount: cents(100000) })],
    }))
    expect(prepared.conversions[0].durationYears).toBe(3)
    const plan = runPlan(prepared, 'conversion', quiet)
    expect(plan.records.map((r) => r.conversionAmount)).toEqual([cents(100000), cents(100000), cents(100000)])
  })
})

// ── Preparation ──────────────────────────────────────────────────

describe('prepareScenario', () => {
  it('creates one synthetic destination per leg without one', () => {
    const prepared = prepareScenario(makeScenario({
      accounts: [makeAccount('ira', 100000, { owner: 'spouse' })],
      spouseBirthYear: 1972,
      filingStatus: 'mfj',
      conversions: [makeConversion('ira', 10000, 2025, 1), makeConversion('ira', 10000, 2026, 1)],
    }))
    expect(prepared.accounts.map((a) => a.id)).toEqual([ira, syntheticAccountId(1), syntheticAccountId(2)])
    expect(prepared.accounts[1]).toMatchObject({ type: 'roth_ira', owner: 'spouse', synthetic: true, startingBalance: 0 })
  })

  it('routes to an existing Roth destination', () => {
    const prepared = prepareScenario(makeScenario({
      accounts: [makeAccount('ira', 100000), makeAccount('roth', 0, { type: 'roth_ira' })],
      conversions: [makeConversion('ira', 10000, 2025, 1, { destinationAccountId: accountId('roth') })],
    }))
    expect(prepared.accounts).toHaveLength(2)
    expect(prepared.conversions[0].destinationAccountId).toBe(accountId('roth'))
  })

  it('rejects an invalid scenario', () => {
    expect(() => prepareScenario(makeScenario({ endYear: 2020 }))).toThrow(ScenarioInputError)
  })
})

// ── Configuration ────────────────────────────────────────────────

describe('configuration errors', () => {
  it('raises for years past the tables under the strict policy', () => {
    expect(() => runProjection(makeScenario({ tablePolicy: 'strict' }), quiet)).toThrow(ConfigurationError)
  })

  it('raises for an unknown state', () => {
    expect(() => runProjection(makeScenario({ state: 'ZZ' }), quiet)).toThrow(ConfigurationError)
  })
})

// ── Logging ──────────────────────────────────────────────────────

describe('logging', () => {
  it('logs start, each year and finish per plan', () => {
    const { logger, lines } = captureLogger('debug')
    runProjection(makeScenario({ endYear: 2026, accounts: [makeAccount('ira', 1000)] }), { logger })

    expect(lines.map((l) => `${String(l.entry.plan)} ${String(l.entry.message)}`)).toEqual([
      'baseline Projection started',
      'baseline Year computed',
      'baseline Year computed',
      'baseline Projection finished',
      'conversion Projection started',
      'conversion Year computed',
      'conversion Year computed',
      'conversion Projection finished',
    ])
    expect(lines[2].entry).toMatchObject({ year: 2026, tablesFrom: 2026 })
  })

  it('stays quiet above the configured level', () => {
    const { logger, lines } = captureLogger('warn')
    runProjection(makeScenario({ accounts: [makeAccount('ira', 1000)] }), { logger })
    expect(lines).toEqual([])
  })
})
