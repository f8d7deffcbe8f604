/**
 * Tests for referenceData.ts — bundled tables, overrides and validation
 */

import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { ConfigurationError } from '../../src/model/errors'
import {
  bundledReferenceData,
  loadReferenceData,
  parseRmdTable,
  parseStateRuleTable,
} from '../../src/data/referenceData'

const fixtureDir = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url))

describe('bundled reference data', () => {
  it('loads the Uniform Lifetime Table', () => {
    const { rmdTable } = bundledReferenceData()
    expect(rmdTable.minAge).toBe(72)
    expect(rmdTable.maxAge).toBe(120)
    expect(rmdTable.divisors.get(75)).toBe(24.6)
  })

  it('loads the state rule table', () => {
    const { stateRules } = bundledReferenceData()
    expect(stateRules.taxYear).toBe(2025)
    expect(stateRules.states.TX.kind).toBe('none')
  })

  it('is read once', () => {
    expect(bundledReferenceData()).toBe(bundledReferenceData())
  })
})

describe('loadReferenceData', () => {
  it('prefers tables found in the data directory', () => {
    const data = loadReferenceData({ dataDir: fixtureDir('data') })
    expect(data.rmdTable.maxAge).toBe(75)
    expect(data.rmdTable.divisors.get(73)).toBe(10)
  })

  it('falls back to the bundled table for files the directory lacks', () => {
    const data = loadReferenceData({ dataDir: fixtureDir('data') })
    expect(Object.keys(data.stateRules.states)).toHaveLength(51)
  })

  it('raises ConfigurationError for an invalid override', () => {
    expect(() => loadReferenceData({ dataDir: fixtureDir('bad-data') })).toThrow(ConfigurationError)
    expect(() => loadReferenceData({ dataDir: fixtureDir('bad-data') })).toThrow(/Invalid state rule table/)
  })
})

describe('parseRmdTable', () => {
  it('rejects a non-positive divisor', () => {
    expect(() => parseRmdTable({ table: 'test', divisors: { '72': 0 } })).toThrow(ConfigurationError)
  })

  it('rejects an empty table', () => {
    expect(() => parseRmdTable({ table: 'test', divisors: {} })).toThrow('has no divisors')
  })

  it('rejects non-numeric age keys', () => {
    expect(() => parseRmdTable({ table: 'test', divisors: { seventy: 27.4 } })).toThrow(/Age keys must be whole numbers/)
  })
})

describe('parseStateRuleTable', () => {
  it('fills option defaults', () => {
    const table = parseStateRuleTable({
      taxYear: 2025,
      amounts: 'dollars',
      states: { ZZ: { name: 'Test', kind: 'none' } },
    })
    expect(table.states.ZZ).toEqual({
      name: 'Test',
      kind: 'none',
      socialSecurityTaxed: false,
      retirementIncomeExempt: false,
      retirementIncomeExclusion: 0,
    })
  })

  it('rejects lowercase state codes', () => {
    expect(() => parseStateRuleTable({
      taxYear: 2025,
      amounts: 'dollars',
      states: { tx: { name: 'Texas', kind: 'none' } },
    })).toThrow(/2-letter uppercase code/)
  })

  it('rejects a rate above 1', () => {
    expect(() => parseStateRuleTable({
      taxYear: 2025,
      amounts: 'dollars',
      states: { ZZ: { name: 'Test', kind: 'flat', rate: 5 } },
    })).toThrow(ConfigurationError)
  })
})
