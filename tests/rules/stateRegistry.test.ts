/**
 * Tests for stateEngine.ts and stateRegistry.ts
 */

import { describe, it, expect } from 'vitest'
import { cents } from '../../src/model/money'
import { ConfigurationError } from '../../src/model/errors'
import { bundledReferenceData, parseStateRuleTable } from '../../src/data/referenceData'
import { createStateModule, stateScheduleKey } from '../../src/rules/stateEngine'
import { createStateRegistry } from '../../src/rules/stateRegistry'
import type { StateTaxInput } from '../../src/rules/stateEngine'

const registry = createStateRegistry(bundledReferenceData().stateRules)

const input = (overrides: Partial<StateTaxInput> = {}): StateTaxInput => ({
  filingStatus: 'single',
  agi: cents(100000),
  taxableSocialSecurity: 0,
  retirementIncome: 0,
  ...overrides,
})

// ── Registry ─────────────────────────────────────────────────────

describe('createStateRegistry', () => {
  it('covers every state and DC', () => {
    const states = registry.getSupportedStates()
    expect(states).toHaveLength(51)
    expect(states[0].code).toBe('AK')
    expect(states.find((s) => s.code === 'DC')?.stateName).toBe('District of Columbia')
  })

  it('looks codes up case-insensitively', () => {
    expect(registry.getStateModule('ca').stateCode).toBe('CA')
  })

  it('raises ConfigurationError for an unknown code', () => {
    expect(() => registry.getStateModule('ZZ')).toThrow(ConfigurationError)
    expect(() => registry.getStateModule('ZZ')).toThrow('No state rules registered for "ZZ"')
  })
})

// ── Computation ──────────────────────────────────────────────────

describe('state tax', () => {
  it('charges nothing in a no-income-tax state', () => {
    const result = registry.getStateModule('TX').compute(input({ agi: cents(500000) }))
    expect(result.stateTax).toBe(0)
    expect(registry.getStateModule('TX').kind).toBe('none')
  })

  it('applies the California progressive schedule after its deduction', () => {
    const result = registry.getStateModule('CA').compute(input({ agi: cents(50000) }))
    expect(result.stateDeduction).toBe(cents(5540))
    expect(result.stateTaxableIncome).toBe(cents(44460))
    expect(result.stateTax).toBe(cents(1245.16))
  })

  it('exempts retirement income in Illinois', () => {
    const result = registry.getStateModule('IL').compute(input({ retirementIncome: cents(60000) }))
    expect(result.excludedRetirementIncome).toBe(cents(60000))
    expect(result.stateTax).toBe(cents(1980))
  })

  it('caps the Georgia retirement exclusion and drops Social Security', () => {
    const result = registry.getStateModule('GA').compute(input({
      retirementIncome: cents(80000),
      taxableSocialSecurity: cents(10000),
    }))
    expect(result.excludedSocialSecurity).toBe(cents(10000))
    expect(result.excludedRetirementIncome).toBe(cents(65000))
    expect(result.stateTaxableIncome).toBe(cents(25000))
    expect(result.stateTax).toBe(cents(1347.50))
  })

  it('uses the joint schedule for married filers', () => {
    const result = registry.getStateModule('NY').compute(input({
      filingStatus: 'mfj',
      retirementIncome: cents(50000),
    }))
    expect(result.excludedRetirementIncome).toBe(cents(20000))
    expect(result.stateTaxableIncome).toBe(cents(63950))
    expect(result.stateTax).toBe(cents(3184.75))
  })

  it('never goes below zero taxable income', () => {
    const result = registry.getStateModule('CA').compute(input({ agi: cents(1000) }))
    expect(result.stateTaxableIncome).toBe(0)
    expect(result.stateTax).toBe(0)
  })
})

describe('createStateModule', () => {
  it('taxes Social Security only where the rule says so', () => {
    const table = parseStateRuleTable({
      taxYear: 2025,
      amounts: 'dollars',
      states: { ZZ: { name: 'Test', kind: 'flat', rate: 0.05, socialSecurityTaxed: true } },
    })
    const rule = table.states.ZZ
    const mod = createStateModule('ZZ', rule)
    const result = mod.compute(input({ agi: cents(20000), taxableSocialSecurity: cents(10000) }))
    expect(result.excludedSocialSecurity).toBe(0)
    expect(result.stateTax).toBe(cents(1000))
  })

  it('maps filing statuses onto the two schedules', () => {
    expect(stateScheduleKey('mfj')).toBe('mfj')
    expect(stateScheduleKey('qw')).toBe('mfj')
    expect(stateScheduleKey('hoh')).toBe('single')
    expect(stateScheduleKey('mfs')).toBe('single')
  })
})
