/**
 * Zod runtime validation schemas — mirrors the Scenario types in types.ts.
 *
 * Scenario input arrives from an outside collaborator (an API layer, a
 * stored scenario) and is validated here before the engine sees it.
 * Schema defaults fill the optional policy fields.
 *
 * Conventions:
 *  - Monetary amounts are in integer cents (non-negative).
 *  - Rates are decimals.
 *  - State codes are 2-letter uppercase.
 *  - Account ids may not use the reserved synthetic prefix.
 */

import { z } from 'zod'
import type { InputIssue } from './errors'
import type { Scenario } from './types'
import { ScenarioInputError } from './errors'
import { isAccountId, isIncomeSourceId, SYNTHETIC_PREFIX } from './ids'
import { ACCOUNT_CATEGORY } from './types'

// ── Reusable validators ──────────────────────────────────────────

/** 2-letter uppercase state code. */
const stateCodeSchema = z.string().regex(/^[A-Z]{2}$/, 'State must be a 2-letter uppercase code')

/** Non-negative integer (cents). */
const centsNonNeg = z.number().int().min(0, 'Amount must be non-negative')

/** Positive integer (cents). */
const centsPositive = z.number().int().positive('Amount must be positive')

const yearSchema = z.number().int().min(1900).max(2200)

/** Annual rate; negative growth is allowed, below −100% is not. */
const rateSchema = z.number().min(-1).max(1)

const accountIdSchema = z.string().refine(isAccountId, {
  message: `Account id must be non-empty and must not start with "${SYNTHETIC_PREFIX}"`,
})

const incomeSourceIdSchema = z.string().refine(isIncomeSourceId, {
  message: 'Income source id must be non-empty',
})

// ── Enums ────────────────────────────────────────────────────────

const filingStatusSchema = z.enum(['single', 'mfj', 'mfs', 'hoh', 'qw'])

const ownerSchema = z.enum(['primary', 'spouse'])

const accountTypeSchema = z.enum([
  'traditional_ira', '401k', '403b', '457b', 'sep_ira', 'simple_ira',
  'roth_ira', 'roth_401k', 'brokerage', 'cash',
])

const incomeSourceKindSchema = z.enum(['social_security', 'pension', 'wages', 'annuity', 'other'])

// ── Accounts ─────────────────────────────────────────────────────

const plannedWithdrawalSchema = z.object({
  annualAmount: centsNonNeg,
  startYear: yearSchema,
  endYear: yearSchema.optional(),
})

export const accountSchema = z.object({
  id: accountIdSchema,
  name: z.string().min(1),
  type: accountTypeSchema,
  owner: ownerSchema.default('primary'),
  startingBalance: centsNonNeg,
  growthRate: rateSchema,
  withdrawal: plannedWithdrawalSchema.optional(),
})

// ── Income sources ───────────────────────────────────────────────

export const incomeSourceSchema = z.object({
  id: incomeSourceIdSchema,
  name: z.string().min(1),
  kind: incomeSourceKindSchema,
  owner: ownerSchema.default('primary'),
  annualAmount: centsNonNeg,
  startAge: z.number().int().min(0).max(120),
  endAge: z.number().int().min(0).max(120).optional(),
  cola: rateSchema.default(0),
})

// ── Conversions ──────────────────────────────────────────────────

export const conversionPlanSchema = z.object({
  sourceAccountId: accountIdSchema,
  destinationAccountId: accountIdSchema.optional(),
  totalAmount: centsNonNeg,
  startYear: yearSchema,
  durationYears: z.number().int().min(1).max(100),
  maxAnnualAmount: centsPositive.optional(),
  destinationGrowthRate: rateSchema.optional(),
})

// ── Scenario ─────────────────────────────────────────────────────

export const scenarioSchema = z.object({
  filingStatus: filingStatusSchema,
  state: stateCodeSchema,
  primaryBirthYear: yearSchema,
  spouseBirthYear: yearSchema.optional(),
  startYear: yearSchema,
  endYear: yearSchema,
  retirementYear: yearSchema,
  accounts: z.array(accountSchema),
  incomeSources: z.array(incomeSourceSchema).default([]),
  conversions: z.array(conversionPlanSchema).default([]),
  priorMagi: z.record(z.string().regex(/^\d{4}$/, 'Year keys must be 4-digit years'), centsNonNeg).default({}),
  magiLookbackFallback: z.enum(['no-surcharge', 'current-year']).default('no-surcharge'),
  tablePolicy: z.enum(['carry-forward', 'strict']).default('carry-forward'),
  indexing: z.object({
    taxBrackets: rateSchema.default(0),
    irmaaThresholds: rateSchema.default(0.01),
    medicarePremiums: rateSchema.default(0.05),
  }).default({}),
})

export type ScenarioInput = z.input<typeof scenarioSchema>

// ── Cross-field validation ───────────────────────────────────────

/**
 * Rules a single field schema cannot express. Returns every issue found,
 * not just the first.
 */
export function validateScenario(s: Scenario): InputIssue[] {
  const issues: InputIssue[] = []
  const add = (path: string, message: string) => issues.push({ path, message })

  if (s.endYear < s.startYear) {
    add('endYear', `End year ${s.endYear} is before start year ${s.startYear}`)
  }

  const accountsById = new Map<string, Scenario['accounts'][number]>()
  s.accounts.forEach((account, i) => {
    if (accountsById.has(account.id)) add(`accounts.${i}.id`, `Duplicate account id "${account.id}"`)
    accountsById.set(account.id, account)
    if (account.owner === 'spouse' && s.spouseBirthYear === undefined) {
      add(`accounts.${i}.owner`, 'Spouse-owned account requires spouseBirthYear')
    }
    const w = account.withdrawal
    if (w?.endYear !== undefined && w.endYear < w.startYear) {
      add(`accounts.${i}.withdrawal.endYear`, 'Withdrawal end year is before its start year')
    }
  })

  const incomeIds = new Set<string>()
  s.incomeSources.forEach((source, i) => {
    if (incomeIds.has(source.id)) add(`incomeSources.${i}.id`, `Duplicate income source id "${source.id}"`)
    incomeIds.add(source.id)
    if (source.owner === 'spouse' && s.spouseBirthYear === undefined) {
      add(`incomeSources.${i}.owner`, 'Spouse income requires spouseBirthYear')
    }
    if (source.endAge !== undefined && source.endAge < source.startAge) {
      add(`incomeSources.${i}.endAge`, 'End age is before start age')
    }
  })

  s.conversions.forEach((plan, i) => {
    const source = accountsById.get(plan.sourceAccountId)
    if (!source) {
      add(`conversions.${i}.sourceAccountId`, `Unknown account "${plan.sourceAccountId}"`)
    } else if (ACCOUNT_CATEGORY[source.type] !== 'pre-tax') {
      add(`conversions.${i}.sourceAccountId`, `Account "${plan.sourceAccountId}" is not a pre-tax account`)
    }
    if (plan.destinationAccountId !== undefined) {
      const destination = accountsById.get(plan.destinationAccountId)
      if (!destination) {
        add(`conversions.${i}.destinationAccountId`, `Unknown account "${plan.destinationAccountId}"`)
      } else if (ACCOUNT_CATEGORY[destination.type] !== 'tax-free') {
        add(`conversions.${i}.destinationAccountId`, `Account "${plan.destinationAccountId}" is not a tax-free account`)
      }
    }
    if (plan.startYear < s.startYear || plan.startYear > s.endYear) {
      add(`conversions.${i}.startYear`, `Conversion start ${plan.startYear} is outside ${s.startYear}–${s.endYear}`)
    }
  })

  for (const key of Object.keys(s.priorMagi)) {
    if (Number(key) >= s.startYear) {
      add(`priorMagi.${key}`, 'Prior MAGI must be for a year before the start year')
    }
  }

  return issues
}

// ── Entry point ──────────────────────────────────────────────────

/** Validate raw scenario input. Throws ScenarioInputError listing every problem. */
export function parseScenario(input: unknown): Scenario {
  const parsed = scenarioSchema.safeParse(input)
  if (!parsed.success) {
    throw new ScenarioInputError(
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    )
  }
  const scenario: Scenario = parsed.data
  const issues = validateScenario(scenario)
  if (issues.length > 0) throw new ScenarioInputError(issues)
  return scenario
}
