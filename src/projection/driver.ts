/**
 * Projection Driver
 *
 * The only place that knows year N depends on year N − 1. For each year,
 * in order:
 *   1. resolve the year's reference tables
 *   2. schedule every active conversion leg against last year's balances
 *   3. step every account
 *   4. write every ending balance to the ledger
 *   5. assemble the year record
 *   6. append the year's MAGI to history
 *
 * All carried state lives in the plan's ledger and MAGI history, which
 * are created per run and returned with the result.
 */

import type { ClampedInputWarning } from '../model/errors'
import type {
  Account,
  AccountId,
  AccountYearEntry,
  PlanKind,
  ResolvedConversionPlan,
  Scenario,
  YearRecord,
} from '../model/types'
import type { ReferenceData } from '../data/referenceData'
import type { ProjectionLogger } from '../utils/logger'
import type { IncomeSchedule } from './incomeSchedule'
import { bundledReferenceData } from '../data/referenceData'
import { clampedConversionWarning, ScenarioInputError } from '../model/errors'
import { syntheticAccountId } from '../model/ids'
import { validateScenario } from '../model/schemas'
import { createStateRegistry } from '../rules/stateRegistry'
import { resolveYearTables } from '../rules/yearModules'
import { logger as defaultLogger } from '../utils/logger'
import { stepBalance } from './balanceStepper'
import { amountForYear, effectiveDuration } from './conversionScheduler'
import { buildIncomeSchedule, incomeYear, ownerBirthYear } from './incomeSchedule'
import { AccountLedger } from './ledger'
import { MagiHistory } from './magiHistory'
import { assembleYearRecord } from './yearRecord'

/** Growth rate of an engine-created destination account when the plan gives none. */
export const DEFAULT_DESTINATION_GROWTH_RATE = 0.05

// ── Types ────────────────────────────────────────────────────────

export interface PreparedScenario {
  scenario: Scenario
  /** Input accounts followed by engine-created destination accounts. */
  accounts: readonly Account[]
  conversions: readonly ResolvedConversionPlan[]
  incomeSchedule: IncomeSchedule
  /** Conversion totals clamped to the source's starting balance. */
  warnings: readonly ClampedInputWarning[]
}

export interface ProjectionState {
  ledger: AccountLedger
  magiHistory: MagiHistory
}

export interface PlanResult {
  plan: PlanKind
  scenario: Scenario
  accounts: readonly Account[]
  records: YearRecord[]
  state: ProjectionState
  warnings: ClampedInputWarning[]
}

export interface ProjectionResult {
  scenario: Scenario
  accounts: readonly Account[]
  baseline: PlanResult
  conversion: PlanResult
}

export interface RunOptions {
  logger?: ProjectionLogger
  referenceData?: ReferenceData
}

// ── Preparation ──────────────────────────────────────────────────

/**
 * Resolve destinations, clamp totals and precompute the income schedule.
 * Runs once per scenario so both plans see the same accounts and ids.
 */
export function prepareScenario(scenario: Scenario): PreparedScenario {
  const issues = validateScenario(scenario)
  if (issues.length > 0) throw new ScenarioInputError(issues)

  const accounts: Account[] = scenario.accounts.map((a) => ({ ...a }))
  const conversions: ResolvedConversionPlan[] = []
  const warnings: ClampedInputWarning[] = []
  const unallocated = new Map<AccountId, number>(scenario.accounts.map((a) => [a.id, a.startingBalance]))
  let synthetic = 0

  for (const plan of scenario.conversions) {
    const source = scenario.accounts.find((a) => a.id === plan.sourceAccountId)
    if (!source) {
      throw new ScenarioInputError([{ path: 'conversions', message: `Unknown account "${plan.sourceAccountId}"` }])
    }

    let destinationAccountId = plan.destinationAccountId
    if (destinationAccountId === undefined) {
      synthetic++
      destinationAccountId = syntheticAccountId(synthetic)
      accounts.push({
        id: destinationAccountId,
        name: `Converted from ${source.name}`,
        type: 'roth_ira',
        owner: source.owner,
        startingBalance: 0,
        growthRate: plan.destinationGrowthRate ?? DEFAULT_DESTINATION_GROWTH_RATE,
        synthetic: true,
      })
    }

    const available = unallocated.get(source.id) ?? 0
    const totalAmount = Math.min(plan.totalAmount, available)
    if (totalAmount < plan.totalAmount) {
      warnings.push(clampedConversionWarning('conversion', plan.startYear, source.id, plan.totalAmount, totalAmount))
    }
    unallocated.set(source.id, available - totalAmount)

    conversions.push({
      sourceAccountId: source.id,
      destinationAccountId,
      totalAmount,
      startYear: plan.startYear,
      durationYears: effectiveDuration(plan),
    })
  }

  return {
    scenario,
    accounts,
    conversions,
    incomeSchedule: buildIncomeSchedule(scenario),
    warnings,
  }
}

// ── Per-year conversion pass ─────────────────────────────────────

interface ConversionFlows {
  out: Map<AccountId, number>
  in: Map<AccountId, number>
  warnings: ClampedInputWarning[]
}

function scheduleConversions(
  legs: readonly ResolvedConversionPlan[],
  year: number,
  plan: PlanKind,
  ledger: AccountLedger,
): ConversionFlows {
  const flows: ConversionFlows = { out: new Map(), in: new Map(), warnings: [] }
  // Legs on the same source draw down one shared balance, in input order
  const remaining = new Map<AccountId, number>()

  for (const leg of legs) {
    const available = remaining.get(leg.sourceAccountId) ?? ledger.getBalance(leg.sourceAccountId, year - 1)
    const scheduled = amountForYear(leg, available, year - leg.startYear)

    if (scheduled.clamped) {
      flows.warnings.push(
        clampedConversionWarning(plan, year, leg.sourceAccountId, scheduled.requested, scheduled.amount),
      )
    }
    if (scheduled.amount === 0) continue

    remaining.set(leg.sourceAccountId, available - scheduled.amount)
    flows.out.set(leg.sourceAccountId, (flows.out.get(leg.sourceAccountId) ?? 0) + scheduled.amount)
    flows.in.set(leg.destinationAccountId, (flows.in.get(leg.destinationAccountId) ?? 0) + scheduled.amount)
  }

  return flows
}

// ── Plan run ─────────────────────────────────────────────────────

export function runPlan(prepared: PreparedScenario, kind: PlanKind, options: RunOptions = {}): PlanResult {
  const { scenario, accounts } = prepared
  const log = (options.logger ?? defaultLogger).child({ plan: kind })
  const data = options.referenceData ?? bundledReferenceData()
  const stateRules = createStateRegistry(data.stateRules).getStateModule(scenario.state)

  const ledger = new AccountLedger(scenario.startYear - 1, accounts)
  const magiHistory = new MagiHistory()
  const legs = kind === 'conversion' ? prepared.conversions : []
  const warnings: ClampedInputWarning[] = kind === 'conversion' ? [...prepared.warnings] : []
  const records: YearRecord[] = []

  for (const w of warnings) log.warn(w.message, { code: w.code, year: w.year, accountId: w.accountId })

  log.info('Projection started', {
    startYear: scenario.startYear,
    endYear: scenario.endYear,
    accounts: accounts.length,
    conversions: legs.length,
  })

  for (let year = scenario.startYear; year <= scenario.endYear; year++) {
    const tables = resolveYearTables(year, scenario.tablePolicy, scenario.indexing)

    const flows = scheduleConversions(legs, year, kind, ledger)
    for (const w of flows.warnings) {
      warnings.push(w)
      log.warn(w.message, { code: w.code, year: w.year, accountId: w.accountId })
    }

    const steps = new Map<AccountId, AccountYearEntry>()
    for (const account of accounts) {
      const birthYear = ownerBirthYear(scenario, account.owner)
      if (birthYear === undefined) {
        throw new ScenarioInputError([{ path: 'spouseBirthYear', message: `Account ${account.id} is spouse-owned but no spouse birth year is set` }])
      }
      steps.set(account.id, stepBalance({
        account,
        year,
        priorBalance: ledger.getBalance(account.id, year - 1),
        conversionOut: flows.out.get(account.id) ?? 0,
        conversionIn: flows.in.get(account.id) ?? 0,
        ownerAge: year - birthYear,
        ownerBirthYear: birthYear,
        rmdTable: data.rmdTable,
      }))
    }

    for (const [id, step] of steps) {
      ledger.setBalance(id, year, step.endingBalance)
    }

    const record = assembleYearRecord({
      plan: kind,
      year,
      scenario,
      steps,
      ledger,
      income: incomeYear(prepared.incomeSchedule, year),
      history: magiHistory,
      tables,
      stateRules,
    })
    magiHistory.record(year, record.magi)
    records.push(record)

    log.debug('Year computed', {
      year,
      tablesFrom: tables.sourceYear,
      magi: record.magi,
      conversion: record.conversionAmount,
      federalTax: record.federalTax,
      irmaaBracket: record.medicare.irmaaBracket,
    })
  }

  log.info('Projection finished', {
    years: records.length,
    warnings: warnings.length,
  })

  return {
    plan: kind,
    scenario,
    accounts,
    records,
    state: { ledger, magiHistory },
    warnings,
  }
}

/**
 * Run baseline and conversion plans for one scenario. The plans share
 * the prepared accounts and income schedule and nothing mutable.
 */
export function runProjection(scenario: Scenario, options: RunOptions = {}): ProjectionResult {
  const prepared = prepareScenario(scenario)
  return {
    scenario,
    accounts: prepared.accounts,
    baseline: runPlan(prepared, 'baseline', options),
    conversion: runPlan(prepared, 'conversion', options),
  }
}
