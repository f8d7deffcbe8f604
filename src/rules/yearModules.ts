/**
 * Multi-Year Reference Tables Registry
 *
 * Maps tax year → YearRulesModule so the projection can resolve the
 * correct brackets, deductions and Medicare schedule for every simulated
 * year.
 *
 * Adding a new tax year:
 * 1. Create src/rules/<year>/constants.ts — year-specific thresholds/brackets
 * 2. Create src/rules/<year>/yearModule.ts — start from the previous year, override deltas
 * 3. Import & register the module in this file
 *
 * Years past the latest registered module are either carried forward
 * (indexed at the scenario's assumed rates) or rejected, per TablePolicy.
 */

import type { FilingStatus, IndexingAssumptions, TablePolicy } from '../model/types'
import type { IrmaaScheduleKey, IrmaaTier, MedicarePremiums, TaxBracket } from './2025/constants'
import { ConfigurationError } from '../model/errors'
import { compound } from '../model/money'

// ── Interface ────────────────────────────────────────────────────

export interface EstateTaxRules {
  exemption: number   // cents
  rate: number
}

export interface YearRulesModule {
  taxYear: number

  /** Ordinary income tax brackets by filing status. */
  incomeTaxBrackets: Record<FilingStatus, TaxBracket[]>

  /** Standard deduction by filing status (cents). */
  standardDeduction: Record<FilingStatus, number>

  /** Additional standard deduction per person age 65+ (cents). */
  additionalStandardDeduction65: Record<FilingStatus, number>

  /** Monthly Part B / Part D premiums and IRMAA tiers. */
  medicare: MedicarePremiums

  estateTax: EstateTaxRules
}

/** The tables a simulated year actually uses. */
export interface YearTables extends YearRulesModule {
  /** Registered year the tables were derived from (equals taxYear when published). */
  sourceYear: number
}

// ── Registry ─────────────────────────────────────────────────────

import { yearModule2025 } from './2025/yearModule'
import { yearModule2026 } from './2026/yearModule'

const YEAR_MODULES: Map<number, YearRulesModule> = new Map([
  [2025, yearModule2025],
  [2026, yearModule2026],
])

/**
 * Resolve the rules module for a given tax year.
 * Throws if the year is not registered.
 */
export function getYearModule(year: number): YearRulesModule {
  const mod = YEAR_MODULES.get(year)
  if (!mod) {
    const supported = getSupportedTaxYears().join(', ')
    throw new ConfigurationError(
      `No rules module registered for tax year ${year}. Supported years: ${supported}`,
    )
  }
  return mod
}

/** List all tax years with registered rules modules. */
export function getSupportedTaxYears(): number[] {
  return [...YEAR_MODULES.keys()].sort((a, b) => a - b)
}

// ── Carry-forward ────────────────────────────────────────────────

export const DEFAULT_INDEXING: IndexingAssumptions = {
  taxBrackets: 0,
  irmaaThresholds: 0.01,
  medicarePremiums: 0.05,
}

function mapStatuses<T, U>(table: Record<FilingStatus, T>, fn: (value: T) => U): Record<FilingStatus, U> {
  return {
    single: fn(table.single),
    mfj: fn(table.mfj),
    mfs: fn(table.mfs),
    hoh: fn(table.hoh),
    qw: fn(table.qw),
  }
}

function indexTiers(
  tiers: Record<IrmaaScheduleKey, IrmaaTier[]>,
  thresholdRate: number,
  premiumRate: number,
  periods: number,
): Record<IrmaaScheduleKey, IrmaaTier[]> {
  const indexOne = (list: IrmaaTier[]): IrmaaTier[] =>
    list.map((tier) => ({
      ...tier,
      threshold: compound(tier.threshold, thresholdRate, periods),
      partB: compound(tier.partB, premiumRate, periods),
      partD: compound(tier.partD, premiumRate, periods),
    }))
  return { single: indexOne(tiers.single), mfj: indexOne(tiers.mfj), mfs: indexOne(tiers.mfs) }
}

/**
 * Project a registered module forward to `taxYear`.
 * Every indexed amount is rounded to the cent; rates are unchanged.
 */
export function indexYearModule(
  mod: YearRulesModule,
  taxYear: number,
  indexing: IndexingAssumptions,
): YearTables {
  const periods = taxYear - mod.taxYear
  const bracketRate = indexing.taxBrackets
  return {
    taxYear,
    sourceYear: mod.taxYear,
    incomeTaxBrackets: mapStatuses(mod.incomeTaxBrackets, (brackets) =>
      brackets.map((b) => ({ rate: b.rate, floor: compound(b.floor, bracketRate, periods) })),
    ),
    standardDeduction: mapStatuses(mod.standardDeduction, (v) => compound(v, bracketRate, periods)),
    additionalStandardDeduction65: mapStatuses(mod.additionalStandardDeduction65, (v) =>
      compound(v, bracketRate, periods),
    ),
    medicare: {
      partBBase: compound(mod.medicare.partBBase, indexing.medicarePremiums, periods),
      partDBase: compound(mod.medicare.partDBase, indexing.medicarePremiums, periods),
      tiers: indexTiers(mod.medicare.tiers, indexing.irmaaThresholds, indexing.medicarePremiums, periods),
    },
    estateTax: { ...mod.estateTax },
  }
}

/**
 * Resolve the tables for one simulated year.
 *
 * Registered years return their own module. Later years carry the latest
 * module forward under 'carry-forward' and raise under 'strict'. Years
 * before the earliest registered module always raise.
 */
export function resolveYearTables(
  year: number,
  policy: TablePolicy,
  indexing: IndexingAssumptions = DEFAULT_INDEXING,
): YearTables {
  const registered = YEAR_MODULES.get(year)
  if (registered) return { ...registered, sourceYear: registered.taxYear }

  const years = getSupportedTaxYears()
  const earliest = years[0]
  const latest = years[years.length - 1]

  if (policy === 'strict' || earliest === undefined || latest === undefined || year < earliest) {
    return { ...getYearModule(year), sourceYear: year }
  }

  return indexYearModule(getYearModule(latest), year, indexing)
}
