/**
 * Lifetime metrics for a plan and the baseline-vs-conversion comparison.
 */

import type { AccountId, YearRecord } from '../model/types'
import type { PlanResult } from './driver'
import { applyRate, sumCents } from '../model/money'
import { ACCOUNT_CATEGORY } from '../model/types'
import { resolveYearTables } from '../rules/yearModules'

// ── Plan summary ─────────────────────────────────────────────────

export interface ProjectionMetrics {
  plan: PlanResult['plan']
  years: number
  totalFederalTax: number
  totalStateTax: number
  totalConversionTax: number
  totalMedicare: number
  totalIrmaa: number
  totalRmd: number
  totalConverted: number
  totalNetIncome: number
  finalBalances: ReadonlyMap<AccountId, number>
  finalPreTaxBalance: number
  finalTaxFreeBalance: number
  finalTaxableBalance: number
  finalTotalBalance: number
  /** Pre-tax and taxable balances; tax-free balances stay outside the taxed estate. */
  taxableEstate: number
  /** Federal estate tax on the taxable estate above the final year's exemption. */
  estateTax: number
  /** Final total balance less estate tax. */
  netToHeirs: number
  /** Federal tax + state tax + Medicare + estate tax. */
  totalExpenses: number
}

const sumOf = (records: YearRecord[], pick: (r: YearRecord) => number): number => sumCents(records.map(pick))

export function summarizeProjection(result: PlanResult): ProjectionMetrics {
  const { records, scenario } = result
  const last = records[records.length - 1]

  const finalBalances = new Map<AccountId, number>()
  const byCategory = { 'pre-tax': 0, 'tax-free': 0, taxable: 0 }
  for (const account of result.accounts) {
    const balance = last?.accounts.get(account.id)?.endingBalance ?? account.startingBalance
    finalBalances.set(account.id, balance)
    byCategory[ACCOUNT_CATEGORY[account.type]] += balance
  }
  const finalTotalBalance = byCategory['pre-tax'] + byCategory['tax-free'] + byCategory.taxable
  const taxableEstate = byCategory['pre-tax'] + byCategory.taxable

  let estateTax = 0
  if (last) {
    const { exemption, rate } = resolveYearTables(last.year, scenario.tablePolicy, scenario.indexing).estateTax
    estateTax = applyRate(Math.max(0, taxableEstate - exemption), rate)
  }

  const totalFederalTax = sumOf(records, (r) => r.federalTax)
  const totalStateTax = sumOf(records, (r) => r.stateTax)
  const totalMedicare = sumOf(records, (r) => r.medicare.total)

  return {
    plan: result.plan,
    years: records.length,
    totalFederalTax,
    totalStateTax,
    totalConversionTax: sumOf(records, (r) => r.conversionTax),
    totalMedicare,
    totalIrmaa: sumOf(records, (r) => r.medicare.irmaaSurcharge),
    totalRmd: sumOf(records, (r) => sumCents([...r.accounts.values()].map((a) => a.rmd))),
    totalConverted: sumOf(records, (r) => r.conversionAmount),
    totalNetIncome: sumOf(records, (r) => r.netIncome),
    finalBalances,
    finalPreTaxBalance: byCategory['pre-tax'],
    finalTaxFreeBalance: byCategory['tax-free'],
    finalTaxableBalance: byCategory.taxable,
    finalTotalBalance,
    taxableEstate,
    estateTax,
    netToHeirs: finalTotalBalance - estateTax,
    totalExpenses: totalFederalTax + totalStateTax + totalMedicare + estateTax,
  }
}

// ── Conversion cost ──────────────────────────────────────────────

export interface ConversionYear {
  year: number
  conversionAmount: number
  conversionTax: number
  marginalRate: number
  irmaaBracket: number
}

export interface ConversionCost {
  totalConverted: number
  totalConversionTax: number
  /** Conversion tax per converted dollar; 0 when nothing was converted. */
  effectiveConversionTaxRate: number
  years: ConversionYear[]
}

export function summarizeConversionCost(result: PlanResult): ConversionCost {
  const years = result.records
    .filter((r) => r.conversionAmount > 0)
    .map((r) => ({
      year: r.year,
      conversionAmount: r.conversionAmount,
      conversionTax: r.conversionTax,
      marginalRate: r.marginalRate,
      irmaaBracket: r.medicare.irmaaBracket,
    }))
  const totalConverted = sumCents(years.map((y) => y.conversionAmount))
  const totalConversionTax = sumCents(years.map((y) => y.conversionTax))
  return {
    totalConverted,
    totalConversionTax,
    effectiveConversionTaxRate: totalConverted > 0 ? totalConversionTax / totalConverted : 0,
    years,
  }
}

// ── Comparison ───────────────────────────────────────────────────

export const COMPARED_METRICS = [
  'totalFederalTax',
  'totalStateTax',
  'totalConversionTax',
  'totalMedicare',
  'totalIrmaa',
  'totalRmd',
  'totalNetIncome',
  'finalPreTaxBalance',
  'finalTaxFreeBalance',
  'finalTotalBalance',
  'estateTax',
  'netToHeirs',
  'totalExpenses',
] as const

export type ComparedMetric = (typeof COMPARED_METRICS)[number]

export interface MetricComparison {
  metric: ComparedMetric
  baseline: number
  conversion: number
  /** conversion − baseline */
  difference: number
  /** difference as a percentage of baseline; 0 when baseline is 0 */
  percentChange: number
}

export interface ProjectionComparison {
  baseline: ProjectionMetrics
  conversion: ProjectionMetrics
  metrics: MetricComparison[]
}

export function compareProjections(baseline: PlanResult, conversion: PlanResult): ProjectionComparison {
  const b = summarizeProjection(baseline)
  const c = summarizeProjection(conversion)
  return {
    baseline: b,
    conversion: c,
    metrics: COMPARED_METRICS.map((metric) => {
      const difference = c[metric] - b[metric]
      return {
        metric,
        baseline: b[metric],
        conversion: c[metric],
        difference,
        percentChange: b[metric] === 0 ? 0 : (difference / b[metric]) * 100,
      }
    }),
  }
}
