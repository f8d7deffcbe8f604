/**
 * Conversion Scheduler
 *
 * Spreads a conversion total evenly over its duration. Installments are
 * whole cents and sum exactly to the total; the rounding remainder lands
 * on the later years. Each year's amount is capped at what the source
 * account holds.
 */

import type { ConversionPlan, ResolvedConversionPlan } from '../model/types'

export interface ScheduledConversion {
  /** Installment the plan calls for this year. */
  requested: number
  /** Amount actually moved: the installment capped at the balance. */
  amount: number
  clamped: boolean
}

const NONE: ScheduledConversion = { requested: 0, amount: 0, clamped: false }

/** Installment for a year index, before any clamp. */
export function scheduledInstallment(
  plan: Pick<ResolvedConversionPlan, 'totalAmount' | 'durationYears'>,
  yearIndex: number,
): number {
  if (!Number.isInteger(yearIndex) || yearIndex < 0 || yearIndex >= plan.durationYears) return 0
  const d = plan.durationYears
  return Math.round((plan.totalAmount * (yearIndex + 1)) / d) - Math.round((plan.totalAmount * yearIndex) / d)
}

/**
 * Amount to convert in the plan's `yearIndex`-th year (0 = first
 * conversion year). Zero outside `[0, durationYears)`.
 */
export function amountForYear(
  plan: Pick<ResolvedConversionPlan, 'totalAmount' | 'durationYears'>,
  accountBalance: number,
  yearIndex: number,
): ScheduledConversion {
  const requested = scheduledInstallment(plan, yearIndex)
  if (requested === 0) return NONE

  const available = Math.max(0, accountBalance)
  const amount = Math.min(requested, available)
  return { requested, amount, clamped: amount < requested }
}

/**
 * Duration after applying the optional annual cap: a cap smaller than the
 * even installment lengthens the schedule to `ceil(total / cap)` years.
 */
export function effectiveDuration(plan: Pick<ConversionPlan, 'totalAmount' | 'durationYears' | 'maxAnnualAmount'>): number {
  const cap = plan.maxAnnualAmount
  if (cap === undefined || cap <= 0 || plan.totalAmount === 0) return plan.durationYears
  return Math.max(plan.durationYears, Math.ceil(plan.totalAmount / cap))
}
