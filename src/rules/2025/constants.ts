/**
 * 2025 Reference Constants
 *
 * Single source of truth for the 2025 federal tax, Medicare and estate
 * numbers used by the projection. All monetary amounts are in integer cents.
 *
 * Primary source: IRS Revenue Procedure 2024-40
 * https://www.irs.gov/pub/irs-drop/rp-24-40.pdf
 *
 * Medicare source: CMS "2025 Medicare Parts A & B Premiums and Deductibles"
 * and the 2025 Part D income-related monthly adjustment amounts.
 */

import type { FilingStatus } from '../../model/types'

// ── Helpers ────────────────────────────────────────────────────

/** Convert dollars to cents for readability in this file. */
function c(dollars: number): number {
  return Math.round(dollars * 100)
}

// ── Standard Deduction ─────────────────────────────────────────
// Source: Rev. Proc. 2024-40, §3.14

export const STANDARD_DEDUCTION: Record<FilingStatus, number> = {
  single: c(15000),
  mfj:    c(30000),
  mfs:    c(15000),
  hoh:    c(22500),
  qw:     c(30000),
}

/** Additional standard deduction per person age 65 or older — IRC §63(f). */
export const ADDITIONAL_STANDARD_DEDUCTION_65: Record<FilingStatus, number> = {
  single: c(2000),
  hoh:    c(2000),
  mfj:    c(1600),
  mfs:    c(1600),
  qw:     c(1600),
}

// ── Ordinary Income Tax Brackets ───────────────────────────────
// Source: IRS.gov "Federal income tax rates and brackets" (2025)
//
// Each bracket is { rate, floor (cents) }.
// The ceiling of each bracket is the floor of the next bracket.

export interface TaxBracket {
  rate: number   // decimal, e.g., 0.10 for 10%
  floor: number  // cents — income above this amount is taxed at this rate
}

export const INCOME_TAX_BRACKETS: Record<FilingStatus, TaxBracket[]> = {
  single: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(11925) },
    { rate: 0.22, floor: c(48475) },
    { rate: 0.24, floor: c(103350) },
    { rate: 0.32, floor: c(197300) },
    { rate: 0.35, floor: c(250525) },
    { rate: 0.37, floor: c(626350) },
  ],
  mfj: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(23850) },
    { rate: 0.22, floor: c(96950) },
    { rate: 0.24, floor: c(206700) },
    { rate: 0.32, floor: c(394600) },
    { rate: 0.35, floor: c(501050) },
    { rate: 0.37, floor: c(751600) },
  ],
  mfs: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(11925) },
    { rate: 0.22, floor: c(48475) },
    { rate: 0.24, floor: c(103350) },
    { rate: 0.32, floor: c(197300) },
    { rate: 0.35, floor: c(250525) },
    { rate: 0.37, floor: c(375800) },
  ],
  hoh: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(17000) },
    { rate: 0.22, floor: c(64850) },
    { rate: 0.24, floor: c(103350) },
    { rate: 0.32, floor: c(197300) },
    { rate: 0.35, floor: c(250500) },
    { rate: 0.37, floor: c(626350) },
  ],
  qw: [
    // Qualifying surviving spouse uses MFJ brackets
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(23850) },
    { rate: 0.22, floor: c(96950) },
    { rate: 0.24, floor: c(206700) },
    { rate: 0.32, floor: c(394600) },
    { rate: 0.35, floor: c(501050) },
    { rate: 0.37, floor: c(751600) },
  ],
}

// ── Medicare Part B / Part D ───────────────────────────────────
//
// Premiums and surcharges are monthly, per enrollee.
// A tier applies when MAGI is greater than its threshold; the top tier of
// each schedule starts at its threshold ("$500,000 or more").

/** IRMAA schedules: HOH and QW filers use the single schedule. */
export type IrmaaScheduleKey = 'single' | 'mfj' | 'mfs'

export interface IrmaaTier {
  threshold: number   // cents
  partB: number       // monthly surcharge, cents
  partD: number       // monthly surcharge, cents
  /** MAGI equal to the threshold already falls in this tier. */
  inclusive?: boolean
}

export interface MedicarePremiums {
  partBBase: number   // monthly, cents
  partDBase: number   // monthly, cents (national base beneficiary premium)
  tiers: Record<IrmaaScheduleKey, IrmaaTier[]>
}

export const MEDICARE: MedicarePremiums = {
  partBBase: c(185.00),
  partDBase: c(36.78),
  tiers: {
    single: [
      { threshold: c(106000), partB: c(74.00),  partD: c(13.70) },
      { threshold: c(133000), partB: c(185.00), partD: c(35.30) },
      { threshold: c(167000), partB: c(295.90), partD: c(57.00) },
      { threshold: c(200000), partB: c(406.90), partD: c(78.60) },
      { threshold: c(500000), partB: c(443.90), partD: c(85.80), inclusive: true },
    ],
    mfj: [
      { threshold: c(212000), partB: c(74.00),  partD: c(13.70) },
      { threshold: c(266000), partB: c(185.00), partD: c(35.30) },
      { threshold: c(334000), partB: c(295.90), partD: c(57.00) },
      { threshold: c(400000), partB: c(406.90), partD: c(78.60) },
      { threshold: c(750000), partB: c(443.90), partD: c(85.80), inclusive: true },
    ],
    mfs: [
      { threshold: c(106000), partB: c(406.90), partD: c(78.60) },
      { threshold: c(394000), partB: c(443.90), partD: c(85.80), inclusive: true },
    ],
  },
}

// ── Estate Tax ─────────────────────────────────────────────────
// Source: Rev. Proc. 2024-40, §3.41

export const ESTATE_TAX_EXEMPTION = c(13_990_000)
export const ESTATE_TAX_RATE = 0.40

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2025
