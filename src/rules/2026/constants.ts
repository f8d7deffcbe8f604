/**
 * 2026 Reference Constants
 *
 * Values that change from 2025. All monetary amounts are in integer cents.
 * Shapes (TaxBracket, MedicarePremiums) are shared with 2025.
 *
 * Source: IRS Revenue Procedure 2025-32
 * Source: CMS "2026 Medicare Parts A & B Premiums and Deductibles"
 */

import type { FilingStatus } from '../../model/types'
import type { MedicarePremiums, TaxBracket } from '../2025/constants'

// ── Helpers ────────────────────────────────────────────────────

/** Convert dollars to cents for readability in this file. */
function c(dollars: number): number {
  return Math.round(dollars * 100)
}

// ── Standard Deduction ─────────────────────────────────────────

export const STANDARD_DEDUCTION: Record<FilingStatus, number> = {
  single: c(16100),
  mfj:    c(32200),
  mfs:    c(16100),
  hoh:    c(24150),
  qw:     c(32200),
}

export const ADDITIONAL_STANDARD_DEDUCTION_65: Record<FilingStatus, number> = {
  single: c(2050),
  hoh:    c(2050),
  mfj:    c(1650),
  mfs:    c(1650),
  qw:     c(1650),
}

// ── Ordinary Income Tax Brackets ───────────────────────────────

export const INCOME_TAX_BRACKETS: Record<FilingStatus, TaxBracket[]> = {
  single: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(12400) },
    { rate: 0.22, floor: c(50400) },
    { rate: 0.24, floor: c(105700) },
    { rate: 0.32, floor: c(201775) },
    { rate: 0.35, floor: c(256225) },
    { rate: 0.37, floor: c(640600) },
  ],
  mfj: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(24800) },
    { rate: 0.22, floor: c(100800) },
    { rate: 0.24, floor: c(211400) },
    { rate: 0.32, floor: c(403550) },
    { rate: 0.35, floor: c(512450) },
    { rate: 0.37, floor: c(768700) },
  ],
  mfs: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(12400) },
    { rate: 0.22, floor: c(50400) },
    { rate: 0.24, floor: c(105700) },
    { rate: 0.32, floor: c(201775) },
    { rate: 0.35, floor: c(256225) },
    { rate: 0.37, floor: c(384350) },
  ],
  hoh: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(17700) },
    { rate: 0.22, floor: c(67450) },
    { rate: 0.24, floor: c(105700) },
    { rate: 0.32, floor: c(201750) },
    { rate: 0.35, floor: c(256200) },
    { rate: 0.37, floor: c(640600) },
  ],
  qw: [
    { rate: 0.10, floor: c(0) },
    { rate: 0.12, floor: c(24800) },
    { rate: 0.22, floor: c(100800) },
    { rate: 0.24, floor: c(211400) },
    { rate: 0.32, floor: c(403550) },
    { rate: 0.35, floor: c(512450) },
    { rate: 0.37, floor: c(768700) },
  ],
}

// ── Medicare Part B / Part D ───────────────────────────────────

export const MEDICARE: MedicarePremiums = {
  partBBase: c(202.90),
  partDBase: c(38.99),
  tiers: {
    single: [
      { threshold: c(109000), partB: c(81.20),  partD: c(14.50) },
      { threshold: c(137000), partB: c(202.90), partD: c(37.50) },
      { threshold: c(171000), partB: c(324.60), partD: c(60.40) },
      { threshold: c(205000), partB: c(446.30), partD: c(83.30) },
      { threshold: c(500000), partB: c(487.00), partD: c(91.00), inclusive: true },
    ],
    mfj: [
      { threshold: c(218000), partB: c(81.20),  partD: c(14.50) },
      { threshold: c(274000), partB: c(202.90), partD: c(37.50) },
      { threshold: c(342000), partB: c(324.60), partD: c(60.40) },
      { threshold: c(410000), partB: c(446.30), partD: c(83.30) },
      { threshold: c(750000), partB: c(487.00), partD: c(91.00), inclusive: true },
    ],
    mfs: [
      { threshold: c(109000), partB: c(446.30), partD: c(83.30) },
      { threshold: c(391000), partB: c(487.00), partD: c(91.00), inclusive: true },
    ],
  },
}

// ── Estate Tax ─────────────────────────────────────────────────

export const ESTATE_TAX_EXEMPTION = c(15_000_000)

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2026
