/**
 * MAGI History — append-only year → MAGI for one plan.
 *
 * The Medicare calculator reads it two years later. Values before the
 * first simulated year come from the scenario's prior MAGI, not from here.
 */

import type { LookbackSource, MagiLookbackFallback } from '../model/types'
import type { LookbackMagi } from '../rules/medicare'
import { StateAlreadyWrittenError, StateNotReadyError } from '../model/errors'

export const MAGI_LOOKBACK_YEARS = 2

export class MagiHistory {
  private readonly values = new Map<number, number>()

  record(year: number, magi: number): void {
    if (this.values.has(year)) {
      throw new StateAlreadyWrittenError(`MAGI for ${year} is already recorded`, year)
    }
    this.values.set(year, magi)
  }

  has(year: number): boolean {
    return this.values.has(year)
  }

  get(year: number): number {
    const magi = this.values.get(year)
    if (magi === undefined) {
      throw new StateNotReadyError(`MAGI for ${year} has not been computed`, year)
    }
    return magi
  }

  snapshot(): Record<string, number> {
    const out: Record<string, number> = {}
    for (const year of [...this.values.keys()].sort((a, b) => a - b)) {
      out[String(year)] = this.get(year)
    }
    return out
  }
}

export interface LookbackContext {
  year: number
  startYear: number
  history: MagiHistory
  priorMagi: Record<number, number>
  fallback: MagiLookbackFallback
  /** This year's MAGI, used only by the 'current-year' fallback. */
  currentMagi: number
}

/**
 * MAGI the IRMAA tier is taken from in `year`.
 *
 * Simulated years come from history (a gap is a StateNotReadyError).
 * Earlier years come from seeded prior MAGI, else the fallback policy.
 */
export function resolveLookbackMagi(ctx: LookbackContext): LookbackMagi {
  const lookbackYear = ctx.year - MAGI_LOOKBACK_YEARS

  if (lookbackYear >= ctx.startYear) {
    return { magi: ctx.history.get(lookbackYear), year: lookbackYear, source: 'history' }
  }

  const seeded = ctx.priorMagi[lookbackYear]
  if (seeded !== undefined) {
    return { magi: seeded, year: lookbackYear, source: 'seeded' }
  }

  const source: LookbackSource = ctx.fallback === 'current-year' ? 'current-year' : 'unavailable'
  return {
    magi: source === 'current-year' ? ctx.currentMagi : null,
    year: lookbackYear,
    source,
  }
}
