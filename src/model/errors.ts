/**
 * Error taxonomy for the projection engine.
 *
 * Everything the engine throws extends ProjectionError. Warnings are plain
 * data collected on the projection result; they never abort a run.
 */

import type { AccountId, PlanKind } from './types'

// ── Errors ─────────────────────────────────────────────────────

export class ProjectionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** A reference-table entry (year, filing status, age, state) is missing. */
export class ConfigurationError extends ProjectionError {}

/** A balance or MAGI lookup was attempted for a year that has not been computed. */
export class StateNotReadyError extends ProjectionError {
  constructor(
    message: string,
    readonly year: number,
  ) {
    super(message)
  }
}

/** A ledger or MAGI history slot was written a second time. */
export class StateAlreadyWrittenError extends ProjectionError {
  constructor(
    message: string,
    readonly year: number,
  ) {
    super(message)
  }
}

export interface InputIssue {
  path: string
  message: string
}

/** Scenario input failed schema or cross-field validation. */
export class ScenarioInputError extends ProjectionError {
  constructor(readonly issues: InputIssue[]) {
    super(
      `Invalid scenario: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
    )
  }
}

// ── Warnings ───────────────────────────────────────────────────

export interface ClampedInputWarning {
  code: 'CONVERSION_CLAMPED'
  plan: PlanKind
  year: number
  accountId: AccountId
  requested: number   // cents
  applied: number     // cents
  message: string
}

export function clampedConversionWarning(
  plan: PlanKind,
  year: number,
  accountId: AccountId,
  requested: number,
  applied: number,
): ClampedInputWarning {
  return {
    code: 'CONVERSION_CLAMPED',
    plan,
    year,
    accountId,
    requested,
    applied,
    message: `Conversion from ${accountId} in ${year} clamped from ${requested} to ${applied} cents`,
  }
}
