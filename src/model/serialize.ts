/**
 * Map → Record conversion for projection output.
 *
 * Records keep per-account and per-source values in Maps; JSON needs plain
 * objects. Keys come out sorted so identical projections serialize to
 * identical strings.
 */

import type { ClampedInputWarning } from './errors'
import type { AccountYearEntry, PlanKind, YearRecord } from './types'
import type { LedgerSnapshot } from '../projection/ledger'
import type { PlanResult, ProjectionResult } from '../projection/driver'

export type SerializedYearRecord = Omit<YearRecord, 'accounts' | 'incomeBySource'> & {
  accounts: Record<string, AccountYearEntry>
  incomeBySource: Record<string, number>
}

export interface SerializedPlanResult {
  plan: PlanKind
  records: SerializedYearRecord[]
  warnings: ClampedInputWarning[]
  state: {
    ledger: LedgerSnapshot
    magiHistory: Record<string, number>
  }
}

export interface SerializedProjection {
  accounts: { id: string; name: string; type: string; synthetic: boolean }[]
  baseline: SerializedPlanResult
  conversion: SerializedPlanResult
}

export function mapToRecord<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  const out: Record<string, V> = {}
  for (const key of [...map.keys()].sort()) {
    const value = map.get(key)
    if (value !== undefined) out[key] = value
  }
  return out
}

export function serializeYearRecord(record: YearRecord): SerializedYearRecord {
  return {
    ...record,
    accounts: mapToRecord(record.accounts),
    incomeBySource: mapToRecord(record.incomeBySource),
    medicare: { ...record.medicare },
  }
}

export function serializePlanResult(result: PlanResult): SerializedPlanResult {
  return {
    plan: result.plan,
    records: result.records.map(serializeYearRecord),
    warnings: result.warnings.map((w) => ({ ...w })),
    state: {
      ledger: result.state.ledger.snapshot(),
      magiHistory: result.state.magiHistory.snapshot(),
    },
  }
}

export function serializeProjection(result: ProjectionResult): SerializedProjection {
  return {
    accounts: result.accounts.map((a) => ({
      id: a.id,
      name: a.name,
      type: a.type,
      synthetic: a.synthetic ?? false,
    })),
    baseline: serializePlanResult(result.baseline),
    conversion: serializePlanResult(result.conversion),
  }
}
