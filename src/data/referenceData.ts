/**
 * Reference data loaded from JSON — the RMD divisor table and the
 * state rule table. Both are validated with zod on load and frozen.
 *
 * Amounts in the JSON files are dollars; they become cents when the
 * state registry is built.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigurationError } from '../model/errors'

export const RMD_TABLE_FILE = 'uniformLifetimeTable.json'
export const STATE_RULES_FILE = 'stateTaxRules.2025.json'

// ── Schemas ──────────────────────────────────────────────────────

const ageKeySchema = z.string().regex(/^\d{2,3}$/, 'Age keys must be whole numbers')

const rmdTableSchema = z.object({
  table: z.string(),
  source: z.string().optional(),
  divisors: z.record(ageKeySchema, z.number().positive()),
})

const rateSchema = z.number().min(0).max(1)
const dollarsNonNeg = z.number().min(0)

const stateBracketSchema = z.object({
  floor: dollarsNonNeg,
  rate: rateSchema,
})

const stateOptionsSchema = z.object({
  name: z.string(),
  socialSecurityTaxed: z.boolean().default(false),
  retirementIncomeExempt: z.boolean().default(false),
  retirementIncomeExclusion: dollarsNonNeg.default(0),
})

const stateRuleSchema = z.discriminatedUnion('kind', [
  stateOptionsSchema.extend({ kind: z.literal('none') }),
  stateOptionsSchema.extend({ kind: z.literal('flat'), rate: rateSchema }),
  stateOptionsSchema.extend({
    kind: z.literal('progressive'),
    brackets: z.object({
      single: z.array(stateBracketSchema).min(1),
      mfj: z.array(stateBracketSchema).min(1),
    }),
    standardDeduction: z.object({ single: dollarsNonNeg, mfj: dollarsNonNeg }),
  }),
])

const stateRuleTableSchema = z.object({
  taxYear: z.number().int(),
  amounts: z.literal('dollars'),
  states: z.record(z.string().regex(/^[A-Z]{2}$/, 'State must be a 2-letter uppercase code'), stateRuleSchema),
})

export type StateRule = z.infer<typeof stateRuleSchema>
export type StateRuleTable = z.infer<typeof stateRuleTableSchema>

// ── Types ────────────────────────────────────────────────────────

export interface RmdTable {
  divisors: ReadonlyMap<number, number>
  minAge: number
  maxAge: number
}

export interface ReferenceData {
  rmdTable: RmdTable
  stateRules: StateRuleTable
}

export interface LoadReferenceDataOptions {
  /** Directory holding replacement JSON tables; files missing there fall back to the bundled ones. */
  dataDir?: string
}

// ── Loading ──────────────────────────────────────────────────────

const BUNDLED_DIR = fileURLToPath(new URL('.', import.meta.url))

function resolveTablePath(file: string, dataDir: string | undefined): string {
  if (dataDir) {
    const override = join(dataDir, file)
    if (existsSync(override)) return override
  }
  return join(BUNDLED_DIR, file)
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Unable to read reference table ${path}: ${reason}`)
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

export function parseRmdTable(raw: unknown, origin = RMD_TABLE_FILE): RmdTable {
  const parsed = rmdTableSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid RMD table in ${origin}: ${formatIssues(parsed.error)}`)
  }
  const entries = Object.entries(parsed.data.divisors)
    .map(([age, divisor]): [number, number] => [Number(age), divisor])
    .sort((a, b) => a[0] - b[0])
  if (entries.length === 0) {
    throw new ConfigurationError(`RMD table in ${origin} has no divisors`)
  }
  return Object.freeze({
    divisors: new Map(entries),
    minAge: entries[0][0],
    maxAge: entries[entries.length - 1][0],
  })
}

export function parseStateRuleTable(raw: unknown, origin = STATE_RULES_FILE): StateRuleTable {
  const parsed = stateRuleTableSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid state rule table in ${origin}: ${formatIssues(parsed.error)}`)
  }
  return Object.freeze(parsed.data)
}

export function loadReferenceData(options: LoadReferenceDataOptions = {}): ReferenceData {
  const rmdPath = resolveTablePath(RMD_TABLE_FILE, options.dataDir)
  const statesPath = resolveTablePath(STATE_RULES_FILE, options.dataDir)
  return Object.freeze({
    rmdTable: parseRmdTable(readJson(rmdPath), rmdPath),
    stateRules: parseStateRuleTable(readJson(statesPath), statesPath),
  })
}

let bundled: ReferenceData | undefined

/** The bundled tables, read once per process. */
export function bundledReferenceData(): ReferenceData {
  bundled ??= loadReferenceData()
  return bundled
}
