/**
 * Canonical projection model — the single source of truth for a scenario
 * and the year-by-year records the engine produces from it.
 *
 * Monetary values are in integer cents unless noted otherwise.
 * Rates are decimals (0.06 = 6%).
 */

// ── Filing status ──────────────────────────────────────────────

export type FilingStatus = 'single' | 'mfj' | 'mfs' | 'hoh' | 'qw'

export const FILING_STATUSES: readonly FilingStatus[] = ['single', 'mfj', 'mfs', 'hoh', 'qw']

// ── Identifiers ────────────────────────────────────────────────

/**
 * Account identifier. Real accounts carry the id supplied by the caller;
 * engine-created destination accounts live under the reserved `~` prefix
 * (see ids.ts), so the two sets can never collide.
 */
export type AccountId = string & { readonly __brand: 'AccountId' }

export type IncomeSourceId = string & { readonly __brand: 'IncomeSourceId' }

export type Owner = 'primary' | 'spouse'

// ── Accounts ───────────────────────────────────────────────────

export type AccountType =
  | 'traditional_ira'
  | '401k'
  | '403b'
  | '457b'
  | 'sep_ira'
  | 'simple_ira'
  | 'roth_ira'
  | 'roth_401k'
  | 'brokerage'
  | 'cash'

export type AccountCategory = 'pre-tax' | 'tax-free' | 'taxable'

export const ACCOUNT_CATEGORY: Record<AccountType, AccountCategory> = {
  traditional_ira: 'pre-tax',
  '401k':          'pre-tax',
  '403b':          'pre-tax',
  '457b':          'pre-tax',
  sep_ira:         'pre-tax',
  simple_ira:      'pre-tax',
  roth_ira:        'tax-free',
  roth_401k:       'tax-free',
  brokerage:       'taxable',
  cash:            'taxable',
}

export interface PlannedWithdrawal {
  annualAmount: number   // cents
  startYear: number
  endYear?: number       // inclusive; open-ended when absent
}

export interface Account {
  id: AccountId
  name: string
  type: AccountType
  owner: Owner
  startingBalance: number   // cents, balance at the end of startYear − 1
  growthRate: number
  withdrawal?: PlannedWithdrawal
  /** True for destination accounts created by the engine. */
  synthetic?: boolean
}

export function accountCategory(account: Pick<Account, 'type'>): AccountCategory {
  return ACCOUNT_CATEGORY[account.type]
}

export function isRmdEligible(account: Pick<Account, 'type'>): boolean {
  return ACCOUNT_CATEGORY[account.type] === 'pre-tax'
}

// ── Income sources ─────────────────────────────────────────────

export type IncomeSourceKind = 'social_security' | 'pension' | 'wages' | 'annuity' | 'other'

export interface IncomeSource {
  id: IncomeSourceId
  name: string
  kind: IncomeSourceKind
  owner: Owner
  annualAmount: number   // cents, in the first payment year
  startAge: number
  endAge?: number        // inclusive
  cola: number           // annual increase after the first payment year
}

// ── Conversions ────────────────────────────────────────────────

export interface ConversionPlan {
  sourceAccountId: AccountId
  /** Tax-free destination. Omitted → the engine creates a synthetic one. */
  destinationAccountId?: AccountId
  totalAmount: number    // cents
  startYear: number
  durationYears: number
  /** Cap on a single year's installment; lengthens the schedule when hit. */
  maxAnnualAmount?: number
  /** Growth rate for a synthetic destination account. */
  destinationGrowthRate?: number
}

/** A conversion plan after destination resolution and up-front clamping. */
export interface ResolvedConversionPlan {
  sourceAccountId: AccountId
  destinationAccountId: AccountId
  totalAmount: number
  startYear: number
  durationYears: number
}

// ── Scenario ───────────────────────────────────────────────────

export type MagiLookbackFallback = 'no-surcharge' | 'current-year'

export type TablePolicy = 'carry-forward' | 'strict'

export interface IndexingAssumptions {
  /** Annual indexing of federal brackets and standard deductions past the last published year. */
  taxBrackets: number
  irmaaThresholds: number
  medicarePremiums: number
}

export interface Scenario {
  filingStatus: FilingStatus
  state: string                  // 2-letter code
  primaryBirthYear: number
  spouseBirthYear?: number
  startYear: number
  endYear: number                // inclusive
  retirementYear: number
  accounts: Account[]
  incomeSources: IncomeSource[]
  conversions: ConversionPlan[]
  /** Actual MAGI for years before startYear, used by the IRMAA lookback. */
  priorMagi: Record<number, number>
  magiLookbackFallback: MagiLookbackFallback
  tablePolicy: TablePolicy
  indexing: IndexingAssumptions
}

// ── Plans ──────────────────────────────────────────────────────

export type PlanKind = 'baseline' | 'conversion'

// ── Year records ───────────────────────────────────────────────

export interface AccountYearEntry {
  beginningBalance: number
  conversionOut: number
  conversionIn: number
  growth: number
  rmd: number
  /** Total distribution: the larger of RMD and the planned withdrawal, capped at the balance. */
  withdrawal: number
  endingBalance: number
  /** Taxable ordinary income this account contributes (pre-tax distributions only). */
  incomeContribution: number
}

export type LookbackSource = 'history' | 'seeded' | 'current-year' | 'unavailable'

export interface MedicareResult {
  enrollees: number
  medicareBase: number
  partB: number
  partD: number
  irmaaSurcharge: number
  irmaaBracket: number
  total: number
  magiUsed: number | null
  lookbackYear: number
  lookbackSource: LookbackSource
}

export interface YearRecord {
  plan: PlanKind
  year: number
  primaryAge: number
  spouseAge: number | null

  accounts: ReadonlyMap<AccountId, AccountYearEntry>
  incomeBySource: ReadonlyMap<IncomeSourceId, number>

  /** Ordinary income excluding Social Security and conversions. */
  grossIncome: number
  socialSecurityIncome: number
  taxableSocialSecurity: number
  conversionAmount: number
  agi: number
  magi: number
  standardDeduction: number
  taxableIncome: number

  regularTax: number
  conversionTax: number
  federalTax: number
  stateTax: number
  marginalRate: number
  effectiveRate: number

  medicare: MedicareResult

  /** All cash received: ordinary income, Social Security and non-taxable withdrawals. */
  totalIncome: number
  afterTaxIncome: number
  netIncome: number
}
