/**
 * Public entry point.
 */

export type {
  Account,
  AccountCategory,
  AccountId,
  AccountType,
  AccountYearEntry,
  ConversionPlan,
  FilingStatus,
  IncomeSource,
  IncomeSourceId,
  IndexingAssumptions,
  LookbackSource,
  MagiLookbackFallback,
  MedicareResult,
  Owner,
  PlanKind,
  ResolvedConversionPlan,
  Scenario,
  TablePolicy,
  YearRecord,
} from './model/types'
export { accountCategory, isRmdEligible } from './model/types'
export { cents, dollars } from './model/money'
export { accountId, incomeSourceId, syntheticAccountId, isSyntheticAccountId } from './model/ids'
export {
  ProjectionError,
  ConfigurationError,
  StateNotReadyError,
  StateAlreadyWrittenError,
  ScenarioInputError,
} from './model/errors'
export type { ClampedInputWarning, InputIssue } from './model/errors'
export { parseScenario, scenarioSchema, validateScenario } from './model/schemas'
export type { ScenarioInput } from './model/schemas'
export { serializeProjection, serializePlanResult, serializeYearRecord } from './model/serialize'
export type { SerializedProjection, SerializedPlanResult, SerializedYearRecord } from './model/serialize'

export { loadReferenceData, bundledReferenceData } from './data/referenceData'
export type { ReferenceData, RmdTable } from './data/referenceData'

export { getSupportedTaxYears, resolveYearTables } from './rules/yearModules'
export type { YearTables } from './rules/yearModules'
export { createStateRegistry } from './rules/stateRegistry'
export { computeFederalTax } from './rules/federalTax'
export { computeMedicare } from './rules/medicare'
export { requiredWithdrawal, rmdStartAge } from './rules/rmd'

export { AccountLedger } from './projection/ledger'
export { MagiHistory } from './projection/magiHistory'
export { prepareScenario, runPlan, runProjection } from './projection/driver'
export type { PlanResult, PreparedScenario, ProjectionResult, ProjectionState, RunOptions } from './projection/driver'
export { summarizeProjection, summarizeConversionCost, compareProjections } from './projection/metrics'
export type { ConversionCost, MetricComparison, ProjectionComparison, ProjectionMetrics } from './projection/metrics'

export { loadEngineConfig, createRunOptions } from './config'
export type { EngineConfig } from './config'
export { Logger, logger } from './utils/logger'
export type { LogLevel, LogSink, ProjectionLogger } from './utils/logger'
