export * from './core/models'
export {
  createFinancialConfig,
  defaultFinancialConfig,
  parseFinancialConfigData,
  type FinancialConfig,
} from './core/config/financialConfig'
export { loadFinancialConfig } from './core/config/loadFinancialConfig'
export {
  getScenarioOverrides,
  isPredefinedScenarioName,
  predefinedScenarios,
  type PredefinedScenarioName,
} from './core/config/scenarios'
export { ModelSetupError, SimulationValidationError } from './core/utils/errors'
export { collectStats, createLifeModel, summarizeStats, type LifeModelOptions } from './core/sim/engine'
export { createEventLog, type EventLog } from './core/sim/events'
export { createExplainTracker, findCheckpoint, type ExplainTracker } from './core/sim/explain'
export { compoundInterest, continuousInterest } from './core/sim/interest'
export { computePayrollTaxes } from './core/sim/payrollTaxes'
export { createModelRegistries, createRegistry, type Registry } from './core/sim/registry'
export {
  computeUnitTaxes,
  settleTaxableUnit,
  type SettlementResult,
  type TaxableUnit,
} from './core/sim/settlement'
export {
  computeBracketTax,
  computeTaxesDue,
  getMaxTaxRate,
  getStandardDeduction,
  zeroTaxes,
  type TaxesDue,
} from './core/sim/tax'
export {
  adjustForClaimAge,
  computeAime,
  computePia,
  estimateAnnualBenefit,
  type EarningsRecord,
  type SocialSecurityPolicy,
} from './core/sim/ssa'
export type * from './core/sim/types'
export * from './core/sim/entities'
export { buildConfigFromRequest, buildModelFromRequest } from './core/sim/input'
export { buildSummary, runScenario } from './core/sim/scenarioRunner'
