export { byFilingStatus, moneySchema, percentSchema } from './common'
export {
  annuityTypeSchema,
  donationTypeSchema,
  filingStatusSchema,
  hsaTypeSchema,
  insuranceTypeSchema,
  studentLoanTypeSchema,
} from './enums'
export type {
  AnnuityType,
  DonationType,
  FilingStatus,
  HsaType,
  InsuranceType,
  StudentLoanType,
} from './enums'
export {
  federalTaxPolicySchema,
  ficaPolicySchema,
  rmdTableSchema,
  taxBracketSchema,
} from './policies'
export type { FederalTaxPolicy, FicaPolicy, RmdTableEntry, TaxBracket } from './policies'
export {
  configOverridesSchema,
  configValueSchema,
  financialConfigSchema,
} from './financialConfig'
export type { ConfigOverrides, ConfigValue, FinancialConfigData } from './financialConfig'
export {
  familyRequestSchema,
  personRequestSchema,
  scenarioRequestSchema,
} from './scenario'
export type {
  FamilyRequest,
  JobRequest,
  PersonRequest,
  ScenarioRequest,
  ScenarioRequestInput,
  SpendingRequest,
} from './scenario'
export {
  explainMetricSchema,
  settlementExplanationSchema,
  simulationEventSchema,
  simulationRunSchema,
  simulationSummarySchema,
  statKeySchema,
  statKeys,
} from './simulationRun'
export type {
  ExplainMetric,
  SettlementExplanation,
  SimulationEvent,
  SimulationRun,
  SimulationSummary,
  StatKey,
  YearlyStats,
  YearlyStatsRecord,
} from './simulationRun'
