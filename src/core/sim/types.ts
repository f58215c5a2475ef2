import type { FinancialConfig } from '../config/financialConfig'
import type { SettlementExplanation, YearlyStats, YearlyStatsRecord } from '../models'
import type { EventLog } from './events'
import type { ModelRegistries } from './registry'

export type EntityKind =
  | 'person'
  | 'family'
  | 'job'
  | 'bank_account'
  | 'job_401k'
  | 'traditional_ira'
  | 'roth_ira'
  | 'brokerage'
  | 'plan_529'
  | 'hsa'
  | 'pension'
  | 'social_security'
  | 'annuity'
  | 'insurance'
  | 'life_insurance'
  | 'home'
  | 'apartment'
  | 'car_loan'
  | 'student_loan'
  | 'credit_card'
  | 'donation'
  | 'donor_advised_fund'
  | 'life_events'

export type LifecycleEntity = {
  id: string
  kind: EntityKind
  // Last values written by the entity; the model sums them when it snapshots a year.
  stats: Partial<YearlyStats>
  preStep?: () => void
  step?: () => void
  postStep?: () => void
}

export type BalanceBearing = {
  getBalance: () => number
  deposit: (amount: number) => boolean
  withdraw: (amount: number) => number
}

export type Growable = BalanceBearing & {
  growthRate: number
  growthHistory: number[]
  calculateGrowth: () => number
  applyGrowth: () => number
}

export type RetirementGated = BalanceBearing & {
  isUsable: (age: number) => boolean
}

export type AmortizingLoan = {
  loanAmount: number
  principal: number
  interestRate: number
  lengthYears: number
  monthlyPayment: number
  totalInterestPaid: number
  interestPaidThisYear: number
  calculateMonthlyPayment: () => number
  getAnnualPayment: () => number
  getInterestForYear: () => number
  makePayment: (paymentAmount: number, extraToPrincipal?: number) => number
  isPaidOff: () => boolean
}

export type PeriodicBenefit = {
  getAnnualBenefit: () => number
  isEligible: () => boolean
}

export type PretaxRothSource = {
  getPretaxBalance: () => number
  getRothBalance: () => number
  deductPretax: (amount: number) => number
  deductRoth: (amount: number) => number
}

export type ModelStatus = 'idle' | 'running' | 'finished'

export type LifeModel = {
  readonly config: FinancialConfig
  readonly startYear: number
  readonly endYear: number
  readonly year: number
  readonly status: ModelStatus
  readonly simulatedYears: readonly number[]
  readonly yearlyStats: readonly YearlyStatsRecord[]
  readonly entities: readonly LifecycleEntity[]
  readonly registries: ModelRegistries
  readonly eventLog: EventLog
  readonly settlements: SettlementExplanation[]
  readonly explainEnabled: boolean
  addEntity: (entity: LifecycleEntity) => void
  nextId: (prefix: string) => string
  step: () => void
  run: () => void
}
