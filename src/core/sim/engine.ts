import { defaultFinancialConfig, type FinancialConfig } from '../config/financialConfig'
import {
  statKeys,
  type SettlementExplanation,
  type StatKey,
  type YearlyStats,
  type YearlyStatsRecord,
} from '../models'
import { createEventLog } from './events'
import { createModelRegistries } from './registry'
import type { LifeModel, LifecycleEntity, ModelStatus } from './types'

export type LifeModelOptions = {
  startYear?: number
  endYear?: number
  config?: FinancialConfig
  explain?: boolean
}

const defaultYearsSimulated = 50

const emptyStats: YearlyStats = {
  grossIncome: 0,
  bankBalance: 0,
  retirementBalance: 0,
  usableBalance: 0,
  debt: 0,
  taxesPaid: 0,
  taxesPaidFederal: 0,
  taxesPaidState: 0,
  taxesPaidSocialSecurity: 0,
  taxesPaidMedicare: 0,
  taxesPaidPenalty: 0,
  moneySpent: 0,
  retirementContrib: 0,
  retirementMatch: 0,
  requiredMinDistrib: 0,
  homeExpensesPaid: 0,
  interestPaid: 0,
  rentPaid: 0,
}

const createEmptyStats = (): YearlyStats => ({ ...emptyStats })

export const collectStats = (entities: readonly LifecycleEntity[]): YearlyStats => {
  const totals = createEmptyStats()
  entities.forEach((entity) => {
    statKeys.forEach((key) => {
      totals[key] += entity.stats[key] ?? 0
    })
  })
  return totals
}

/** Sums one statistic over the records whose year falls in [fromYear, toYear]. */
export const summarizeStats = (
  records: readonly YearlyStatsRecord[],
  key: StatKey,
  fromYear = Number.NEGATIVE_INFINITY,
  toYear = Number.POSITIVE_INFINITY,
) =>
  records
    .filter((record) => record.year >= fromYear && record.year <= toYear)
    .reduce((sum, record) => sum + record[key], 0)

/**
 * Year-by-year clock. Each step snapshots the statistics entities wrote during the previous
 * step, then runs preStep, step and postStep over every entity in registration order.
 */
export const createLifeModel = ({
  startYear = new Date().getFullYear(),
  endYear = startYear + defaultYearsSimulated,
  config = defaultFinancialConfig,
  explain = false,
}: LifeModelOptions = {}): LifeModel => {
  const entities: LifecycleEntity[] = []
  const simulatedYears: number[] = []
  const yearlyStats: YearlyStatsRecord[] = []
  const settlements: SettlementExplanation[] = []
  let year = startYear
  let status: ModelStatus = 'idle'
  let idCounter = 0

  const model: LifeModel = {
    config,
    startYear,
    endYear,
    get year() {
      return year
    },
    get status() {
      return status
    },
    simulatedYears,
    yearlyStats,
    entities,
    registries: createModelRegistries(),
    eventLog: createEventLog(() => year),
    settlements,
    explainEnabled: explain,
    addEntity: (entity) => {
      entities.push(entity)
    },
    nextId: (prefix) => {
      idCounter += 1
      return `${prefix}-${idCounter}`
    },
    step: () => {
      status = 'running'
      simulatedYears.push(year)
      yearlyStats.push({ year, ...collectStats(entities) })
      entities.forEach((entity) => entity.preStep?.())
      entities.forEach((entity) => entity.step?.())
      entities.forEach((entity) => entity.postStep?.())
      year += 1
      if (year > endYear) {
        status = 'finished'
      }
    },
    run: () => {
      while (year <= endYear) {
        model.step()
      }
    },
  }
  return model
}
