import {
  financialConfigSchema,
  type ConfigOverrides,
  type FinancialConfigData,
} from '../models/financialConfig'
import type { FilingStatus } from '../models/enums'
import type { TaxBracket } from '../models/policies'
import { SimulationValidationError } from '../utils/errors'
import { formatZodIssue } from '../utils/zod'
import financialDefaults from './financialDefaults.json'
import { getScenarioOverrides } from './scenarios'

export type { ConfigOverrides, ConfigValue } from '../models/financialConfig'

export type FinancialConfig = {
  readonly data: FinancialConfigData
  readonly scenario: string | null
  get: (path: string, defaultValue?: unknown) => unknown
  getNumber: (path: string, defaultValue: number) => number
  withOverrides: (overrides: ConfigOverrides, scenario?: string) => FinancialConfig
  applyScenario: (name: string) => FinancialConfig
  getFederalTaxBrackets: (filingStatus: FilingStatus) => TaxBracket[]
  getStandardDeduction: (filingStatus: FilingStatus) => number
  getMaxTaxRate: (filingStatus: FilingStatus) => number
  getJob401kContribLimit: (age: number) => number
  getIraContribLimit: (age: number) => number
  getRmdDistributionPeriod: (age: number) => number | null
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const mergeConfig = (base: unknown, update: unknown): unknown => {
  if (!isRecord(base) || !isRecord(update)) {
    return update
  }
  const merged: Record<string, unknown> = { ...base }
  Object.entries(update).forEach(([key, value]) => {
    if (value === undefined) {
      return
    }
    merged[key] = key in base ? mergeConfig(base[key], value) : value
  })
  return merged
}

const lookupPath = (source: unknown, path: string) => {
  let current = source
  for (const key of path.split('.')) {
    if (!isRecord(current) || !(key in current)) {
      return undefined
    }
    current = current[key]
  }
  return current
}

export const parseFinancialConfigData = (raw: unknown): FinancialConfigData => {
  const parsed = financialConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new SimulationValidationError(formatZodIssue(parsed.error.issues[0], 'configuration'))
  }
  return parsed.data
}

export const createFinancialConfig = (
  data: FinancialConfigData = parseFinancialConfigData(financialDefaults),
  scenario: string | null = null,
): FinancialConfig => {
  const config: FinancialConfig = {
    data,
    scenario,
    get: (path, defaultValue) => lookupPath(data, path) ?? defaultValue,
    getNumber: (path, defaultValue) => {
      const value = lookupPath(data, path)
      return typeof value === 'number' ? value : defaultValue
    },
    withOverrides: (overrides, nextScenario) =>
      createFinancialConfig(
        parseFinancialConfigData(mergeConfig(data, overrides)),
        nextScenario ?? scenario,
      ),
    applyScenario: (name) => config.withOverrides(getScenarioOverrides(name), name),
    getFederalTaxBrackets: (filingStatus) => data.tax.federal.taxBrackets[filingStatus],
    getStandardDeduction: (filingStatus) => data.tax.federal.standardDeduction[filingStatus],
    getMaxTaxRate: (filingStatus) => {
      const brackets = data.tax.federal.taxBrackets[filingStatus]
      return brackets[brackets.length - 1]?.rate ?? 0
    },
    getJob401kContribLimit: (age) => {
      const limit = data.retirement.job401kContribLimit
      return limit.base + (age >= limit.catchUpAge ? limit.catchUpAmount : 0)
    },
    getIraContribLimit: (age) => {
      const ira = data.retirement.ira
      return ira.contributionLimit + (age >= ira.catchUpAge ? ira.catchUpAmount : 0)
    },
    getRmdDistributionPeriod: (age) => {
      const table = data.retirement.rmdDistributionPeriods
      const first = table[0]
      const last = table[table.length - 1]
      if (!first || !last || age < first.age) {
        return null
      }
      if (age > last.age) {
        return last.divisor
      }
      return table.find((entry) => entry.age === Math.floor(age))?.divisor ?? last.divisor
    },
  }
  return config
}

export const defaultFinancialConfig = createFinancialConfig()
