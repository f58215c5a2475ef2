import { SimulationValidationError } from '../utils/errors'
import type { ConfigOverrides } from '../models/financialConfig'

// Lower growth and interest across the board.
const recessionScenario: ConfigOverrides = {
  accounts: {
    bank: { defaultInterestRate: 0.5 },
    brokerage: { defaultGrowthRate: 3.0 },
  },
  retirement: {
    ira: { defaultGrowthRate: 3.5 },
  },
  insurance: {
    life: { defaultCashValueGrowthRate: 1.0 },
  },
}

const highInflationScenario: ConfigOverrides = {
  accounts: {
    bank: { defaultInterestRate: 4.0 },
    brokerage: { defaultGrowthRate: 9.0 },
  },
  debt: {
    creditCard: { defaultInterestRate: 25.0 },
  },
}

const conservativeScenario: ConfigOverrides = {
  accounts: {
    brokerage: { defaultGrowthRate: 5.0 },
  },
  retirement: {
    ira: { defaultGrowthRate: 5.5 },
  },
  insurance: {
    life: { defaultCashValueGrowthRate: 2.0 },
  },
}

const aggressiveScenario: ConfigOverrides = {
  accounts: {
    brokerage: { defaultGrowthRate: 10.0 },
  },
  retirement: {
    ira: { defaultGrowthRate: 10.5 },
  },
  insurance: {
    life: { defaultCashValueGrowthRate: 4.0 },
  },
}

const taxReformScenario: ConfigOverrides = {
  tax: {
    federal: {
      standardDeduction: {
        single: 15000,
        married_filing_jointly: 30000,
      },
      taxBrackets: {
        single: [
          { start: 0, end: 12000, rate: 10 },
          { start: 12001, end: 45000, rate: 12 },
          { start: 45001, end: 95000, rate: 22 },
          { start: 95001, end: 180000, rate: 24 },
          { start: 180001, end: 250000, rate: 32 },
          { start: 250001, end: 600000, rate: 35 },
          { start: 600001, end: null, rate: 39 },
        ],
      },
    },
    state: { taxRate: 7.5 },
  },
}

const lowTaxScenario: ConfigOverrides = {
  tax: {
    federal: {
      taxBrackets: {
        single: [
          { start: 0, end: 15000, rate: 8 },
          { start: 15001, end: 50000, rate: 10 },
          { start: 50001, end: 100000, rate: 18 },
          { start: 100001, end: 200000, rate: 20 },
          { start: 200001, end: 500000, rate: 28 },
          { start: 500001, end: null, rate: 32 },
        ],
      },
    },
    state: { taxRate: 3.0 },
  },
}

export const predefinedScenarios = {
  recession: recessionScenario,
  high_inflation: highInflationScenario,
  conservative: conservativeScenario,
  aggressive: aggressiveScenario,
  tax_reform: taxReformScenario,
  low_tax: lowTaxScenario,
} satisfies Record<string, ConfigOverrides>

export type PredefinedScenarioName = keyof typeof predefinedScenarios

export const isPredefinedScenarioName = (name: string): name is PredefinedScenarioName =>
  Object.prototype.hasOwnProperty.call(predefinedScenarios, name)

export const getScenarioOverrides = (name: string): ConfigOverrides => {
  if (!isPredefinedScenarioName(name)) {
    const available = Object.keys(predefinedScenarios).join(', ')
    throw new SimulationValidationError(
      `Unknown scenario "${name}". Available scenarios: ${available}.`,
    )
  }
  return predefinedScenarios[name]
}
