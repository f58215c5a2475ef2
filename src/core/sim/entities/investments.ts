import type { Growable, LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

type InvestmentAccount = LifecycleEntity &
  Growable & {
    owner: Person
    balance: number
    balanceHistory: number[]
  }

export type BrokerageAccount = InvestmentAccount & {
  kind: 'brokerage'
  company: string
}

export type Plan529 = InvestmentAccount & {
  kind: 'plan_529'
  state: string
  beneficiaryName: string
}

export type BrokerageOptions = {
  company: string
  balance?: number
  growthRate?: number
}

export type Plan529Options = {
  state: string
  beneficiaryName?: string
  balance?: number
  growthRate?: number
}

// Simple annual growth, applied in step.
const createInvestmentFields = (
  model: LifeModel,
  owner: Person,
  prefix: string,
  balance: number,
  growthRate: number,
) => {
  const account: InvestmentAccount = {
    id: model.nextId(prefix),
    kind: 'brokerage',
    stats: {},
    owner,
    balance: Math.max(balance, 0),
    balanceHistory: [],
    growthRate,
    growthHistory: [],
    getBalance: () => account.balance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      account.balance += amount
      return true
    },
    withdraw: (amount) => {
      const withdrawn = Math.min(Math.max(amount, 0), account.balance)
      account.balance -= withdrawn
      return withdrawn
    },
    calculateGrowth: () => account.balance * (account.growthRate / 100),
    applyGrowth: () => {
      const growth = account.calculateGrowth()
      account.balance += growth
      account.growthHistory.push(growth)
      return growth
    },
    step: () => {
      account.applyGrowth()
      account.balanceHistory.push(account.balance)
    },
  }
  return account
}

export const createBrokerageAccount = (
  model: LifeModel,
  owner: Person,
  { company, balance = 0, growthRate }: BrokerageOptions,
): BrokerageAccount => {
  const base = createInvestmentFields(
    model,
    owner,
    'brokerage',
    balance,
    growthRate ?? model.config.data.accounts.brokerage.defaultGrowthRate,
  )
  const account: BrokerageAccount = Object.assign(base, { kind: 'brokerage' as const, company })
  model.registries.brokerageAccounts.register(owner, account)
  model.addEntity(account)
  return account
}

export const createPlan529 = (
  model: LifeModel,
  owner: Person,
  { state, beneficiaryName = '', balance = 0, growthRate }: Plan529Options,
): Plan529 => {
  const base = createInvestmentFields(
    model,
    owner,
    'plan-529',
    balance,
    growthRate ?? model.config.data.accounts.brokerage.defaultGrowthRate,
  )
  const plan: Plan529 = Object.assign(base, {
    kind: 'plan_529' as const,
    state,
    beneficiaryName,
  })
  model.registries.plan529s.register(owner, plan)
  model.addEntity(plan)
  return plan
}
