import { deductFromBankAccounts, depositIntoBankAccount } from '../funds'
import { continuousInterest } from '../interest'
import type { LifeModel, LifecycleEntity, PretaxRothSource, RetirementGated } from '../types'
import { getRequiredMinimumDistribution } from './job401k'
import type { Person } from './person'

type IraAccount = LifecycleEntity &
  RetirementGated &
  PretaxRothSource & {
    owner: Person
    balance: number
    yearlyContribution: number
    averageGrowth: number
    balanceHistory: number[]
    getContributionLimit: () => number
    isEarlyWithdrawal: () => boolean
  }

export type TraditionalIra = IraAccount & { kind: 'traditional_ira' }

export type RothIra = IraAccount & {
  kind: 'roth_ira'
  totalContributions: number
}

export type IraOptions = {
  balance?: number
  yearlyContribution?: number
  averageGrowth?: number
}

const deductBalance = (ira: IraAccount, amount: number) => {
  const deducted = Math.min(ira.balance, Math.max(amount, 0))
  ira.balance -= deducted
  return deducted
}

const applyGrowth = (ira: IraAccount) => {
  const growth = continuousInterest(ira.balance, ira.averageGrowth)
  ira.balance += growth
  return growth
}

// Funded from the owner's bank accounts, capped by the yearly limit.
const contributeFromBank = (model: LifeModel, ira: IraAccount) => {
  const target = Math.min(ira.yearlyContribution, ira.getContributionLimit())
  const contributed = target - deductFromBankAccounts(model, ira.owner, target)
  ira.balance += contributed
  return contributed
}

const recordBalance = (ira: IraAccount) => {
  ira.balanceHistory.push(ira.balance)
  ira.stats.retirementBalance = ira.balance
  ira.stats.usableBalance = ira.isUsable(ira.owner.age) ? ira.balance : 0
}

const createIraFields = (model: LifeModel, owner: Person, prefix: string, options: IraOptions) => {
  const retirement = model.config.data.retirement
  return {
    id: model.nextId(prefix),
    stats: {},
    owner,
    balance: Math.max(options.balance ?? 0, 0),
    yearlyContribution: options.yearlyContribution ?? 0,
    averageGrowth: options.averageGrowth ?? retirement.ira.defaultGrowthRate,
    balanceHistory: [],
    getContributionLimit: () => model.config.getIraContribLimit(owner.age),
    isEarlyWithdrawal: () => owner.age < retirement.federalRetirementAge,
    isUsable: (age: number) => age >= retirement.federalRetirementAge,
  }
}

export const createTraditionalIra = (
  model: LifeModel,
  owner: Person,
  options: IraOptions = {},
): TraditionalIra => {
  const ira: TraditionalIra = {
    ...createIraFields(model, owner, 'traditional-ira', options),
    kind: 'traditional_ira',
    getBalance: () => ira.balance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      ira.balance += amount
      return true
    },
    // Voluntary withdrawal into the bank: taxable, and penalized before retirement age.
    withdraw: (amount) => {
      const early = ira.isEarlyWithdrawal()
      const withdrawn = deductBalance(ira, amount)
      if (withdrawn > 0) {
        owner.taxableIncome += withdrawn
        if (early) {
          owner.earlyWithdrawalAmount += withdrawn
        }
        depositIntoBankAccount(model, owner, withdrawn)
      }
      return withdrawn
    },
    getPretaxBalance: () => ira.balance,
    getRothBalance: () => 0,
    deductPretax: (amount) => deductBalance(ira, amount),
    deductRoth: () => 0,
    preStep: () => {
      applyGrowth(ira)
      const contributed = contributeFromBank(model, ira)
      // Contributions are deductible against this year's income.
      owner.taxableIncome -= Math.min(contributed, Math.max(owner.taxableIncome, 0))

      const distributed = deductBalance(
        ira,
        getRequiredMinimumDistribution(model, owner.age, ira.balance),
      )
      if (distributed > 0) {
        depositIntoBankAccount(model, owner, distributed)
        owner.taxableIncome += distributed
        if (owner.age === model.config.data.retirement.rmdStartAge) {
          model.eventLog.add(
            `${owner.name} took first Required Minimum Distribution of $${distributed.toFixed(2)} from Traditional IRA`,
          )
        }
      }
      ira.stats.requiredMinDistrib = distributed
      ira.stats.retirementContrib = contributed
    },
    postStep: () => recordBalance(ira),
  }

  model.registries.traditionalIras.register(owner, ira)
  model.registries.retirementSources.register(owner, ira)
  model.addEntity(ira)
  return ira
}

export const createRothIra = (model: LifeModel, owner: Person, options: IraOptions = {}): RothIra => {
  // Contributions come out before earnings.
  const deductContributionsFirst = (amount: number) => {
    const requested = Math.max(amount, 0)
    const fromContributions = Math.min(requested, ira.totalContributions, ira.balance)
    const fromEarnings = Math.min(requested - fromContributions, ira.balance - fromContributions)
    ira.balance -= fromContributions + fromEarnings
    ira.totalContributions -= fromContributions
    return { fromContributions, fromEarnings }
  }

  const ira: RothIra = {
    ...createIraFields(model, owner, 'roth-ira', options),
    kind: 'roth_ira',
    totalContributions: 0,
    getBalance: () => ira.balance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      ira.balance += amount
      ira.totalContributions += amount
      return true
    },
    withdraw: (amount) => {
      const { fromContributions, fromEarnings } = deductContributionsFirst(amount)
      if (ira.isEarlyWithdrawal() && fromEarnings > 0) {
        owner.earlyWithdrawalAmount += fromEarnings
      }
      const withdrawn = fromContributions + fromEarnings
      if (withdrawn > 0) {
        depositIntoBankAccount(model, owner, withdrawn)
      }
      return withdrawn
    },
    getPretaxBalance: () => 0,
    getRothBalance: () => ira.balance,
    deductPretax: () => 0,
    deductRoth: (amount) => {
      const { fromContributions, fromEarnings } = deductContributionsFirst(amount)
      return fromContributions + fromEarnings
    },
    preStep: () => {
      applyGrowth(ira)
      const contributed = contributeFromBank(model, ira)
      ira.totalContributions += contributed
      ira.stats.retirementContrib = contributed
    },
    postStep: () => recordBalance(ira),
  }

  model.registries.rothIras.register(owner, ira)
  model.registries.retirementSources.register(owner, ira)
  model.addEntity(ira)
  return ira
}
