import { assertNonNegative } from '../../utils/errors'
import { deductFromBankAccounts } from '../funds'
import type { Growable, LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type DonorAdvisedFund = LifecycleEntity &
  Growable & {
    kind: 'donor_advised_fund'
    owner: Person
    fundName: string
    balance: number
    managementFeePercent: number
    distributionRatePercent: number
    yearlyContribution: number
    contributionsThisYear: number
    totalContributions: number
    managementFeesPaid: number
    totalDonated: number
    contribute: (amount: number) => number
    distributeToCharity: (amount: number) => number
  }

export type DonorAdvisedFundOptions = {
  fundName: string
  balance?: number
  growthRate?: number
  managementFeePercent?: number
  distributionRatePercent?: number
  yearlyContribution?: number
}

/**
 * Contributions are deductible in the year they are made; grants paid out to charities later
 * are not. Each `step` grows the fund, takes the management fee and then pays the yearly grant.
 */
export const createDonorAdvisedFund = (
  model: LifeModel,
  owner: Person,
  {
    fundName,
    balance = 0,
    growthRate,
    managementFeePercent,
    distributionRatePercent,
    yearlyContribution = 0,
  }: DonorAdvisedFundOptions,
): DonorAdvisedFund => {
  const defaults = model.config.data.charity.donorAdvisedFund
  const fund: DonorAdvisedFund = {
    id: model.nextId('daf'),
    kind: 'donor_advised_fund',
    stats: {},
    owner,
    fundName,
    balance: Math.max(balance, 0),
    growthRate: growthRate ?? defaults.defaultGrowthRate,
    growthHistory: [],
    managementFeePercent: managementFeePercent ?? defaults.defaultManagementFeePercent,
    distributionRatePercent: distributionRatePercent ?? defaults.defaultDistributionRatePercent,
    yearlyContribution,
    contributionsThisYear: 0,
    totalContributions: 0,
    managementFeesPaid: 0,
    totalDonated: 0,
    getBalance: () => fund.balance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      fund.balance += amount
      return true
    },
    withdraw: (amount) => fund.distributeToCharity(amount),
    calculateGrowth: () => fund.balance * (fund.growthRate / 100),
    applyGrowth: () => {
      const growth = fund.calculateGrowth()
      fund.balance += growth
      fund.growthHistory.push(growth)
      return growth
    },
    /** Moves up to `amount` from the owner's bank accounts into the fund. */
    contribute: (amount) => {
      assertNonNegative(amount, 'Fund contribution')
      const contributed = amount - deductFromBankAccounts(model, owner, amount)
      fund.balance += contributed
      fund.contributionsThisYear += contributed
      fund.totalContributions += contributed
      return contributed
    },
    distributeToCharity: (amount) => {
      const granted = Math.min(Math.max(amount, 0), fund.balance)
      fund.balance -= granted
      fund.totalDonated += granted
      return granted
    },
    preStep: () => {
      if (fund.yearlyContribution > 0) {
        fund.contribute(fund.yearlyContribution)
      }
    },
    step: () => {
      fund.applyGrowth()
      const fee = fund.balance * (fund.managementFeePercent / 100)
      fund.balance -= fee
      fund.managementFeesPaid += fee
      fund.distributeToCharity(fund.balance * (fund.distributionRatePercent / 100))
    },
    postStep: () => {
      fund.contributionsThisYear = 0
    },
  }
  model.registries.donorAdvisedFunds.register(owner, fund)
  model.addEntity(fund)
  return fund
}
