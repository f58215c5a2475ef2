import { depositIntoBankAccount } from '../funds'
import { continuousInterest } from '../interest'
import type { LifeModel, LifecycleEntity, PretaxRothSource, RetirementGated } from '../types'
import type { Job } from './job'
import type { Person } from './person'

export type Job401k = LifecycleEntity &
  RetirementGated &
  PretaxRothSource & {
    kind: 'job_401k'
    owner: Person
    job: Job | null
    pretaxBalance: number
    rothBalance: number
    pretaxContribPercent: number
    rothContribPercent: number
    averageReturn: number
    companyMatchPercent: number
    balanceHistory: number[]
    getPretaxContribution: (salary: number) => number
    getRothContribution: (salary: number) => number
    getCompanyMatch: (contribution: number) => number
    contribute: (pretaxAmount: number, rothAmount: number) => void
  }

export type Job401kOptions = {
  pretaxBalance?: number
  rothBalance?: number
  pretaxContribPercent?: number
  rothContribPercent?: number
  averageReturn?: number
  companyMatchPercent?: number
}

/** Required minimum distribution for a pretax balance at an age, or 0 before RMDs start. */
export const getRequiredMinimumDistribution = (model: LifeModel, age: number, balance: number) => {
  if (age < model.config.data.retirement.rmdStartAge || balance <= 0) {
    return 0
  }
  const period = model.config.getRmdDistributionPeriod(age)
  return period ? balance / period : 0
}

export const createJob401k = (
  model: LifeModel,
  job: Job,
  {
    pretaxBalance = 0,
    rothBalance = 0,
    pretaxContribPercent = 0,
    rothContribPercent = 0,
    averageReturn = 0,
    companyMatchPercent = 0,
  }: Job401kOptions = {},
): Job401k => {
  const owner = job.owner
  const retirement = model.config.data.retirement

  const account: Job401k = {
    id: model.nextId('401k'),
    kind: 'job_401k',
    stats: {},
    owner,
    job,
    pretaxBalance,
    rothBalance,
    pretaxContribPercent,
    rothContribPercent,
    averageReturn,
    companyMatchPercent,
    balanceHistory: [],
    getPretaxContribution: (salary) => salary * (account.pretaxContribPercent / 100),
    getRothContribution: (salary) => salary * (account.rothContribPercent / 100),
    getCompanyMatch: (contribution) => contribution * (account.companyMatchPercent / 100),
    contribute: (pretaxAmount, rothAmount) => {
      account.pretaxBalance += Math.max(pretaxAmount, 0)
      account.rothBalance += Math.max(rothAmount, 0)
    },
    getBalance: () => account.pretaxBalance + account.rothBalance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      account.pretaxBalance += amount
      return true
    },
    // Forced draws take pretax money first, then roth.
    withdraw: (amount) => {
      const fromPretax = account.deductPretax(amount)
      return fromPretax + account.deductRoth(amount - fromPretax)
    },
    isUsable: (age) => age >= retirement.federalRetirementAge,
    getPretaxBalance: () => account.pretaxBalance,
    getRothBalance: () => account.rothBalance,
    deductPretax: (amount) => {
      const deducted = Math.min(account.pretaxBalance, Math.max(amount, 0))
      account.pretaxBalance -= deducted
      return deducted
    },
    deductRoth: (amount) => {
      const deducted = Math.min(account.rothBalance, Math.max(amount, 0))
      account.rothBalance -= deducted
      return deducted
    },
    preStep: () => {
      account.pretaxBalance += continuousInterest(account.pretaxBalance, account.averageReturn)
      account.rothBalance += continuousInterest(account.rothBalance, account.averageReturn)

      const required = getRequiredMinimumDistribution(model, owner.age, account.pretaxBalance)
      const distributed = account.deductPretax(required)
      if (distributed > 0) {
        depositIntoBankAccount(model, owner, distributed)
        owner.taxableIncome += distributed
        if (owner.age === retirement.rmdStartAge) {
          model.eventLog.add(
            `${owner.name} took first Required Minimum Distribution of $${distributed.toFixed(2)} from 401k`,
          )
        }
      }
      account.stats.requiredMinDistrib = distributed
    },
    postStep: () => {
      const balance = account.getBalance()
      account.balanceHistory.push(balance)
      account.stats.retirementBalance = balance
      account.stats.usableBalance = account.isUsable(owner.age) ? balance : 0
    },
  }

  job.retirementAccount = account
  model.registries.job401ks.register(owner, account)
  model.registries.retirementSources.register(owner, account)
  model.addEntity(account)
  return account
}
