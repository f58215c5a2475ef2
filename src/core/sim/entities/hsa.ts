import type { HsaType } from '../../models'
import { assertNonNegative } from '../../utils/errors'
import { deductFromBankAccounts, depositIntoBankAccount } from '../funds'
import type { BalanceBearing, LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type HealthSavingsAccount = LifecycleEntity &
  BalanceBearing & {
    kind: 'hsa'
    owner: Person
    hsaType: HsaType
    balance: number
    contributionLimit: number
    employerContribution: number
    yearlyContribution: number
    annualContributions: number
    contribute: (amount: number) => number
    withdrawMedical: (amount: number) => number
    withdrawNonMedical: (amount: number) => number
  }

export type HsaOptions = {
  hsaType: HsaType
  balance?: number
  contributionLimit?: number
  employerContribution?: number
  yearlyContribution?: number
}

export const createHealthSavingsAccount = (
  model: LifeModel,
  owner: Person,
  { hsaType, balance = 0, contributionLimit, employerContribution, yearlyContribution = 0 }: HsaOptions,
): HealthSavingsAccount => {
  const defaults = model.config.data.accounts.hsa
  const take = (amount: number) => {
    const withdrawn = Math.min(Math.max(amount, 0), account.balance)
    account.balance -= withdrawn
    return withdrawn
  }

  const account: HealthSavingsAccount = {
    id: model.nextId('hsa'),
    kind: 'hsa',
    stats: {},
    owner,
    hsaType,
    balance: Math.max(balance, 0),
    contributionLimit:
      contributionLimit ??
      (hsaType === 'family' ? defaults.familyContributionLimit : defaults.contributionLimit),
    employerContribution: employerContribution ?? defaults.defaultEmployerContribution,
    yearlyContribution,
    annualContributions: 0,
    getBalance: () => account.balance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      return account.contribute(amount) > 0 || amount === 0
    },
    withdraw: take,
    /** Adds up to the remaining yearly limit and returns what was accepted. */
    contribute: (amount) => {
      assertNonNegative(amount, 'HSA contribution')
      const accepted = Math.min(
        amount,
        Math.max(account.contributionLimit - account.annualContributions, 0),
      )
      account.balance += accepted
      account.annualContributions += accepted
      return accepted
    },
    withdrawMedical: (amount) => {
      const withdrawn = take(amount)
      if (withdrawn > 0) {
        depositIntoBankAccount(model, owner, withdrawn)
      }
      return withdrawn
    },
    withdrawNonMedical: (amount) => {
      const withdrawn = take(amount)
      if (withdrawn > 0) {
        owner.taxableIncome += withdrawn
        if (owner.age < defaults.qualifiedWithdrawalAge) {
          owner.earlyWithdrawalAmount += withdrawn
        }
        depositIntoBankAccount(model, owner, withdrawn)
      }
      return withdrawn
    },
    preStep: () => {
      if (account.yearlyContribution <= 0) {
        return
      }
      const room = Math.max(account.contributionLimit - account.annualContributions, 0)
      const target = Math.min(account.yearlyContribution, room)
      const funded = target - deductFromBankAccounts(model, owner, target)
      const contributed = account.contribute(funded)
      owner.taxableIncome -= Math.min(contributed, Math.max(owner.taxableIncome, 0))
    },
    step: () => {
      account.balance += account.employerContribution
    },
    postStep: () => {
      account.annualContributions = 0
    },
  }

  model.registries.hsas.register(owner, account)
  model.addEntity(account)
  return account
}
