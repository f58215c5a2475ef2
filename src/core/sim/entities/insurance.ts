import type { InsuranceType } from '../../models'
import { assertNonNegative } from '../../utils/errors'
import { deductFromBankAccounts, depositIntoBankAccount, getBankBalance } from '../funds'
import type { LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type PremiumPolicy = LifecycleEntity & {
  owner: Person
  annualPremium: number
  missedPayments: number
  isActive: boolean
}

export type Insurance = PremiumPolicy & {
  kind: 'insurance'
  insuranceType: InsuranceType
  company: string
  coverageAmount: number
  deductible: number
  fileClaim: (amount: number) => number
}

export type InsuranceOptions = {
  insuranceType: InsuranceType
  company: string
  annualPremium: number
  coverageAmount: number
  deductible?: number
}

/**
 * Pays the premium in full from the owner's bank accounts, or records a miss. A policy lapses
 * once its misses exceed `insurance.defaultMaxMissedPayments`.
 */
export const payPremium = (model: LifeModel, policy: PremiumPolicy, label: string) => {
  policy.stats.moneySpent = 0
  if (!policy.isActive) {
    return false
  }
  const { owner } = policy
  if (getBankBalance(model, owner) >= policy.annualPremium) {
    deductFromBankAccounts(model, owner, policy.annualPremium)
    policy.stats.moneySpent = policy.annualPremium
    return true
  }
  policy.missedPayments += 1
  if (policy.missedPayments > model.config.data.insurance.defaultMaxMissedPayments) {
    policy.isActive = false
    model.eventLog.add(`${owner.name}'s ${label} lapsed after ${policy.missedPayments} missed payments`)
  }
  return false
}

export const createInsurance = (
  model: LifeModel,
  owner: Person,
  { insuranceType, company, annualPremium, coverageAmount, deductible = 0 }: InsuranceOptions,
): Insurance => {
  const policy: Insurance = {
    id: model.nextId('insurance'),
    kind: 'insurance',
    stats: {},
    owner,
    insuranceType,
    company,
    annualPremium,
    coverageAmount,
    deductible,
    missedPayments: 0,
    isActive: true,
    /** Pays the covered part of a loss into the owner's bank and returns it. */
    fileClaim: (amount) => {
      assertNonNegative(amount, 'Claim amount')
      if (!policy.isActive) {
        return 0
      }
      const payout = Math.min(Math.max(amount - policy.deductible, 0), policy.coverageAmount)
      if (payout > 0) {
        depositIntoBankAccount(model, owner, payout)
      }
      return payout
    },
    preStep: () => {
      payPremium(model, policy, `${insuranceType} insurance with ${company}`)
    },
  }
  model.registries.insurancePolicies.register(owner, policy)
  model.addEntity(policy)
  return policy
}
