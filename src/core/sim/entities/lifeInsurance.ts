import { depositIntoBankAccount } from '../funds'
import type { LifeModel } from '../types'
import { payPremium, type PremiumPolicy } from './insurance'
import type { Person } from './person'

type LifeInsuranceBase = PremiumPolicy & {
  kind: 'life_insurance'
  beneficiary: Person
  coverageAmount: number
  payout: () => number
}

export type TermLifeInsurance = LifeInsuranceBase & {
  policyType: 'term'
  termLength: number
  yearsInForce: number
}

export type WholeLifeInsurance = LifeInsuranceBase & {
  policyType: 'whole'
  cashValue: number
  cashValueGrowthRate: number
  withdrawCashValue: (amount: number) => number
}

export type LifeInsurance = TermLifeInsurance | WholeLifeInsurance

type LifeInsuranceOptions = {
  beneficiary: Person
  coverageAmount: number
  annualPremium: number
}

export type TermLifeOptions = LifeInsuranceOptions & { termLength: number }

export type WholeLifeOptions = LifeInsuranceOptions & { cashValueGrowthRate?: number }

const money = (amount: number) =>
  amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })

const createPayout = (model: LifeModel, policy: LifeInsuranceBase) => () => {
  if (!policy.isActive) {
    model.eventLog.add(`Policy for ${policy.owner.name} is not active. No payout.`)
    return 0
  }
  const amount = policy.coverageAmount
  depositIntoBankAccount(model, policy.beneficiary, amount)
  policy.isActive = false
  model.eventLog.add(
    `Life insurance policy for ${policy.owner.name} paid out $${money(amount)} to ${policy.beneficiary.name}`,
  )
  return amount
}

export const createTermLifeInsurance = (
  model: LifeModel,
  owner: Person,
  { beneficiary, coverageAmount, annualPremium, termLength }: TermLifeOptions,
): TermLifeInsurance => {
  const policy: TermLifeInsurance = {
    id: model.nextId('term-life'),
    kind: 'life_insurance',
    policyType: 'term',
    stats: {},
    owner,
    beneficiary,
    coverageAmount,
    annualPremium,
    missedPayments: 0,
    isActive: true,
    termLength,
    yearsInForce: 0,
    payout: () => 0,
    preStep: () => {
      payPremium(model, policy, 'term life insurance')
    },
    step: () => {
      if (!policy.isActive) {
        return
      }
      policy.yearsInForce += 1
      if (policy.yearsInForce >= policy.termLength) {
        policy.isActive = false
        model.eventLog.add(
          `Term life insurance policy for ${owner.name} has expired after ${policy.termLength} years`,
        )
      }
    },
  }
  policy.payout = createPayout(model, policy)
  model.registries.lifeInsurancePolicies.register(owner, policy)
  model.addEntity(policy)
  return policy
}

export const createWholeLifeInsurance = (
  model: LifeModel,
  owner: Person,
  { beneficiary, coverageAmount, annualPremium, cashValueGrowthRate }: WholeLifeOptions,
): WholeLifeInsurance => {
  const life = model.config.data.insurance.life
  const policy: WholeLifeInsurance = {
    id: model.nextId('whole-life'),
    kind: 'life_insurance',
    policyType: 'whole',
    stats: {},
    owner,
    beneficiary,
    coverageAmount,
    annualPremium,
    missedPayments: 0,
    isActive: true,
    cashValue: 0,
    cashValueGrowthRate: cashValueGrowthRate ?? life.defaultCashValueGrowthRate,
    payout: () => 0,
    withdrawCashValue: (amount) => {
      if (amount <= 0 || !policy.isActive) {
        return 0
      }
      const withdrawn = Math.min(amount, policy.cashValue)
      policy.cashValue -= withdrawn
      policy.coverageAmount = Math.max(policy.coverageAmount - withdrawn, 0)
      if (withdrawn > 0) {
        depositIntoBankAccount(model, owner, withdrawn)
      }
      model.eventLog.add(
        `${owner.name} withdrew $${money(withdrawn)} from whole life policy. New cash value: $${money(policy.cashValue)}. New coverage: $${money(policy.coverageAmount)}`,
      )
      return withdrawn
    },
    preStep: () => {
      if (payPremium(model, policy, 'whole life insurance')) {
        policy.cashValue += policy.annualPremium * (life.premiumToCashValuePercent / 100)
      }
    },
    step: () => {
      if (policy.isActive) {
        policy.cashValue += policy.cashValue * (policy.cashValueGrowthRate / 100)
      }
    },
  }
  policy.payout = createPayout(model, policy)
  model.registries.lifeInsurancePolicies.register(owner, policy)
  model.addEntity(policy)
  return policy
}
