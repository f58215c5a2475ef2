import type { AnnuityType } from '../../models'
import { depositIntoBankAccount } from '../funds'
import type { Growable, LifeModel, LifecycleEntity, PeriodicBenefit } from '../types'
import type { Person } from './person'

export type Annuity = LifecycleEntity &
  Growable &
  PeriodicBenefit & {
    kind: 'annuity'
    owner: Person
    annuityType: AnnuityType
    balance: number
    payoutStartAge: number
    annualPayout: number
    surrenderChargePercent: number
    isActive: boolean
    surrender: () => number
  }

export type AnnuityOptions = {
  annuityType: AnnuityType
  balance: number
  interestRate: number
  payoutStartAge: number
  annualPayout: number
  surrenderChargePercent?: number
}

export const createAnnuity = (
  model: LifeModel,
  owner: Person,
  { annuityType, balance, interestRate, payoutStartAge, annualPayout, surrenderChargePercent }: AnnuityOptions,
): Annuity => {
  const annuity: Annuity = {
    id: model.nextId('annuity'),
    kind: 'annuity',
    stats: {},
    owner,
    annuityType,
    balance: Math.max(balance, 0),
    growthRate: interestRate,
    growthHistory: [],
    payoutStartAge,
    annualPayout,
    surrenderChargePercent:
      surrenderChargePercent ?? model.config.data.insurance.annuity.defaultSurrenderChargePercent,
    isActive: true,
    getBalance: () => annuity.balance,
    deposit: (amount) => {
      if (amount < 0 || !annuity.isActive) {
        return false
      }
      annuity.balance += amount
      return true
    },
    withdraw: (amount) => {
      const withdrawn = Math.min(Math.max(amount, 0), annuity.balance)
      annuity.balance -= withdrawn
      return withdrawn
    },
    calculateGrowth: () => annuity.balance * (annuity.growthRate / 100),
    applyGrowth: () => {
      const growth = annuity.calculateGrowth()
      annuity.balance += growth
      annuity.growthHistory.push(growth)
      return growth
    },
    getAnnualBenefit: () => Math.min(annuity.annualPayout, annuity.balance),
    isEligible: () => annuity.isActive && owner.age >= annuity.payoutStartAge,
    surrender: () => {
      if (!annuity.isActive) {
        return 0
      }
      const charge = annuity.balance * (annuity.surrenderChargePercent / 100)
      const proceeds = annuity.balance - charge
      annuity.balance = 0
      annuity.isActive = false
      if (proceeds > 0) {
        depositIntoBankAccount(model, owner, proceeds)
        owner.taxableIncome += proceeds
      }
      model.eventLog.add(
        `${owner.name} surrendered an annuity for $${proceeds.toFixed(2)} after a $${charge.toFixed(2)} charge`,
      )
      return proceeds
    },
    preStep: () => {
      annuity.stats.grossIncome = 0
      if (!annuity.isActive) {
        return
      }
      annuity.applyGrowth()
      if (annuity.isEligible()) {
        const payout = annuity.withdraw(annuity.getAnnualBenefit())
        if (payout > 0) {
          depositIntoBankAccount(model, owner, payout)
          owner.taxableIncome += payout
        }
        annuity.stats.grossIncome = payout
      }
    },
  }
  model.registries.annuities.register(owner, annuity)
  model.addEntity(annuity)
  return annuity
}
