import { SimulationValidationError } from '../../utils/errors'
import { depositIntoBankAccount } from '../funds'
import { estimateAnnualBenefit, type EarningsRecord } from '../ssa'
import type { LifeModel, LifecycleEntity, PeriodicBenefit } from '../types'
import type { Person } from './person'

export type Pension = LifecycleEntity &
  PeriodicBenefit & {
    kind: 'pension'
    owner: Person
    company: string
    startAge: number
    vestingYears: number
    yearsOfService: number
    annualBenefit: number
    costOfLivingAdjustment: number
  }

export type PensionOptions = {
  company: string
  startAge: number
  annualBenefit: number
  vestingYears?: number
  yearsOfService?: number
  costOfLivingAdjustment?: number
}

export type SocialSecurity = LifecycleEntity &
  PeriodicBenefit & {
    kind: 'social_security'
    owner: Person
    startAge: number
    // Null until the benefit is fixed, either up front or at the first eligible year.
    annualBenefit: number | null
    costOfLivingAdjustment: number
    earnings: EarningsRecord[]
    addIncomeForYear: (year: number, amount: number) => void
  }

export type SocialSecurityOptions = {
  startAge: number
  annualBenefit?: number
  earnings?: EarningsRecord[]
  costOfLivingAdjustment?: number
}

export const createPension = (
  model: LifeModel,
  owner: Person,
  {
    company,
    startAge,
    annualBenefit,
    vestingYears = 0,
    yearsOfService = 0,
    costOfLivingAdjustment = 0,
  }: PensionOptions,
): Pension => {
  const pension: Pension = {
    id: model.nextId('pension'),
    kind: 'pension',
    stats: {},
    owner,
    company,
    startAge,
    vestingYears,
    yearsOfService,
    annualBenefit,
    costOfLivingAdjustment,
    getAnnualBenefit: () => pension.annualBenefit,
    isEligible: () => owner.age >= pension.startAge && pension.yearsOfService >= pension.vestingYears,
    preStep: () => {
      if (!pension.isEligible()) {
        pension.stats.grossIncome = 0
        return
      }
      const benefit = pension.getAnnualBenefit()
      depositIntoBankAccount(model, owner, benefit)
      owner.taxableIncome += benefit
      pension.stats.grossIncome = benefit
    },
    postStep: () => {
      if (pension.isEligible()) {
        pension.annualBenefit += pension.annualBenefit * (pension.costOfLivingAdjustment / 100)
      }
      // A year of service accrues for every year the owner still holds a job.
      if (model.registries.jobs.getItems(owner).some((job) => !job.retired)) {
        pension.yearsOfService += 1
      }
    },
  }
  model.registries.pensions.register(owner, pension)
  model.addEntity(pension)
  return pension
}

export const createSocialSecurity = (
  model: LifeModel,
  owner: Person,
  { startAge, annualBenefit, earnings = [], costOfLivingAdjustment }: SocialSecurityOptions,
): SocialSecurity => {
  const benefits = model.config.data.benefits.socialSecurity
  if (startAge < benefits.earliestClaimAge) {
    throw new SimulationValidationError(
      `Social security cannot be claimed before age ${benefits.earliestClaimAge} (received ${startAge}).`,
    )
  }
  const maxEarnings = model.config.data.tax.fica.socialSecurityMaxIncome
  const benefit: SocialSecurity = {
    id: model.nextId('social-security'),
    kind: 'social_security',
    stats: {},
    owner,
    startAge,
    annualBenefit: annualBenefit ?? null,
    costOfLivingAdjustment: costOfLivingAdjustment ?? benefits.defaultCostOfLivingAdjustment,
    earnings: [],
    /** Covered earnings stop at the payroll tax wage base. */
    addIncomeForYear: (year, amount) => {
      const existing = benefit.earnings.find((record) => record.year === year)
      if (existing) {
        existing.amount = Math.min(existing.amount + amount, maxEarnings)
        return
      }
      benefit.earnings.push({ year, amount: Math.min(amount, maxEarnings) })
    },
    getAnnualBenefit: () =>
      benefit.annualBenefit ??
      estimateAnnualBenefit(
        benefit.earnings,
        { claimAge: benefit.startAge, indexYear: owner.getYearAtAge(benefits.indexingAge) },
        benefits,
      ),
    isEligible: () => owner.age >= benefit.startAge,
    preStep: () => {
      if (!benefit.isEligible()) {
        benefit.stats.grossIncome = 0
        return
      }
      const amount = benefit.getAnnualBenefit()
      benefit.annualBenefit = amount
      depositIntoBankAccount(model, owner, amount)
      owner.taxableIncome += amount * (benefits.taxablePercent / 100)
      benefit.stats.grossIncome = amount
    },
    postStep: () => {
      if (benefit.annualBenefit !== null) {
        benefit.annualBenefit += benefit.annualBenefit * (benefit.costOfLivingAdjustment / 100)
      }
    },
  }
  earnings.forEach((record) => benefit.addIncomeForYear(record.year, record.amount))
  model.registries.socialSecurity.register(owner, benefit)
  model.addEntity(benefit)
  return benefit
}
