import type { FilingStatus } from '../../models'
import { assertNonNegative } from '../../utils/errors'
import { createExplainTracker } from '../explain'
import { createPersonUnit, getBankBalance } from '../funds'
import { settleTaxableUnit } from '../settlement'
import { getStandardDeduction, zeroTaxes, type TaxesDue } from '../tax'
import type { LifeModel, LifecycleEntity } from '../types'
import type { Family } from './family'

export type Spending = {
  base: number
  yearlyIncrease: number
  oneTimeExpenses: number
  addExpense: (amount: number) => void
  getYearlySpending: () => number
  adjustBase: (basePercent: number) => void
  advanceYear: () => void
}

export type SpendingOptions = {
  base?: number
  yearlyIncrease?: number
}

export type Person = LifecycleEntity & {
  kind: 'person'
  name: string
  age: number
  retirementAge: number
  filingStatus: FilingStatus
  taxableIncome: number
  earlyWithdrawalAmount: number
  debt: number
  spouse: Person | null
  family: Family
  spending: Spending
  lastTaxes: TaxesDue
  getItemizedDeductions: () => number
  getDeductions: () => number
  isRetired: () => boolean
  getYearAtAge: (age: number) => number
}

export type PersonOptions = {
  family: Family
  name: string
  age: number
  retirementAge: number
  spending?: SpendingOptions
  debt?: number
}

export const createSpending = ({ base = 0, yearlyIncrease = 0 }: SpendingOptions = {}): Spending => {
  const spending: Spending = {
    base,
    yearlyIncrease,
    oneTimeExpenses: 0,
    addExpense: (amount) => {
      assertNonNegative(amount, 'Expense')
      spending.oneTimeExpenses += amount
    },
    getYearlySpending: () => spending.base + spending.oneTimeExpenses,
    // 50 halves the base, 150 raises it by half.
    adjustBase: (basePercent) => {
      spending.base = spending.base * (basePercent / 100)
    },
    advanceYear: () => {
      spending.base += spending.base * (spending.yearlyIncrease / 100)
      spending.oneTimeExpenses = 0
    },
  }
  return spending
}

export type YearlyObligations = {
  spending: number
  homePayments: number
  mortgageInterest: number
  rent: number
  loanPayments: number
  donations: number
  total: number
}

/**
 * Gathers what the person owes this year and makes the scheduled home and loan payments those
 * amounts stand for. Call once per person per year.
 */
export const collectYearlyObligations = (model: LifeModel, person: Person): YearlyObligations => {
  const registries = model.registries
  const spending = person.spending.getYearlySpending()
  const homes = registries.homes.getItems(person)
  const homePayments = homes.reduce((sum, home) => sum + home.makeYearlyPayment(), 0)
  const mortgageInterest = homes.reduce(
    (sum, home) => sum + (home.mortgage?.interestPaidThisYear ?? 0),
    0,
  )
  const rent = registries.apartments
    .getItems(person)
    .reduce((sum, apartment) => sum + apartment.getYearlyRent(), 0)
  const loans = [
    ...registries.carLoans.getItems(person),
    ...registries.studentLoans.getItems(person),
    ...registries.creditCards.getItems(person),
  ]
  const loanPayments = loans.reduce((sum, loan) => sum + loan.makeScheduledPayment(), 0)
  const donations = registries.donations
    .getItems(person)
    .reduce((sum, donation) => sum + donation.getAmountDue(model.year), 0)

  person.stats.moneySpent = spending
  person.stats.homeExpensesPaid = homePayments
  person.stats.rentPaid = rent
  person.stats.interestPaid = mortgageInterest

  return {
    spending,
    homePayments,
    mortgageInterest,
    rent,
    loanPayments,
    donations,
    total: spending + homePayments + rent + loanPayments + donations,
  }
}

export const recordTaxStats = (entity: LifecycleEntity, taxes: TaxesDue) => {
  entity.stats.taxesPaid = taxes.total
  entity.stats.taxesPaidFederal = taxes.federal
  entity.stats.taxesPaidState = taxes.state
  entity.stats.taxesPaidSocialSecurity = taxes.socialSecurity
  entity.stats.taxesPaidMedicare = taxes.medicare
  entity.stats.taxesPaidPenalty = taxes.earlyWithdrawalPenalty
}

export const createPerson = (
  model: LifeModel,
  { family, name, age, retirementAge, spending, debt = 0 }: PersonOptions,
): Person => {
  assertNonNegative(debt, 'Debt')
  const federalRetirementAge = model.config.data.retirement.federalRetirementAge

  const person: Person = {
    id: model.nextId('person'),
    kind: 'person',
    stats: {},
    name,
    age,
    retirementAge,
    filingStatus: 'single',
    taxableIncome: 0,
    earlyWithdrawalAmount: 0,
    debt,
    spouse: null,
    family,
    spending: createSpending(spending),
    lastTaxes: zeroTaxes,
    getItemizedDeductions: () => {
      const donations = model.registries.donations
        .getItems(person)
        .reduce((sum, donation) => sum + donation.getTaxDeductionAmount(model.year), 0)
      const mortgageInterest = model.registries.homes
        .getItems(person)
        .reduce((sum, home) => sum + (home.mortgage?.interestPaidThisYear ?? 0), 0)
      const fundContributions = model.registries.donorAdvisedFunds
        .getItems(person)
        .reduce((sum, fund) => sum + fund.contributionsThisYear, 0)
      return donations + mortgageInterest + fundContributions
    },
    getDeductions: () =>
      Math.max(
        getStandardDeduction(model.config, person.filingStatus),
        person.getItemizedDeductions(),
      ),
    isRetired: () => person.age >= person.retirementAge,
    getYearAtAge: (targetAge) => model.year + (targetAge - person.age),
    preStep: () => {
      person.age += 1
    },
    step: () => {
      if (person.isRetired()) {
        model.registries.jobs
          .getItems(person)
          .filter((job) => !job.retired)
          .forEach((job) => job.retire())
      }

      // Everyone in a jointly filing family, dependents included, is settled by the family.
      if (person.family.getFilingStatus() === 'single') {
        const obligations = collectYearlyObligations(model, person)
        const explain = createExplainTracker(model.explainEnabled)
        const result = settleTaxableUnit(
          createPersonUnit(model, person),
          obligations.total,
          model.config,
          explain,
        )
        if (model.explainEnabled) {
          model.settlements.push({ year: model.year, unitId: person.id, ...explain.snapshot() })
        }
        person.lastTaxes = result.finalTaxes
        recordTaxStats(person, result.finalTaxes)
      } else {
        recordTaxStats(person, zeroTaxes)
      }

      if (person.age === Math.floor(federalRetirementAge)) {
        model.eventLog.add(`${person.name} reached retirement age (age ${federalRetirementAge})`)
      }
    },
    postStep: () => {
      person.taxableIncome = 0
      person.earlyWithdrawalAmount = 0
      person.spending.advanceYear()
      person.stats.bankBalance = getBankBalance(model, person)
    },
  }

  family.members.push(person)
  model.addEntity(person)
  return person
}

export const marry = (model: LifeModel, first: Person, second: Person) => {
  first.spouse = second
  second.spouse = first
  first.filingStatus = 'married_filing_jointly'
  second.filingStatus = 'married_filing_jointly'
  model.eventLog.add(
    `${first.name} and ${second.name} got married at age ${first.age} and ${second.age}`,
  )
}
