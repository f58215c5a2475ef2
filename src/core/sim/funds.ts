import { ModelSetupError, SimulationValidationError } from '../utils/errors'
import type { Family } from './entities/family'
import type { Person } from './entities/person'
import type { TaxableUnit } from './settlement'
import type { LifeModel } from './types'

// Each deduct helper drains its sources in registration order and returns what it could not cover.

export const getBankBalance = (model: LifeModel, person: Person) =>
  model.registries.bankAccounts
    .getItems(person)
    .reduce((sum, account) => sum + account.getBalance(), 0)

export const deductFromBankAccounts = (model: LifeModel, person: Person, amount: number) => {
  let remaining = amount
  for (const account of model.registries.bankAccounts.getItems(person)) {
    if (remaining <= 0) {
      break
    }
    remaining -= account.withdraw(remaining)
  }
  return remaining
}

export const deductFromPretaxSources = (model: LifeModel, person: Person, amount: number) => {
  let remaining = amount
  for (const source of model.registries.retirementSources.getItems(person)) {
    if (remaining <= 0) {
      break
    }
    remaining -= source.deductPretax(remaining)
  }
  return remaining
}

export const deductFromRothSources = (model: LifeModel, person: Person, amount: number) => {
  let remaining = amount
  for (const source of model.registries.retirementSources.getItems(person)) {
    if (remaining <= 0) {
      break
    }
    remaining -= source.deductRoth(remaining)
  }
  return remaining
}

export const depositIntoBankAccount = (model: LifeModel, person: Person, amount: number) => {
  const primary = model.registries.bankAccounts.getItems(person)[0]
  if (!primary) {
    throw new ModelSetupError(
      `${person.name} has no bank account. Create a bank account before making deposits.`,
    )
  }
  primary.deposit(amount)
}

/** Moves money out of pretax retirement into the primary bank account; the draw is taxable income. */
export const withdrawFromPretaxRetirement = (model: LifeModel, person: Person, amount: number) => {
  if (amount <= 0) {
    return 0
  }
  const withdrawn = amount - deductFromPretaxSources(model, person, amount)
  if (withdrawn > 0) {
    person.taxableIncome += withdrawn
    depositIntoBankAccount(model, person, withdrawn)
  }
  return withdrawn
}

export const payBills = (model: LifeModel, members: readonly Person[], amount: number) => {
  let remaining = amount
  for (const member of members) {
    if (remaining <= 0) {
      return 0
    }
    remaining = deductFromBankAccounts(model, member, remaining)
  }
  for (const member of members) {
    if (remaining <= 0) {
      return 0
    }
    remaining = deductFromRothSources(model, member, remaining)
  }
  return Math.max(remaining, 0)
}

export const createPersonUnit = (model: LifeModel, person: Person): TaxableUnit => {
  if (person.filingStatus !== 'single') {
    throw new SimulationValidationError(
      `Unsupported filing status for individual settlement: ${person.filingStatus}`,
    )
  }
  return {
    id: person.id,
    filingStatus: person.filingStatus,
    getTaxableIncome: () => person.taxableIncome,
    getEarlyWithdrawalAmount: () => person.earlyWithdrawalAmount,
    getDeductions: () => person.getDeductions(),
    getBankBalance: () => getBankBalance(model, person),
    getDebt: () => person.debt,
    setDebt: (amount) => {
      person.debt = amount
    },
    withdrawFromPretaxRetirement: (amount) => withdrawFromPretaxRetirement(model, person, amount),
    payBills: (amount) => payBills(model, [person], amount),
  }
}

export const createFamilyUnit = (model: LifeModel, family: Family): TaxableUnit => {
  const filingStatus = family.getFilingStatus()
  if (filingStatus !== 'married_filing_jointly') {
    throw new SimulationValidationError(
      `Unsupported filing status for family settlement: ${filingStatus}`,
    )
  }
  const members = family.members
  return {
    id: family.id,
    filingStatus,
    getTaxableIncome: () => members.reduce((sum, member) => sum + member.taxableIncome, 0),
    getEarlyWithdrawalAmount: () =>
      members.reduce((sum, member) => sum + member.earlyWithdrawalAmount, 0),
    getDeductions: () => family.getDeductions(),
    getBankBalance: () => members.reduce((sum, member) => sum + getBankBalance(model, member), 0),
    getDebt: () => family.getDebt(),
    setDebt: (amount) => {
      // The first member carries the family's debt.
      members.forEach((member, index) => {
        member.debt = index === 0 ? amount : 0
      })
    },
    withdrawFromPretaxRetirement: (amount) => {
      let remaining = amount
      for (const member of members) {
        if (remaining <= 0) {
          break
        }
        remaining -= withdrawFromPretaxRetirement(model, member, remaining)
      }
      return amount - remaining
    },
    payBills: (amount) => payBills(model, members, amount),
  }
}
