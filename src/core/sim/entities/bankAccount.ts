import { compoundInterest } from '../interest'
import type { BalanceBearing, LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type BankAccount = LifecycleEntity &
  BalanceBearing & {
    kind: 'bank_account'
    owner: Person
    company: string
    type: string
    interestRate: number
    compoundRate: number
    totalInterest: number
    balanceHistory: number[]
  }

export type BankAccountOptions = {
  company: string
  type?: string
  balance?: number
  interestRate?: number
}

export const createBankAccount = (
  model: LifeModel,
  owner: Person,
  { company, type = 'Bank', balance = 0, interestRate }: BankAccountOptions,
): BankAccount => {
  let currentBalance = Math.max(balance, 0)
  const account: BankAccount = {
    id: model.nextId('bank'),
    kind: 'bank_account',
    stats: {},
    owner,
    company,
    type,
    interestRate: interestRate ?? model.config.data.accounts.bank.defaultInterestRate,
    compoundRate: model.config.data.accounts.bank.compoundRate,
    totalInterest: 0,
    balanceHistory: [],
    getBalance: () => currentBalance,
    deposit: (amount) => {
      if (amount < 0) {
        return false
      }
      currentBalance += amount
      return true
    },
    withdraw: (amount) => {
      const withdrawn = Math.min(Math.max(amount, 0), currentBalance)
      currentBalance -= withdrawn
      return withdrawn
    },
    step: () => {
      const interest = compoundInterest(currentBalance, account.interestRate, account.compoundRate)
      currentBalance += interest
      account.totalInterest += interest
      account.balanceHistory.push(currentBalance)
    },
    postStep: () => {
      account.stats.usableBalance = currentBalance
    },
  }
  model.registries.bankAccounts.register(owner, account)
  model.addEntity(account)
  return account
}
