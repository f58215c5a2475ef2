import type { StudentLoanType } from '../../models'
import { SimulationValidationError, assertNonNegative } from '../../utils/errors'
import type { AmortizingLoan, LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type LoanOptions = {
  loanAmount: number
  interestRate: number
  lengthYears: number
  principal?: number
  monthlyPayment?: number
}

/**
 * Standard amortizing loan paid once a year. Interest for the year accrues on the current
 * principal; any part of it a payment leaves unpaid is capitalized.
 */
export const createAmortizingLoan = ({
  loanAmount,
  interestRate,
  lengthYears,
  principal,
  monthlyPayment,
}: LoanOptions): AmortizingLoan => {
  const loan: AmortizingLoan = {
    loanAmount,
    principal: principal ?? loanAmount,
    interestRate,
    lengthYears,
    monthlyPayment: 0,
    totalInterestPaid: 0,
    interestPaidThisYear: 0,
    calculateMonthlyPayment: () => {
      const months = loan.lengthYears * 12
      if (months <= 0) {
        return 0
      }
      const monthlyRate = loan.interestRate / 100 / 12
      if (monthlyRate === 0) {
        return loan.principal / months
      }
      const factor = Math.pow(1 + monthlyRate, months)
      return (loan.principal * monthlyRate * factor) / (factor - 1)
    },
    getInterestForYear: () => loan.principal * (loan.interestRate / 100),
    getAnnualPayment: () => {
      if (loan.isPaidOff()) {
        return 0
      }
      return Math.min(loan.monthlyPayment * 12, loan.principal + loan.getInterestForYear())
    },
    makePayment: (paymentAmount, extraToPrincipal = 0) => {
      if (paymentAmount < 0 || extraToPrincipal < 0) {
        throw new SimulationValidationError(
          `Loan payments must be non-negative (payment ${paymentAmount}, extra ${extraToPrincipal}).`,
        )
      }
      const interest = loan.getInterestForYear()
      const interestFromPayment = Math.min(paymentAmount, interest)
      const interestFromExtra = Math.min(extraToPrincipal, interest - interestFromPayment)
      const interestPaid = interestFromPayment + interestFromExtra
      loan.principal += interest - interestPaid

      const towardPrincipal =
        paymentAmount - interestFromPayment + (extraToPrincipal - interestFromExtra)
      const principalPaid = Math.min(towardPrincipal, loan.principal)
      loan.principal -= principalPaid

      loan.totalInterestPaid += interestPaid
      loan.interestPaidThisYear += interestPaid
      return interestPaid + principalPaid
    },
    isPaidOff: () => loan.principal <= 0,
  }
  loan.monthlyPayment = monthlyPayment ?? loan.calculateMonthlyPayment()
  return loan
}

type ScheduledLoan = LifecycleEntity &
  AmortizingLoan & {
    owner: Person
    makeScheduledPayment: () => number
  }

export type CarLoan = ScheduledLoan & {
  kind: 'car_loan'
  name: string
}

export type StudentLoan = ScheduledLoan & {
  kind: 'student_loan'
  studentLoanType: StudentLoanType
  schoolName: string
}

export type CreditCard = ScheduledLoan & {
  kind: 'credit_card'
  cardName: string
  creditLimit: number
  minimumPaymentPercent: number
  getAvailableCredit: () => number
  charge: (amount: number) => boolean
  getMinimumPayment: () => number
}

export type CarLoanOptions = LoanOptions & { name: string }

export type StudentLoanOptions = LoanOptions & {
  studentLoanType: StudentLoanType
  schoolName?: string
}

export type CreditCardOptions = {
  cardName: string
  creditLimit: number
  balance?: number
  interestRate?: number
  minimumPaymentPercent?: number
}

// The owner pays the scheduled amount as part of the year's obligations.
const withSchedule = (
  model: LifeModel,
  owner: Person,
  kind: ScheduledLoan['kind'],
  prefix: string,
  loan: AmortizingLoan,
) => {
  const scheduled: ScheduledLoan = Object.assign(loan, {
    id: model.nextId(prefix),
    kind,
    stats: {},
    owner,
    makeScheduledPayment: () => {
      const paid = scheduled.makePayment(scheduled.getAnnualPayment())
      scheduled.stats.interestPaid = scheduled.interestPaidThisYear
      return paid
    },
    preStep: () => {
      scheduled.stats.interestPaid = 0
    },
    postStep: () => {
      scheduled.interestPaidThisYear = 0
    },
  })
  return scheduled
}

export const createCarLoan = (
  model: LifeModel,
  owner: Person,
  { name, ...options }: CarLoanOptions,
): CarLoan => {
  const loan: CarLoan = Object.assign(
    withSchedule(model, owner, 'car_loan', 'car-loan', createAmortizingLoan(options)),
    { kind: 'car_loan' as const, name },
  )
  model.registries.carLoans.register(owner, loan)
  model.addEntity(loan)
  return loan
}

export const createStudentLoan = (
  model: LifeModel,
  owner: Person,
  { studentLoanType, schoolName = '', ...options }: StudentLoanOptions,
): StudentLoan => {
  const loan: StudentLoan = Object.assign(
    withSchedule(model, owner, 'student_loan', 'student-loan', createAmortizingLoan(options)),
    { kind: 'student_loan' as const, studentLoanType, schoolName },
  )
  model.registries.studentLoans.register(owner, loan)
  model.addEntity(loan)
  return loan
}

export const createCreditCard = (
  model: LifeModel,
  owner: Person,
  { cardName, creditLimit, balance = 0, interestRate, minimumPaymentPercent }: CreditCardOptions,
): CreditCard => {
  const defaults = model.config.data.debt.creditCard
  const base = withSchedule(
    model,
    owner,
    'credit_card',
    'credit-card',
    createAmortizingLoan({
      loanAmount: balance,
      interestRate: interestRate ?? defaults.defaultInterestRate,
      lengthYears: 0,
    }),
  )
  const card: CreditCard = Object.assign(base, {
    kind: 'credit_card' as const,
    cardName,
    creditLimit,
    minimumPaymentPercent: minimumPaymentPercent ?? defaults.defaultMinimumPaymentPercent,
    getAvailableCredit: () => Math.max(card.creditLimit - card.principal, 0),
    charge: (amount: number) => {
      assertNonNegative(amount, 'Credit card charge')
      if (amount > card.getAvailableCredit()) {
        return false
      }
      card.principal += amount
      return true
    },
    /** Monthly minimum on the current balance. */
    getMinimumPayment: () => {
      if (card.isPaidOff()) {
        return 0
      }
      return Math.max(
        defaults.minimumMonthlyPayment,
        card.principal * (card.minimumPaymentPercent / 100),
      )
    },
    getAnnualPayment: () => {
      if (card.isPaidOff()) {
        return 0
      }
      return Math.min(card.getMinimumPayment() * 12, card.principal + card.getInterestForYear())
    },
  })
  model.registries.creditCards.register(owner, card)
  model.addEntity(card)
  return card
}
