import type { AmortizingLoan, LifeModel, LifecycleEntity } from '../types'
import { createAmortizingLoan, type LoanOptions } from './loans'
import type { Person } from './person'

export type Mortgage = AmortizingLoan & { startYear: number }

export type MortgageOptions = Omit<LoanOptions, 'loanAmount'> & {
  loanAmount?: number
  startYear?: number
}

export type HomeExpenses = {
  propertyTaxPercent: number
  homeInsurancePercent: number
  maintenanceAmount: number
  maintenanceIncrease: number
  improvementAmount: number
  improvementIncrease: number
  hoaAmount: number
  hoaIncrease: number
}

export type Home = LifecycleEntity & {
  kind: 'home'
  owner: Person
  name: string
  purchasePrice: number
  valueYearlyIncrease: number
  downPayment: number
  homeValue: number
  mortgage: Mortgage | null
  expenses: HomeExpenses
  getYearlyExpenses: () => number
  getYearlyExpensesDue: () => number
  makeYearlyPayment: (yearlyPayment?: number, extraToPrincipal?: number) => number
}

export type HomeOptions = {
  name: string
  purchasePrice: number
  valueYearlyIncrease?: number
  downPayment?: number
  mortgage?: MortgageOptions
  expenses?: Partial<HomeExpenses>
}

export type Apartment = LifecycleEntity & {
  kind: 'apartment'
  owner: Person
  name: string
  monthlyRent: number
  yearlyIncrease: number
  getYearlyRent: () => number
}

export type ApartmentOptions = {
  name?: string
  monthlyRent: number
  yearlyIncrease?: number
}

const growBy = (amount: number, percent: number) => amount + amount * (percent / 100)

export const createHome = (
  model: LifeModel,
  owner: Person,
  {
    name,
    purchasePrice,
    valueYearlyIncrease = 0,
    downPayment = 0,
    mortgage: mortgageOptions,
    expenses = {},
  }: HomeOptions,
): Home => {
  const mortgage: Mortgage | null = mortgageOptions
    ? Object.assign(
        createAmortizingLoan({
          ...mortgageOptions,
          loanAmount: mortgageOptions.loanAmount ?? Math.max(purchasePrice - downPayment, 0),
        }),
        { startYear: mortgageOptions.startYear ?? model.year },
      )
    : null

  const home: Home = {
    id: model.nextId('home'),
    kind: 'home',
    stats: {},
    owner,
    name,
    purchasePrice,
    valueYearlyIncrease,
    downPayment,
    homeValue: purchasePrice,
    mortgage,
    expenses: {
      propertyTaxPercent: 0,
      homeInsurancePercent: 0,
      maintenanceAmount: 0,
      maintenanceIncrease: 0,
      improvementAmount: 0,
      improvementIncrease: 0,
      hoaAmount: 0,
      hoaIncrease: 0,
      ...expenses,
    },
    getYearlyExpenses: () => {
      const { expenses: e } = home
      return (
        home.homeValue * (e.propertyTaxPercent / 100) +
        home.homeValue * (e.homeInsurancePercent / 100) +
        e.maintenanceAmount +
        e.improvementAmount +
        e.hoaAmount
      )
    },
    getYearlyExpensesDue: () =>
      home.getYearlyExpenses() + (home.mortgage ? home.mortgage.getAnnualPayment() : 0),
    // Whatever the payment leaves after expenses goes to the mortgage.
    makeYearlyPayment: (yearlyPayment, extraToPrincipal = 0) => {
      const payment = yearlyPayment ?? home.getYearlyExpensesDue()
      if (!home.mortgage) {
        return payment
      }
      home.mortgage.makePayment(Math.max(payment - home.getYearlyExpenses(), 0), extraToPrincipal)
      return payment + extraToPrincipal
    },
    postStep: () => {
      home.homeValue = growBy(home.homeValue, home.valueYearlyIncrease)
      const { expenses: e } = home
      e.maintenanceAmount = growBy(e.maintenanceAmount, e.maintenanceIncrease)
      e.improvementAmount = growBy(e.improvementAmount, e.improvementIncrease)
      e.hoaAmount = growBy(e.hoaAmount, e.hoaIncrease)
      if (home.mortgage) {
        home.mortgage.interestPaidThisYear = 0
      }
    },
  }

  model.registries.homes.register(owner, home)
  model.addEntity(home)
  return home
}

export const createApartment = (
  model: LifeModel,
  owner: Person,
  { name = 'Apartment', monthlyRent, yearlyIncrease }: ApartmentOptions,
): Apartment => {
  const apartment: Apartment = {
    id: model.nextId('apartment'),
    kind: 'apartment',
    stats: {},
    owner,
    name,
    monthlyRent,
    yearlyIncrease: yearlyIncrease ?? model.config.data.housing.apartment.defaultRentIncrease,
    getYearlyRent: () => apartment.monthlyRent * 12,
    postStep: () => {
      apartment.monthlyRent = growBy(apartment.monthlyRent, apartment.yearlyIncrease)
    },
  }
  model.registries.apartments.register(owner, apartment)
  model.addEntity(apartment)
  return apartment
}
