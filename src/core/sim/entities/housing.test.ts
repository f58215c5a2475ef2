import { describe, expect, it } from 'vitest'
import { defaultFinancialConfig } from '../../config/financialConfig'
import { addSinglePerson, buildModel } from '../../../test/scenarioFactory'
import { createDonation } from './donation'
import { createApartment, createHome } from './housing'

const setUpHome = () => {
  const model = buildModel()
  const { person } = addSinglePerson(model)
  const home = createHome(model, person, {
    name: 'Main Street',
    purchasePrice: 200000,
    valueYearlyIncrease: 3,
    downPayment: 100000,
    mortgage: { lengthYears: 30, interestRate: 5, monthlyPayment: 1000 },
    expenses: { propertyTaxPercent: 1, maintenanceAmount: 1000, maintenanceIncrease: 10 },
  })
  return { model, person, home }
}

describe('home', () => {
  it('finances the price less the down payment from the current year', () => {
    const { home } = setUpHome()

    expect(home.mortgage?.loanAmount).toBe(100000)
    expect(home.mortgage?.startYear).toBe(2030)
    expect(home.getYearlyExpenses()).toBe(3000)
    expect(home.getYearlyExpensesDue()).toBe(15000)
  })

  it('applies what is left after expenses to the mortgage, interest first', () => {
    const { home } = setUpHome()

    expect(home.makeYearlyPayment()).toBe(15000)

    expect(home.mortgage?.interestPaidThisYear).toBe(5000)
    expect(home.mortgage?.principal).toBe(93000)
  })

  it('lets mortgage interest and deductible donations replace the standard deduction', () => {
    const { model, person, home } = setUpHome()
    home.makeYearlyPayment()

    expect(person.getItemizedDeductions()).toBe(5000)
    expect(person.getDeductions()).toBe(13850)

    createDonation(model, person, { charityName: 'Food Bank', amount: 10000 })

    expect(person.getDeductions()).toBe(15000)
  })

  it('grows the value and running costs after the year', () => {
    const { home } = setUpHome()
    home.makeYearlyPayment()

    home.postStep?.()

    expect(home.homeValue).toBe(206000)
    expect(home.expenses.maintenanceAmount).toBe(1100)
    expect(home.mortgage?.interestPaidThisYear).toBe(0)
  })

  it('charges only the expenses on a home without a mortgage', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const home = createHome(model, person, {
      name: 'Cabin',
      purchasePrice: 100000,
      expenses: { hoaAmount: 600 },
    })

    expect(home.mortgage).toBeNull()
    expect(home.makeYearlyPayment()).toBe(600)
  })
})

describe('apartment', () => {
  it('charges twelve months of rent and raises it after the year', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const apartment = createApartment(model, person, { monthlyRent: 1000 })

    expect(apartment.getYearlyRent()).toBe(12000)

    apartment.postStep?.()

    expect(apartment.monthlyRent).toBe(1050)
    expect(apartment.name).toBe('Apartment')
  })

  it('takes the default rent increase from the configuration', () => {
    const config = defaultFinancialConfig.withOverrides({
      housing: { apartment: { defaultRentIncrease: 3 } },
    })
    const model = buildModel({ config })
    const { person } = addSinglePerson(model)
    const apartment = createApartment(model, person, { monthlyRent: 1000 })

    apartment.postStep?.()

    expect(apartment.yearlyIncrease).toBe(3)
    expect(apartment.monthlyRent).toBeCloseTo(1030, 6)
  })
})
