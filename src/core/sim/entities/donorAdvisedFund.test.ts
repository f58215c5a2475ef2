import { describe, expect, it } from 'vitest'
import { addSinglePerson, buildModel } from '../../../test/scenarioFactory'
import { createDonorAdvisedFund } from './donorAdvisedFund'

describe('donor advised fund', () => {
  it('moves contributions out of the bank, limited to what the bank holds', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 15000 })
    const fund = createDonorAdvisedFund(model, person, { fundName: 'Giving fund' })

    expect(fund.contribute(10000)).toBe(10000)
    expect(fund.contribute(10000)).toBe(5000)
    expect(fund.balance).toBe(15000)
    expect(fund.totalContributions).toBe(15000)
    expect(bank?.getBalance()).toBe(0)
  })

  it('grows, pays its fee and grants a share of the balance each year', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const fund = createDonorAdvisedFund(model, person, {
      fundName: 'Giving fund',
      balance: 100000,
      growthRate: 7,
      managementFeePercent: 0.6,
      distributionRatePercent: 5,
    })

    fund.step?.()

    expect(fund.growthHistory).toEqual([7000])
    expect(fund.managementFeesPaid).toBeCloseTo(642)
    expect(fund.totalDonated).toBeCloseTo(5317.9)
    expect(fund.balance).toBeCloseTo(101040.1)
  })

  it('makes contributions deductible in the year they are made only', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model, { bankBalance: 30000 })
    const fund = createDonorAdvisedFund(model, person, {
      fundName: 'Giving fund',
      yearlyContribution: 20000,
      distributionRatePercent: 0,
    })

    fund.preStep?.()

    expect(person.getItemizedDeductions()).toBe(20000)
    expect(person.getDeductions()).toBe(20000)

    fund.postStep?.()

    expect(fund.distributeToCharity(5000)).toBe(5000)
    expect(person.getItemizedDeductions()).toBe(0)
    expect(person.getDeductions()).toBe(13850)
  })

  it('never grants more than the fund holds', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const fund = createDonorAdvisedFund(model, person, { fundName: 'Giving fund', balance: 300 })

    expect(fund.distributeToCharity(1000)).toBe(300)
    expect(fund.balance).toBe(0)
    expect(fund.totalDonated).toBe(300)
  })

  it('rejects negative contributions', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const fund = createDonorAdvisedFund(model, person, { fundName: 'Giving fund' })

    expect(() => fund.contribute(-1)).toThrow('Fund contribution must not be negative (received -1).')
  })
})
