import { describe, expect, it } from 'vitest'
import { addSinglePerson, buildModel } from '../../../test/scenarioFactory'
import { createInsurance } from './insurance'
import { createTermLifeInsurance, createWholeLifeInsurance } from './lifeInsurance'

describe('insurance', () => {
  it('pays the premium from the bank', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 5000 })
    const policy = createInsurance(model, person, {
      insuranceType: 'auto',
      company: 'Acme Mutual',
      annualPremium: 1200,
      coverageAmount: 20000,
    })

    policy.preStep?.()

    expect(bank?.getBalance()).toBe(3800)
    expect(policy.stats.moneySpent).toBe(1200)
    expect(policy.missedPayments).toBe(0)
  })

  it('tolerates one missed premium and lapses on the second', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 1000 })
    const policy = createInsurance(model, person, {
      insuranceType: 'auto',
      company: 'Acme Mutual',
      annualPremium: 1200,
      coverageAmount: 20000,
    })

    policy.preStep?.()
    expect(policy.isActive).toBe(true)
    expect(bank?.getBalance()).toBe(1000)

    policy.preStep?.()
    expect(policy.isActive).toBe(false)
    expect(model.eventLog.entries.map((entry) => entry.message)).toEqual([
      "Alex's auto insurance with Acme Mutual lapsed after 2 missed payments",
    ])
    expect(policy.fileClaim(5000)).toBe(0)
  })

  it('pays claims above the deductible up to the coverage', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model)
    const policy = createInsurance(model, person, {
      insuranceType: 'home',
      company: 'Acme Mutual',
      annualPremium: 0,
      coverageAmount: 2000,
      deductible: 500,
    })

    expect(policy.fileClaim(400)).toBe(0)
    expect(policy.fileClaim(3000)).toBe(2000)
    expect(bank?.getBalance()).toBe(2000)
    expect(() => policy.fileClaim(-1)).toThrow('Claim amount must not be negative')
  })
})

describe('life insurance', () => {
  it('expires a term policy after its term and then pays nothing', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const policy = createTermLifeInsurance(model, person, {
      beneficiary: person,
      coverageAmount: 500000,
      annualPremium: 0,
      termLength: 2,
    })

    policy.step?.()
    expect(policy.isActive).toBe(true)
    policy.step?.()

    expect(policy.isActive).toBe(false)
    expect(policy.payout()).toBe(0)
    expect(model.eventLog.entries.map((entry) => entry.message)).toEqual([
      'Term life insurance policy for Alex has expired after 2 years',
      'Policy for Alex is not active. No payout.',
    ])
  })

  it('builds cash value on a whole life policy and pays the beneficiary', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 5000 })
    const { bank: beneficiaryBank, person: beneficiary } = addSinglePerson(model, { name: 'Sam' })
    const policy = createWholeLifeInsurance(model, person, {
      beneficiary,
      coverageAmount: 100000,
      annualPremium: 1000,
    })

    policy.preStep?.()
    expect(policy.cashValue).toBeCloseTo(100, 6)
    policy.step?.()
    expect(policy.cashValue).toBeCloseTo(102, 6)

    expect(policy.withdrawCashValue(50)).toBe(50)
    expect(policy.cashValue).toBeCloseTo(52, 6)
    expect(policy.coverageAmount).toBe(99950)
    expect(bank?.getBalance()).toBe(4050)

    expect(policy.payout()).toBe(99950)
    expect(beneficiaryBank?.getBalance()).toBe(99950)
    expect(policy.isActive).toBe(false)
    expect(model.eventLog.entries.map((entry) => entry.message)).toEqual([
      'Alex withdrew $50.00 from whole life policy. New cash value: $52.00. New coverage: $99,950.00',
      'Life insurance policy for Alex paid out $99,950.00 to Sam',
    ])
  })
})
