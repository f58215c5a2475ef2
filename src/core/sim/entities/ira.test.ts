import { describe, expect, it } from 'vitest'
import { addSinglePerson, buildModel } from '../../../test/scenarioFactory'
import { createRothIra, createTraditionalIra } from './ira'

describe('traditional IRA', () => {
  it('funds the yearly contribution from the bank up to the limit and deducts it', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 10000 })
    const ira = createTraditionalIra(model, person, { yearlyContribution: 8000, averageGrowth: 0 })
    person.taxableIncome = 50000

    ira.preStep?.()

    expect(ira.balance).toBe(6500)
    expect(bank?.getBalance()).toBe(3500)
    expect(person.taxableIncome).toBe(43500)
    expect(ira.stats.retirementContrib).toBe(6500)
  })

  it('treats an early withdrawal as taxable and penalized', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model)
    const ira = createTraditionalIra(model, person, { balance: 10000, averageGrowth: 0 })

    expect(ira.withdraw(3000)).toBe(3000)
    expect(ira.balance).toBe(7000)
    expect(person.taxableIncome).toBe(3000)
    expect(person.earlyWithdrawalAmount).toBe(3000)
    expect(bank?.getBalance()).toBe(3000)
  })

  it('takes the first required distribution with an event', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model, { age: 72 })
    const ira = createTraditionalIra(model, person, { balance: 25600, averageGrowth: 0 })

    ira.preStep?.()

    expect(ira.stats.requiredMinDistrib).toBeCloseTo(1000, 6)
    expect(person.taxableIncome).toBeCloseTo(1000, 6)
    expect(model.eventLog.entries[0]?.message).toBe(
      'Alex took first Required Minimum Distribution of $1000.00 from Traditional IRA',
    )
  })
})

describe('Roth IRA', () => {
  it('draws contributions before earnings and penalizes only early earnings', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model)
    const roth = createRothIra(model, person, { balance: 5000, averageGrowth: 0 })

    expect(roth.deposit(2000)).toBe(true)
    expect(roth.totalContributions).toBe(2000)

    expect(roth.withdraw(3000)).toBe(3000)
    expect(roth.totalContributions).toBe(0)
    expect(roth.balance).toBe(4000)
    expect(person.earlyWithdrawalAmount).toBe(1000)
    expect(person.taxableIncome).toBe(0)
    expect(bank?.getBalance()).toBe(3000)
  })

  it('refuses negative deposits and never exposes a pretax balance', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    const roth = createRothIra(model, person, { balance: 5000, averageGrowth: 0 })

    expect(roth.deposit(-1)).toBe(false)
    expect(roth.getPretaxBalance()).toBe(0)
    expect(roth.deductPretax(100)).toBe(0)
    expect(roth.getRothBalance()).toBe(5000)
  })
})
