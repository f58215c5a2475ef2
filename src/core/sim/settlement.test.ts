import { describe, expect, it } from 'vitest'
import { addSinglePerson, buildModel } from '../../test/scenarioFactory'
import { createFamily } from './entities/family'
import { createBankAccount } from './entities/bankAccount'
import { createRothIra } from './entities/ira'
import { createJob } from './entities/job'
import { createJob401k } from './entities/job401k'
import { createCarLoan } from './entities/loans'
import { createPerson, marry } from './entities/person'
import { findCheckpoint } from './explain'
import { createPersonUnit } from './funds'
import { settleTaxableUnit } from './settlement'
import { SimulationValidationError } from '../utils/errors'

describe('settleTaxableUnit', () => {
  it('pays spending from the bank when it covers everything', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 20000, spending: { base: 12000 } })

    model.step()

    expect(bank?.getBalance()).toBe(8000)
    expect(person.debt).toBe(0)
    expect(person.lastTaxes.total).toBe(0)
  })

  it('keeps every dollar of income accounted for after spending and taxes', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 20000, spending: { base: 12000 } })
    createJob(model, person, { company: 'Acme', salary: { base: 50000 } })

    model.step()

    // Payroll taxes alone are 7.65% of the salary.
    expect(person.lastTaxes.total).toBeGreaterThan(3825)
    expect(bank?.getBalance()).toBeCloseTo(20000 + 50000 - 12000 - person.lastTaxes.total, 6)
    expect(person.debt).toBe(0)
  })

  it('turns a shortfall into debt when there is nothing to withdraw', () => {
    const model = buildModel({ explain: true })
    const { person, bank } = addSinglePerson(model, { bankBalance: 20000, spending: { base: 30000 } })

    model.step()

    expect(bank?.getBalance()).toBe(0)
    expect(person.debt).toBe(10000)
    const [settlement] = model.settlements
    expect(settlement?.unitId).toBe(person.id)
    const checkpoints = settlement?.checkpoints ?? []
    expect(findCheckpoint(checkpoints, 'Shortfall')).toBe(10000)
    expect(findCheckpoint(checkpoints, 'Marginal tax')).toBeCloseTo(765, 6)
    expect(findCheckpoint(checkpoints, 'Tax buffer')).toBeCloseTo(283.05, 6)
    expect(findCheckpoint(checkpoints, 'Pretax withdrawal requested')).toBeCloseTo(11048.05, 6)
    expect(findCheckpoint(checkpoints, 'Pretax withdrawn')).toBe(0)
    expect(findCheckpoint(checkpoints, 'Unpaid')).toBe(10000)
  })

  it('grosses up a pretax withdrawal for the taxes it causes', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, {
      age: 45,
      bankBalance: 10000,
      spending: { base: 15000 },
    })
    const job = createJob(model, person, { company: 'Acme', salary: { base: 0 } })
    const account = createJob401k(model, job, { pretaxBalance: 100000 })

    model.step()

    expect(account.pretaxBalance).toBeCloseTo(94475.975, 6)
    expect(person.lastTaxes.socialSecurity).toBeCloseTo(342.48955, 6)
    expect(person.lastTaxes.medicare).toBeCloseTo(80.0983625, 6)
    expect(person.lastTaxes.federal).toBe(0)
    expect(bank?.getBalance()).toBeCloseTo(101.4370875, 6)
    expect(person.debt).toBe(0)
  })

  it('pays bills from roth balances after the bank runs dry', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { bankBalance: 1000, spending: { base: 3000 } })
    const roth = createRothIra(model, person, { balance: 5000, averageGrowth: 0 })

    model.step()

    expect(bank?.getBalance()).toBe(0)
    expect(roth.balance).toBe(3000)
    expect(person.debt).toBe(0)
  })

  it('settles a married family jointly and keeps its debt on the first member', () => {
    const model = buildModel()
    const family = createFamily(model)
    const alex = createPerson(model, {
      family,
      name: 'Alex',
      age: 40,
      retirementAge: 65,
      spending: { base: 3000 },
    })
    createBankAccount(model, alex, { company: 'Test Bank', balance: 1000 })
    const sam = createPerson(model, {
      family,
      name: 'Sam',
      age: 38,
      retirementAge: 65,
      debt: 500,
    })
    const samBank = createBankAccount(model, sam, { company: 'Test Bank', balance: 1000 })
    marry(model, alex, sam)

    model.step()

    expect(samBank.getBalance()).toBe(0)
    expect(alex.debt).toBe(1500)
    expect(sam.debt).toBe(0)
    expect(family.stats.debt).toBe(1500)
    expect(model.eventLog.entries[0]?.message).toBe('Alex and Sam got married at age 40 and 38')
  })

  it("pays a dependent's bills once, through the joint settlement", () => {
    const model = buildModel()
    const family = createFamily(model)
    const alex = createPerson(model, { family, name: 'Alex', age: 40, retirementAge: 65 })
    const alexBank = createBankAccount(model, alex, { company: 'Test Bank', balance: 20000 })
    const sam = createPerson(model, { family, name: 'Sam', age: 38, retirementAge: 65 })
    createBankAccount(model, sam, { company: 'Test Bank', balance: 0 })
    marry(model, alex, sam)
    const kid = createPerson(model, {
      family,
      name: 'Robin',
      age: 16,
      retirementAge: 65,
      spending: { base: 1000 },
    })
    const kidBank = createBankAccount(model, kid, { company: 'Test Bank', balance: 5000 })
    const loan = createCarLoan(model, kid, {
      name: 'Hatchback',
      loanAmount: 10000,
      interestRate: 0,
      lengthYears: 5,
    })

    model.step()

    expect(loan.principal).toBeCloseTo(8000, 6)
    expect(alexBank.getBalance()).toBeCloseTo(17000, 6)
    expect(kidBank.getBalance()).toBe(5000)
    expect(kid.filingStatus).toBe('single')
    expect(kid.debt).toBe(0)
  })

  it('rejects negative obligations', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)

    expect(() => settleTaxableUnit(createPersonUnit(model, person), -1, model.config)).toThrow(
      SimulationValidationError,
    )
  })

  it('refuses to settle a married person on their own', () => {
    const model = buildModel()
    const { person } = addSinglePerson(model)
    person.filingStatus = 'married_filing_jointly'

    expect(() => createPersonUnit(model, person)).toThrow(SimulationValidationError)
  })
})
