import { describe, expect, it } from 'vitest'
import { addSinglePerson, buildModel } from '../../test/scenarioFactory'
import { collectStats, createLifeModel, summarizeStats } from './engine'
import { createJob } from './entities/job'
import { createJob401k } from './entities/job401k'
import { createLifeEvents } from './entities/lifeEvents'

const buildSpendingModel = () => {
  const model = buildModel({ endYear: 2031 })
  const parts = addSinglePerson(model, { bankBalance: 20000, spending: { base: 12000 } })
  return { model, ...parts }
}

describe('createLifeModel', () => {
  it('steps once per year through the end year and then finishes', () => {
    const { model } = buildSpendingModel()
    expect(model.status).toBe('idle')

    model.run()

    expect(model.status).toBe('finished')
    expect(model.simulatedYears).toEqual([2030, 2031])
    expect(model.year).toBe(2032)
  })

  it('snapshots statistics before each year runs', () => {
    const { model, person } = buildSpendingModel()

    model.run()

    const [first, second] = model.yearlyStats
    expect(first?.year).toBe(2030)
    expect(first?.bankBalance).toBe(0)
    expect(first?.moneySpent).toBe(0)
    expect(second?.year).toBe(2031)
    expect(second?.bankBalance).toBe(8000)
    expect(second?.moneySpent).toBe(12000)
    expect(second?.debt).toBe(0)
    expect(person.debt).toBe(4000)
    expect(collectStats(model.entities).debt).toBe(4000)
  })

  it('produces identical statistics for identical setups', () => {
    const first = buildSpendingModel().model
    const second = buildSpendingModel().model

    first.run()
    second.run()

    expect(first.yearlyStats).toEqual(second.yearlyStats)
    expect(first.eventLog.entries).toEqual(second.eventLog.entries)
  })

  it('runs preStep for every entity before any step', () => {
    const model = buildModel()
    const { person, bank } = addSinglePerson(model, { age: 74 })
    const job = createJob(model, person, { company: 'Acme', salary: { base: 0 } })
    const account = createJob401k(model, job, { pretaxBalance: 458000 })

    model.step()

    expect(person.age).toBe(75)
    expect(account.stats.requiredMinDistrib).toBeCloseTo(20000, 6)
    expect(person.lastTaxes.federal).toBe(615)
    expect(person.lastTaxes.state).toBeCloseTo(369, 6)
    expect(person.lastTaxes.socialSecurity).toBeCloseTo(1240, 6)
    expect(person.lastTaxes.medicare).toBeCloseTo(290, 6)
    expect(person.lastTaxes.total).toBeCloseTo(2514, 6)
    expect(bank?.getBalance()).toBeCloseTo(17486, 6)
    expect(job.retired).toBe(true)
    expect(model.eventLog.forYear(2030).map((entry) => entry.message)).toEqual([
      'Alex retired from Acme',
    ])
  })

  it('propagates a failing phase and keeps the statistics already collected', () => {
    const { model } = buildSpendingModel()
    createLifeEvents(model, [
      {
        year: 2031,
        name: 'Broken event',
        apply: () => {
          throw new Error('boom')
        },
      },
    ])

    expect(() => model.run()).toThrow('boom')
    expect(model.yearlyStats.map((record) => record.year)).toEqual([2030, 2031])
    expect(model.year).toBe(2031)
    expect(model.status).toBe('running')
  })

  it('hands out sequential ids', () => {
    const model = createLifeModel({ startYear: 2030, endYear: 2030 })

    expect(model.nextId('person')).toBe('person-1')
    expect(model.nextId('bank')).toBe('bank-2')
  })
})

describe('summarizeStats', () => {
  it('sums one column over a year range', () => {
    const { model } = buildSpendingModel()
    model.run()

    expect(summarizeStats(model.yearlyStats, 'moneySpent')).toBe(12000)
    expect(summarizeStats(model.yearlyStats, 'moneySpent', 2030, 2030)).toBe(0)
  })
})
