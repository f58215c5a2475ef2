import { describe, expect, it } from 'vitest'
import { buildScenarioRequest } from '../../test/scenarioFactory'
import { scenarioRequestSchema } from './scenario'

describe('scenarioRequestSchema', () => {
  it('fills defaults for omitted collections and settings', () => {
    const parsed = scenarioRequestSchema.parse(buildScenarioRequest())
    const [family] = parsed.families
    const person = family?.people[0]

    expect(parsed.explain).toBe(false)
    expect(parsed.config).toEqual({})
    expect(family?.filingStatus).toBe('single')
    expect(person?.debt).toBe(0)
    expect(person?.jobs).toEqual([])
    expect(person?.donations).toEqual([])
    expect(person?.spending.yearlyIncrease).toBe(0)
  })

  it('rejects an end year before the start year', () => {
    const result = scenarioRequestSchema.safeParse(
      buildScenarioRequest({ startYear: 2030, endYear: 2029 }),
    )

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]?.path).toEqual(['endYear'])
  })

  it('requires exactly two people in a married family', () => {
    const request = buildScenarioRequest()
    const person = request.families[0]?.people[0]
    const people = person ? [person, { ...person, name: 'Sam' }] : []

    expect(
      scenarioRequestSchema.safeParse({
        ...request,
        families: [{ filingStatus: 'married_filing_jointly', people }],
      }).success,
    ).toBe(true)
    expect(
      scenarioRequestSchema.safeParse({
        ...request,
        families: [{ filingStatus: 'married_filing_jointly', people: people.slice(0, 1) }],
      }).success,
    ).toBe(false)
  })

  it('rejects a working person already past retirement age', () => {
    const result = scenarioRequestSchema.safeParse(
      buildScenarioRequest({
        families: [
          {
            people: [
              {
                name: 'Alex',
                age: 60,
                retirementAge: 55,
                spending: { base: 0 },
                jobs: [{ company: 'Acme', salary: { base: 1 } }],
              },
            ],
          },
        ],
      }),
    )

    expect(result.success).toBe(false)
    expect(result.error?.issues[0]?.message).toBe(
      'Retirement age must not be below current age for a working person.',
    )
  })
})
