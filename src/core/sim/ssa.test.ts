import { describe, expect, it } from 'vitest'
import { defaultFinancialConfig } from '../config/financialConfig'
import { adjustForClaimAge, computeAime, computePia, estimateAnnualBenefit } from './ssa'

const policy = {
  ...defaultFinancialConfig.data.benefits.socialSecurity,
  wageIndexGrowthPercent: 0,
}

const careerEarnings = (amount: number, years = 35) =>
  Array.from({ length: years }, (_, index) => ({ year: 1990 + index, amount }))

describe('computeAime', () => {
  it('averages the best years over the full earnings window', () => {
    const earnings = [...careerEarnings(84000), { year: 2025, amount: 10000 }]

    expect(computeAime(earnings, 2030, policy)).toBe(7000)
  })

  it('counts missing years as zero', () => {
    expect(computeAime([{ year: 2000, amount: 42000 }], 2030, policy)).toBe(100)
  })

  it('indexes earlier earnings to the indexing year', () => {
    const growing = { ...policy, wageIndexGrowthPercent: 10 }

    expect(computeAime([{ year: 2030, amount: 4200 }], 2032, growing)).toBeCloseTo(12.1, 6)
    expect(computeAime([{ year: 2034, amount: 4200 }], 2032, growing)).toBe(10)
  })
})

describe('computePia', () => {
  it('applies each factor to its band of earnings', () => {
    expect(computePia(100, policy)).toBeCloseTo(90, 6)
    expect(computePia(7000, policy)).toBeCloseTo(2920.92, 6)
    expect(computePia(8078, policy)).toBeCloseTo(1056.6 + 1889.28 + 150, 6)
  })
})

describe('adjustForClaimAge', () => {
  it('reduces early claims and credits delayed ones', () => {
    expect(adjustForClaimAge(1000, 67, policy)).toBe(1000)
    expect(adjustForClaimAge(1000, 62, policy)).toBeCloseTo(700, 6)
    expect(adjustForClaimAge(1000, 64, policy)).toBeCloseTo(800, 6)
    expect(adjustForClaimAge(1000, 70, policy)).toBeCloseTo(1240, 6)
  })

  it('stops crediting delay at the maximum credit age', () => {
    expect(adjustForClaimAge(1000, 72, policy)).toBeCloseTo(1240, 6)
  })
})

describe('estimateAnnualBenefit', () => {
  it('turns a career of earnings into a yearly benefit at the claiming age', () => {
    const earnings = careerEarnings(84000)

    expect(estimateAnnualBenefit(earnings, { claimAge: 67, indexYear: 2030 }, policy)).toBeCloseTo(
      35051.04,
      6,
    )
    expect(estimateAnnualBenefit(earnings, { claimAge: 62, indexYear: 2030 }, policy)).toBeCloseTo(
      24535.728,
      6,
    )
    expect(estimateAnnualBenefit(earnings, { claimAge: 70, indexYear: 2030 }, policy)).toBeCloseTo(
      43463.2896,
      6,
    )
  })
})
