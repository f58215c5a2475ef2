import type { FinancialConfigData } from '../models'

export type SocialSecurityPolicy = FinancialConfigData['benefits']['socialSecurity']

export type EarningsRecord = {
  year: number
  amount: number
}

/**
 * Average indexed monthly earnings: each year's earnings are indexed to `indexYear` by the wage
 * index growth, then the best `yearsOfEarnings` years are averaged over that many years of
 * months. Years after `indexYear` count at face value.
 */
export const computeAime = (
  earnings: readonly EarningsRecord[],
  indexYear: number,
  policy: SocialSecurityPolicy,
) => {
  const growth = policy.wageIndexGrowthPercent / 100
  const indexedAmounts = earnings
    .map((record) => record.amount * Math.pow(1 + growth, Math.max(indexYear - record.year, 0)))
    .sort((a, b) => b - a)
  const total = indexedAmounts
    .slice(0, policy.yearsOfEarnings)
    .reduce((sum, amount) => sum + amount, 0)
  return total / (policy.yearsOfEarnings * 12)
}

export const computePia = (aime: number, policy: SocialSecurityPolicy) => {
  const { first, second } = policy.bendPoints
  const [firstFactor, secondFactor, thirdFactor] = policy.piaFactors
  const firstPiece = Math.min(aime, first)
  const secondPiece = Math.min(Math.max(aime - first, 0), second - first)
  const thirdPiece = Math.max(aime - second, 0)
  return (
    (firstPiece * firstFactor + secondPiece * secondFactor + thirdPiece * thirdFactor) / 100
  )
}

/** Reduces the monthly benefit for claims before normal retirement age and credits later ones. */
export const adjustForClaimAge = (pia: number, claimAge: number, policy: SocialSecurityPolicy) => {
  const nraMonths = policy.normalRetirementAge * 12
  const claimAgeMonths = Math.min(Math.round(claimAge * 12), policy.maxDelayedCreditAge * 12)
  if (claimAgeMonths < nraMonths) {
    const monthsEarly = nraMonths - claimAgeMonths
    const firstSegment = Math.min(monthsEarly, 36)
    const remaining = Math.max(0, monthsEarly - 36)
    const reduction = firstSegment * (5 / 9 / 100) + remaining * (5 / 12 / 100)
    return pia * (1 - reduction)
  }
  const monthsDelayed = claimAgeMonths - nraMonths
  return pia * (1 + monthsDelayed * (policy.delayedCreditPercentPerYear / 100 / 12))
}

export const estimateAnnualBenefit = (
  earnings: readonly EarningsRecord[],
  { claimAge, indexYear }: { claimAge: number; indexYear: number },
  policy: SocialSecurityPolicy,
) => {
  const pia = computePia(computeAime(earnings, indexYear, policy), policy)
  return adjustForClaimAge(pia, claimAge, policy) * 12
}
