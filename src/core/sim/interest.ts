// Rates are percents; both helpers return the interest earned, not the new balance.

export const compoundInterest = (
  principal: number,
  annualRate: number,
  compoundsPerPeriod = 1,
  periodsElapsed = 1,
) => {
  const rate = annualRate / 100
  const growthFactor = (1 + rate / compoundsPerPeriod) ** (compoundsPerPeriod * periodsElapsed)
  return principal * (growthFactor - 1)
}

export const continuousInterest = (principal: number, annualRate: number, periodsElapsed = 1) =>
  principal * (Math.exp((annualRate / 100) * periodsElapsed) - 1)
