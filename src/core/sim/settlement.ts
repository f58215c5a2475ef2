import type { FinancialConfig } from '../config/financialConfig'
import type { FilingStatus } from '../models'
import { assertNonNegative } from '../utils/errors'
import type { ExplainTracker } from './explain'
import { computeTaxesDue, getMaxTaxRate, type TaxesDue } from './tax'

/** A person filing single, or a family filing jointly: whoever owes one tax bill. */
export type TaxableUnit = {
  id: string
  filingStatus: FilingStatus
  getTaxableIncome: () => number
  getEarlyWithdrawalAmount: () => number
  getDeductions: () => number
  getBankBalance: () => number
  getDebt: () => number
  setDebt: (amount: number) => void
  withdrawFromPretaxRetirement: (amount: number) => number
  payBills: (amount: number) => number
}

export type SettlementResult = {
  obligations: number
  initialTaxes: TaxesDue
  totalObligations: number
  shortfall: number
  marginalTax: number
  taxBuffer: number
  requestedPretaxWithdrawal: number
  pretaxWithdrawn: number
  finalTaxes: TaxesDue
  unpaid: number
  debt: number
}

export const computeUnitTaxes = (
  unit: TaxableUnit,
  config: FinancialConfig,
  additionalIncome = 0,
) =>
  computeTaxesDue(
    {
      grossIncome: unit.getTaxableIncome() + additionalIncome,
      deductions: unit.getDeductions(),
      filingStatus: unit.filingStatus,
      earlyWithdrawalAmount: unit.getEarlyWithdrawalAmount(),
    },
    config,
  )

/**
 * Settles one year of obligations and taxes for a unit.
 *
 * Taxes depend on how much pretax money is drawn, and the draw depends on the taxes. The loop is
 * broken with one estimate: the shortfall is grossed up by the marginal tax it causes plus that
 * tax again at the top bracket rate. Taxes are then recomputed once on the actual draw.
 */
export const settleTaxableUnit = (
  unit: TaxableUnit,
  obligations: number,
  config: FinancialConfig,
  explain?: ExplainTracker,
): SettlementResult => {
  assertNonNegative(obligations, 'Annual obligations')

  const initialTaxes = computeUnitTaxes(unit, config)
  const bankBalance = unit.getBankBalance()
  const totalObligations = obligations + initialTaxes.total
  const shortfall = Math.max(0, totalObligations - bankBalance)
  explain?.addInput('Taxable income', unit.getTaxableIncome())
  explain?.addInput('Deductions', unit.getDeductions())
  explain?.addInput('Obligations', obligations)
  explain?.addInput('Bank balance', bankBalance)
  explain?.addCheckpoint('Initial taxes', initialTaxes.total)
  explain?.addCheckpoint('Shortfall', shortfall)

  let marginalTax = 0
  let taxBuffer = 0
  let requestedPretaxWithdrawal = 0
  let pretaxWithdrawn = 0
  let finalTaxes = initialTaxes
  if (shortfall > 0) {
    marginalTax = computeUnitTaxes(unit, config, shortfall).total - initialTaxes.total
    taxBuffer = marginalTax * (getMaxTaxRate(config, unit.filingStatus) / 100)
    requestedPretaxWithdrawal = shortfall + marginalTax + taxBuffer
    pretaxWithdrawn = unit.withdrawFromPretaxRetirement(requestedPretaxWithdrawal)
    if (pretaxWithdrawn > 0) {
      finalTaxes = computeUnitTaxes(unit, config)
    }
  }
  explain?.addCheckpoint('Marginal tax', marginalTax)
  explain?.addCheckpoint('Tax buffer', taxBuffer)
  explain?.addCheckpoint('Pretax withdrawal requested', requestedPretaxWithdrawal)
  explain?.addCheckpoint('Pretax withdrawn', pretaxWithdrawn)
  explain?.addCheckpoint('Final taxes', finalTaxes.total)

  const unpaid = unit.payBills(obligations + finalTaxes.total)
  unit.setDebt(unit.getDebt() + unpaid)
  unit.setDebt(unit.payBills(unit.getDebt()))
  const debt = unit.getDebt()
  explain?.addCheckpoint('Unpaid', unpaid)
  explain?.addCheckpoint('Debt', debt)

  return {
    obligations,
    initialTaxes,
    totalObligations,
    shortfall,
    marginalTax,
    taxBuffer,
    requestedPretaxWithdrawal,
    pretaxWithdrawn,
    finalTaxes,
    unpaid,
    debt,
  }
}
