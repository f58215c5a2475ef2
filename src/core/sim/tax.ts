import type { FinancialConfig } from '../config/financialConfig'
import type { FilingStatus } from '../models/enums'
import type { TaxBracket } from '../models/policies'
import { computePayrollTaxes } from './payrollTaxes'

export type TaxesDue = Readonly<{
  federal: number
  state: number
  socialSecurity: number
  medicare: number
  earlyWithdrawalPenalty: number
  total: number
}>

export type TaxInput = {
  grossIncome: number
  deductions: number
  filingStatus: FilingStatus
  earlyWithdrawalAmount?: number
}

export const zeroTaxes: TaxesDue = Object.freeze({
  federal: 0,
  state: 0,
  socialSecurity: 0,
  medicare: 0,
  earlyWithdrawalPenalty: 0,
  total: 0,
})

export const computeBracketTax = (income: number, brackets: TaxBracket[]) => {
  const tax = brackets.reduce((sum, bracket) => {
    const width = bracket.end === null ? Infinity : bracket.end - bracket.start
    const taxable = Math.min(Math.max(income - bracket.start, 0), width)
    return sum + taxable * (bracket.rate / 100)
  }, 0)
  return Math.round(tax)
}

export const getMaxTaxRate = (config: FinancialConfig, filingStatus: FilingStatus) =>
  config.getMaxTaxRate(filingStatus)

export const getStandardDeduction = (config: FinancialConfig, filingStatus: FilingStatus) =>
  config.getStandardDeduction(filingStatus)

export const computeTaxesDue = (
  { grossIncome, deductions, filingStatus, earlyWithdrawalAmount = 0 }: TaxInput,
  config: FinancialConfig,
): TaxesDue => {
  const agi = Math.max(grossIncome - deductions, 0)
  const federal = computeBracketTax(agi, config.getFederalTaxBrackets(filingStatus))
  const state = agi * (config.data.tax.state.taxRate / 100)
  const payroll = computePayrollTaxes({
    grossIncome,
    filingStatus,
    policy: config.data.tax.fica,
  })
  const earlyWithdrawalPenalty =
    Math.max(earlyWithdrawalAmount, 0) * (config.data.tax.earlyWithdrawalPenaltyRate / 100)
  return Object.freeze({
    federal,
    state,
    socialSecurity: payroll.socialSecurityTax,
    medicare: payroll.medicareTax,
    earlyWithdrawalPenalty,
    total: federal + state + payroll.totalPayrollTax + earlyWithdrawalPenalty,
  })
}
