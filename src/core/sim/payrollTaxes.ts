import type { FilingStatus } from '../models/enums'
import type { FicaPolicy } from '../models/policies'

export const computePayrollTaxes = ({
  grossIncome,
  filingStatus,
  policy,
}: {
  grossIncome: number
  filingStatus: FilingStatus
  policy: FicaPolicy
}) => {
  const socialSecurityTaxable = Math.max(0, Math.min(grossIncome, policy.socialSecurityMaxIncome))
  const socialSecurityTax = socialSecurityTaxable * (policy.socialSecurityRate / 100)
  const medicareBaseTax = Math.max(0, grossIncome) * (policy.medicareRate / 100)
  const threshold = policy.medicareAdditionalRateThreshold[filingStatus]
  const additionalMedicare =
    grossIncome > threshold ? (grossIncome - threshold) * (policy.medicareAdditionalRate / 100) : 0
  const medicareTax = medicareBaseTax + additionalMedicare
  return {
    socialSecurityTax,
    medicareTax,
    totalPayrollTax: socialSecurityTax + medicareTax,
  }
}
