import { z } from 'zod'

export const filingStatusSchema = z.enum(['single', 'married_filing_jointly'])

export const hsaTypeSchema = z.enum(['individual', 'family'])

export const insuranceTypeSchema = z.enum(['auto', 'home', 'health', 'disability', 'umbrella'])

export const studentLoanTypeSchema = z.enum([
  'federal_subsidized',
  'federal_unsubsidized',
  'private',
  'plus',
])

export const annuityTypeSchema = z.enum(['fixed', 'variable', 'immediate', 'deferred'])

export const donationTypeSchema = z.enum(['cash', 'stock', 'property', 'other'])

export type FilingStatus = z.infer<typeof filingStatusSchema>
export type HsaType = z.infer<typeof hsaTypeSchema>
export type InsuranceType = z.infer<typeof insuranceTypeSchema>
export type StudentLoanType = z.infer<typeof studentLoanTypeSchema>
export type AnnuityType = z.infer<typeof annuityTypeSchema>
export type DonationType = z.infer<typeof donationTypeSchema>
