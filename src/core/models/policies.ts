import { z } from 'zod'
import { byFilingStatus, moneySchema, percentSchema } from './common'

export const taxBracketSchema = z
  .object({
    start: z.number().min(0),
    end: z.number().nullable(),
    rate: percentSchema,
  })
  .refine((bracket) => bracket.end === null || bracket.end >= bracket.start, {
    message: 'Bracket end must not be below its start.',
    path: ['end'],
  })

export const federalTaxPolicySchema = z.object({
  standardDeduction: byFilingStatus(moneySchema),
  taxBrackets: byFilingStatus(z.array(taxBracketSchema).min(1)),
})

export const ficaPolicySchema = z.object({
  socialSecurityRate: percentSchema,
  socialSecurityMaxIncome: moneySchema,
  medicareRate: percentSchema,
  medicareAdditionalRate: percentSchema,
  medicareAdditionalRateThreshold: byFilingStatus(moneySchema),
})

export const rmdTableSchema = z.object({
  age: z.number().int(),
  divisor: z.number().positive(),
})

export type TaxBracket = z.infer<typeof taxBracketSchema>
export type FederalTaxPolicy = z.infer<typeof federalTaxPolicySchema>
export type FicaPolicy = z.infer<typeof ficaPolicySchema>
export type RmdTableEntry = z.infer<typeof rmdTableSchema>
