import { z } from 'zod'

export const percentSchema = z.number().min(0).max(100)

export const moneySchema = z.number().min(0)

export const byFilingStatus = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({
    single: schema,
    married_filing_jointly: schema,
  })
