import { z } from 'zod'
import { moneySchema, percentSchema } from './common'
import { federalTaxPolicySchema, ficaPolicySchema, rmdTableSchema } from './policies'

const contributionLimitSchema = z.object({
  base: moneySchema,
  catchUpAge: z.number().int().min(0),
  catchUpAmount: moneySchema,
})

export const financialConfigSchema = z
  .object({
    tax: z.object({
      federal: federalTaxPolicySchema,
      state: z.object({ taxRate: percentSchema }),
      fica: ficaPolicySchema,
      earlyWithdrawalPenaltyRate: percentSchema,
    }),
    retirement: z.object({
      federalRetirementAge: z.number().min(0),
      rmdStartAge: z.number().int().min(0),
      job401kContribLimit: contributionLimitSchema,
      ira: z.object({
        contributionLimit: moneySchema,
        catchUpAge: z.number().int().min(0),
        catchUpAmount: moneySchema,
        defaultGrowthRate: z.number(),
      }),
      rmdDistributionPeriods: z.array(rmdTableSchema).min(1),
    }),
    accounts: z.object({
      bank: z.object({
        defaultInterestRate: z.number().min(0),
        compoundRate: z.number().int().min(1),
      }),
      brokerage: z.object({ defaultGrowthRate: z.number() }),
      hsa: z.object({
        contributionLimit: moneySchema,
        familyContributionLimit: moneySchema,
        defaultEmployerContribution: moneySchema,
        qualifiedWithdrawalAge: z.number().min(0),
      }),
    }),
    insurance: z.object({
      defaultMaxMissedPayments: z.number().int().min(0),
      life: z.object({
        defaultCashValueGrowthRate: z.number().min(0),
        premiumToCashValuePercent: percentSchema,
      }),
      annuity: z.object({ defaultSurrenderChargePercent: percentSchema }),
    }),
    benefits: z.object({
      socialSecurity: z.object({
        taxablePercent: percentSchema,
        defaultCostOfLivingAdjustment: z.number(),
        earliestClaimAge: z.number().min(0),
        normalRetirementAge: z.number().min(0),
        maxDelayedCreditAge: z.number().min(0),
        delayedCreditPercentPerYear: z.number().min(0),
        yearsOfEarnings: z.number().int().min(1),
        indexingAge: z.number().int().min(0),
        wageIndexGrowthPercent: z.number(),
        bendPoints: z
          .object({ first: moneySchema, second: moneySchema })
          .refine((points) => points.second >= points.first, {
            message: 'Second bend point must not be below the first.',
            path: ['second'],
          }),
        piaFactors: z.tuple([percentSchema, percentSchema, percentSchema]),
      }),
    }),
    housing: z.object({
      apartment: z.object({ defaultRentIncrease: z.number() }),
    }),
    charity: z.object({
      donorAdvisedFund: z.object({
        defaultGrowthRate: z.number(),
        defaultManagementFeePercent: percentSchema,
        defaultDistributionRatePercent: percentSchema,
      }),
    }),
    debt: z.object({
      creditCard: z.object({
        defaultInterestRate: z.number().min(0),
        defaultMinimumPaymentPercent: percentSchema,
        minimumMonthlyPayment: moneySchema,
      }),
    }),
  })
  .strict()

export type FinancialConfigData = z.infer<typeof financialConfigSchema>

export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | ConfigValue[]
  | ConfigOverrides

export type ConfigOverrides = { [key: string]: ConfigValue }

export const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(configValueSchema),
    configOverridesSchema,
  ]),
)

export const configOverridesSchema: z.ZodType<ConfigOverrides> = z.lazy(() =>
  z.record(configValueSchema),
)
