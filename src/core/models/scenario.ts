import { z } from 'zod'
import { moneySchema, percentSchema } from './common'
import {
  donationTypeSchema,
  filingStatusSchema,
  hsaTypeSchema,
  studentLoanTypeSchema,
} from './enums'
import { configOverridesSchema } from './financialConfig'

const ageSchema = z.number().int().min(0).max(120)

export const spendingRequestSchema = z.object({
  base: moneySchema,
  yearlyIncrease: z.number().default(0),
})

export const bankAccountRequestSchema = z.object({
  name: z.string().min(1).default('Checking'),
  balance: moneySchema.default(0),
  interestRate: z.number().min(0).optional(),
})

export const job401kRequestSchema = z.object({
  pretaxBalance: moneySchema.default(0),
  rothBalance: moneySchema.default(0),
  pretaxContribPercent: percentSchema.default(0),
  rothContribPercent: percentSchema.default(0),
  averageReturn: z.number().default(0),
  companyMatchPercent: percentSchema.default(0),
})

export const jobRequestSchema = z.object({
  company: z.string().min(1),
  role: z.string().default(''),
  salary: z.object({
    base: moneySchema,
    yearlyIncrease: z.number().default(0),
    yearlyBonus: percentSchema.default(0),
  }),
  retirement401k: job401kRequestSchema.optional(),
})

export const iraRequestSchema = z.object({
  balance: moneySchema.default(0),
  growthRate: z.number().optional(),
  yearlyContribution: moneySchema.default(0),
})

export const brokerageRequestSchema = z.object({
  balance: moneySchema.default(0),
  growthRate: z.number().optional(),
})

export const apartmentRequestSchema = z.object({
  name: z.string().min(1).optional(),
  monthlyRent: moneySchema,
  yearlyIncrease: z.number().optional(),
})

export const homeRequestSchema = z.object({
  name: z.string().min(1),
  purchasePrice: moneySchema,
  valueYearlyIncrease: z.number().default(0),
  downPayment: moneySchema.default(0),
  mortgage: z
    .object({
      lengthYears: z.number().int().min(1),
      interestRate: z.number().min(0),
      loanAmount: moneySchema.optional(),
      principal: moneySchema.optional(),
    })
    .optional(),
  expenses: z
    .object({
      propertyTaxPercent: percentSchema.default(0),
      homeInsurancePercent: percentSchema.default(0),
      maintenanceAmount: moneySchema.default(0),
      maintenanceIncrease: z.number().default(0),
      improvementAmount: moneySchema.default(0),
      improvementIncrease: z.number().default(0),
      hoaAmount: moneySchema.default(0),
      hoaIncrease: z.number().default(0),
    })
    .default({}),
})

const loanRequestSchema = z.object({
  loanAmount: moneySchema,
  interestRate: z.number().min(0),
  lengthYears: z.number().int().min(0),
  principal: moneySchema.optional(),
})

export const carLoanRequestSchema = loanRequestSchema.extend({
  name: z.string().min(1),
})

export const studentLoanRequestSchema = loanRequestSchema.extend({
  studentLoanType: studentLoanTypeSchema,
  schoolName: z.string().default(''),
})

export const creditCardRequestSchema = z.object({
  cardName: z.string().min(1),
  creditLimit: moneySchema,
  balance: moneySchema.default(0),
  interestRate: z.number().min(0).optional(),
})

export const donationRequestSchema = z.object({
  charityName: z.string().min(1),
  amount: moneySchema,
  donationType: donationTypeSchema.default('cash'),
  taxDeductible: z.boolean().default(true),
  recurring: z.boolean().default(true),
  year: z.number().int().optional(),
})

export const donorAdvisedFundRequestSchema = z.object({
  fundName: z.string().min(1),
  balance: moneySchema.default(0),
  growthRate: z.number().optional(),
  managementFeePercent: percentSchema.optional(),
  distributionRatePercent: percentSchema.optional(),
  yearlyContribution: moneySchema.default(0),
})

export const hsaRequestSchema = z.object({
  hsaType: hsaTypeSchema,
  balance: moneySchema.default(0),
  yearlyContribution: moneySchema.default(0),
})

export const pensionRequestSchema = z.object({
  company: z.string().min(1),
  startAge: ageSchema,
  annualBenefit: moneySchema,
  vestingYears: z.number().int().min(0).default(0),
  yearsOfService: z.number().int().min(0).default(0),
  costOfLivingAdjustment: z.number().default(0),
})

export const earningsRecordSchema = z.object({
  year: z.number().int(),
  amount: moneySchema,
})

export const socialSecurityRequestSchema = z.object({
  startAge: ageSchema,
  // Without a fixed benefit the estimate is derived from the earnings record.
  annualBenefit: moneySchema.optional(),
  earnings: z.array(earningsRecordSchema).default([]),
  costOfLivingAdjustment: z.number().optional(),
})

export const personRequestSchema = z
  .object({
    name: z.string().min(1),
    age: ageSchema,
    retirementAge: ageSchema,
    debt: moneySchema.default(0),
    spending: spendingRequestSchema,
    bankAccounts: z.array(bankAccountRequestSchema).default([]),
    jobs: z.array(jobRequestSchema).default([]),
    traditionalIras: z.array(iraRequestSchema).default([]),
    rothIras: z.array(iraRequestSchema).default([]),
    brokerageAccounts: z.array(brokerageRequestSchema).default([]),
    apartments: z.array(apartmentRequestSchema).default([]),
    homes: z.array(homeRequestSchema).default([]),
    carLoans: z.array(carLoanRequestSchema).default([]),
    studentLoans: z.array(studentLoanRequestSchema).default([]),
    creditCards: z.array(creditCardRequestSchema).default([]),
    donations: z.array(donationRequestSchema).default([]),
    donorAdvisedFunds: z.array(donorAdvisedFundRequestSchema).default([]),
    hsas: z.array(hsaRequestSchema).default([]),
    pensions: z.array(pensionRequestSchema).default([]),
    socialSecurity: socialSecurityRequestSchema.optional(),
  })
  .refine((person) => person.retirementAge >= person.age || person.jobs.length === 0, {
    message: 'Retirement age must not be below current age for a working person.',
    path: ['retirementAge'],
  })

export const familyRequestSchema = z
  .object({
    filingStatus: filingStatusSchema.default('single'),
    people: z.array(personRequestSchema).min(1),
  })
  .refine((family) => family.filingStatus === 'single' || family.people.length === 2, {
    message: 'Married families must have exactly two people.',
    path: ['people'],
  })

export const scenarioRequestSchema = z
  .object({
    name: z.string().min(1),
    startYear: z.number().int(),
    endYear: z.number().int(),
    config: z
      .object({
        scenario: z.string().min(1).optional(),
        overrides: configOverridesSchema.optional(),
      })
      .default({}),
    families: z.array(familyRequestSchema).min(1),
    explain: z.boolean().default(false),
  })
  .refine((request) => request.endYear >= request.startYear, {
    message: 'End year must not be before start year.',
    path: ['endYear'],
  })

export type SpendingRequest = z.infer<typeof spendingRequestSchema>
export type JobRequest = z.infer<typeof jobRequestSchema>
export type PersonRequest = z.infer<typeof personRequestSchema>
export type FamilyRequest = z.infer<typeof familyRequestSchema>
export type ScenarioRequest = z.infer<typeof scenarioRequestSchema>
export type ScenarioRequestInput = z.input<typeof scenarioRequestSchema>
