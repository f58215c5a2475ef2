import { z } from 'zod'

export const statKeys = [
  'grossIncome',
  'bankBalance',
  'retirementBalance',
  'usableBalance',
  'debt',
  'taxesPaid',
  'taxesPaidFederal',
  'taxesPaidState',
  'taxesPaidSocialSecurity',
  'taxesPaidMedicare',
  'taxesPaidPenalty',
  'moneySpent',
  'retirementContrib',
  'retirementMatch',
  'requiredMinDistrib',
  'homeExpensesPaid',
  'interestPaid',
  'rentPaid',
] as const

export const statKeySchema = z.enum(statKeys)

const explainValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const explainMetricSchema = z.object({
  label: z.string(),
  value: explainValueSchema,
})

export const simulationEventSchema = z.object({
  year: z.number().int(),
  message: z.string(),
})

export const settlementExplanationSchema = z.object({
  year: z.number().int(),
  unitId: z.string(),
  inputs: z.array(explainMetricSchema),
  checkpoints: z.array(explainMetricSchema),
})

export const simulationSummarySchema = z.object({
  years: z.number().int(),
  endingBankBalance: z.number(),
  endingRetirementBalance: z.number(),
  endingDebt: z.number(),
  totalTaxesPaid: z.number(),
  totalMoneySpent: z.number(),
})

export const simulationRunSchema = z.object({
  id: z.string(),
  scenarioName: z.string(),
  startedAt: z.number(),
  finishedAt: z.number(),
  status: z.enum(['success', 'error']),
  errorMessage: z.string().optional(),
  yearlyStats: z.array(z.object({ year: z.number().int() }).catchall(z.number())),
  events: z.array(simulationEventSchema),
  settlements: z.array(settlementExplanationSchema),
  summary: simulationSummarySchema,
})

export type StatKey = (typeof statKeys)[number]
export type YearlyStats = Record<StatKey, number>
export type YearlyStatsRecord = { year: number } & YearlyStats
export type ExplainMetric = z.infer<typeof explainMetricSchema>
export type SimulationEvent = z.infer<typeof simulationEventSchema>
export type SettlementExplanation = z.infer<typeof settlementExplanationSchema>
export type SimulationSummary = z.infer<typeof simulationSummarySchema>
export type SimulationRun = Omit<z.infer<typeof simulationRunSchema>, 'yearlyStats'> & {
  yearlyStats: YearlyStatsRecord[]
}
