import { randomUUID } from 'node:crypto'
import {
  scenarioRequestSchema,
  type SimulationRun,
  type SimulationSummary,
  type YearlyStats,
  type YearlyStatsRecord,
} from '../models'
import { formatZodIssue } from '../utils/zod'
import { collectStats } from './engine'
import { buildModelFromRequest } from './input'
import type { LifeModel } from './types'

const emptySummary: SimulationSummary = {
  years: 0,
  endingBankBalance: 0,
  endingRetirementBalance: 0,
  endingDebt: 0,
  totalTaxesPaid: 0,
  totalMoneySpent: 0,
}

const summarizeRequest = (request: unknown) => {
  if (!request || typeof request !== 'object') {
    return 'request missing'
  }
  const families = 'families' in request ? request.families : undefined
  const count = Array.isArray(families) ? families.length : 0
  const name = 'name' in request && typeof request.name === 'string' ? request.name : 'unknown'
  return `scenario=${name}, families=${count}`
}

/**
 * Each record holds what the entities wrote in the year before it, so the last simulated year
 * only shows up in `ending`, the statistics collected after the run.
 */
export const buildSummary = (
  records: readonly YearlyStatsRecord[],
  ending: YearlyStats,
): SimulationSummary => ({
  years: records.length,
  endingBankBalance: ending.bankBalance,
  endingRetirementBalance: ending.retirementBalance,
  endingDebt: ending.debt,
  totalTaxesPaid: records.reduce((sum, record) => sum + record.taxesPaid, ending.taxesPaid),
  totalMoneySpent: records.reduce((sum, record) => sum + record.moneySpent, ending.moneySpent),
})

const describeError = (error: unknown) =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error)

/**
 * Validates a scenario request, runs it to its end year and reports the yearly statistics.
 * Failures come back as an `error` run carrying whatever years completed.
 */
export const runScenario = (request: unknown, logEnabled = true): SimulationRun => {
  const startedAt = Date.now()
  if (logEnabled) {
    console.info('[Simulation] Run requested.', { summary: summarizeRequest(request) })
  }

  const parsed = scenarioRequestSchema.safeParse(request)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    if (logEnabled) {
      console.warn('[Simulation] Invalid request.', { issue, summary: summarizeRequest(request) })
    }
    return {
      id: randomUUID(),
      scenarioName: 'unknown',
      startedAt,
      finishedAt: Date.now(),
      status: 'error',
      errorMessage: formatZodIssue(issue, 'scenario'),
      yearlyStats: [],
      events: [],
      settlements: [],
      summary: emptySummary,
    }
  }

  const scenarioName = parsed.data.name
  let model: LifeModel | null = null
  let errorMessage: string | undefined
  try {
    model = buildModelFromRequest(parsed.data)
    model.run()
  } catch (error) {
    errorMessage = describeError(error)
    if (logEnabled) {
      console.warn('[Simulation] Run failed.', {
        scenarioName,
        year: model?.year ?? null,
        error: errorMessage,
      })
    }
  }

  const yearlyStats = model ? [...model.yearlyStats] : []
  const finishedAt = Date.now()
  if (logEnabled && !errorMessage) {
    console.info('[Simulation] Run complete.', {
      scenarioName,
      status: 'success',
      years: yearlyStats.length,
      durationMs: finishedAt - startedAt,
    })
  }
  return {
    id: randomUUID(),
    scenarioName,
    startedAt,
    finishedAt,
    status: errorMessage ? 'error' : 'success',
    errorMessage,
    yearlyStats,
    events: model ? [...model.eventLog.entries] : [],
    settlements: model ? [...model.settlements] : [],
    summary: model ? buildSummary(yearlyStats, collectStats(model.entities)) : emptySummary,
  }
}
