import { readFileSync } from 'node:fs'
import { configOverridesSchema } from '../models/financialConfig'
import { formatZodIssue } from '../utils/zod'
import { createFinancialConfig, type FinancialConfig } from './financialConfig'

// Partial files are laid over the defaults; anything unreadable falls back to them.
export const loadFinancialConfig = (path: string): FinancialConfig => {
  const defaults = createFinancialConfig()
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    console.warn('[Config] Unable to read configuration file. Using defaults.', {
      path,
      error: error instanceof Error ? error.message : String(error),
    })
    return defaults
  }

  const parsed = configOverridesSchema.safeParse(raw)
  if (!parsed.success) {
    console.warn('[Config] Invalid configuration file. Using defaults.', {
      path,
      issue: formatZodIssue(parsed.error.issues[0], 'configuration'),
    })
    return defaults
  }

  try {
    return defaults.withOverrides(parsed.data)
  } catch (error) {
    console.warn('[Config] Configuration overrides rejected. Using defaults.', {
      path,
      error: error instanceof Error ? error.message : String(error),
    })
    return defaults
  }
}
