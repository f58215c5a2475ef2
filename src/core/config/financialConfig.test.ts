import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { SimulationValidationError } from '../utils/errors'
import { createFinancialConfig, defaultFinancialConfig } from './financialConfig'
import { loadFinancialConfig } from './loadFinancialConfig'
import { getScenarioOverrides, isPredefinedScenarioName } from './scenarios'

const writeTempFile = (contents: string) => {
  const dir = mkdtempSync(join(tmpdir(), 'life-sim-config-'))
  const path = join(dir, 'config.json')
  writeFileSync(path, contents)
  return path
}

describe('financial config', () => {
  it('looks up dotted paths with a fallback', () => {
    expect(defaultFinancialConfig.get('tax.state.taxRate')).toBe(6)
    expect(defaultFinancialConfig.get('tax.missing.rate', 'none')).toBe('none')
    expect(defaultFinancialConfig.getNumber('accounts.bank.compoundRate', 1)).toBe(12)
    expect(defaultFinancialConfig.getNumber('tax.federal', 3)).toBe(3)
  })

  it('adds catch-up contributions from the catch-up age', () => {
    expect(defaultFinancialConfig.getJob401kContribLimit(49)).toBe(20500)
    expect(defaultFinancialConfig.getJob401kContribLimit(50)).toBe(27000)
    expect(defaultFinancialConfig.getIraContribLimit(49)).toBe(6500)
    expect(defaultFinancialConfig.getIraContribLimit(50)).toBe(7500)
  })

  it('reads RMD divisors and holds the last one past the table', () => {
    expect(defaultFinancialConfig.getRmdDistributionPeriod(69)).toBeNull()
    expect(defaultFinancialConfig.getRmdDistributionPeriod(75)).toBe(22.9)
    expect(defaultFinancialConfig.getRmdDistributionPeriod(120)).toBe(1.9)
  })

  it('layers overrides without touching the original', () => {
    const config = defaultFinancialConfig.withOverrides({ tax: { state: { taxRate: 0 } } })

    expect(config.data.tax.state.taxRate).toBe(0)
    expect(config.data.tax.earlyWithdrawalPenaltyRate).toBe(10)
    expect(defaultFinancialConfig.data.tax.state.taxRate).toBe(6)
  })

  it('rejects overrides that break the schema', () => {
    expect(() =>
      defaultFinancialConfig.withOverrides({ tax: { state: { taxRate: 'high' } } }),
    ).toThrow(SimulationValidationError)
  })

  it('applies predefined scenarios by name', () => {
    const config = createFinancialConfig().applyScenario('recession')

    expect(config.scenario).toBe('recession')
    expect(config.data.accounts.brokerage.defaultGrowthRate).toBe(3)
    expect(config.data.accounts.bank.compoundRate).toBe(12)
    expect(isPredefinedScenarioName('low_tax')).toBe(true)
  })

  it('lists the available scenarios when the name is unknown', () => {
    expect(() => getScenarioOverrides('boom')).toThrow(
      'Unknown scenario "boom". Available scenarios: recession, high_inflation, conservative, aggressive, tax_reform, low_tax.',
    )
  })
})

describe('loadFinancialConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('lays a partial file over the defaults', () => {
    const path = writeTempFile(JSON.stringify({ tax: { state: { taxRate: 4 } } }))

    const config = loadFinancialConfig(path)

    expect(config.data.tax.state.taxRate).toBe(4)
    expect(config.data.retirement.rmdStartAge).toBe(72)
  })

  it('falls back to defaults on malformed JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = writeTempFile('{ not json')

    const config = loadFinancialConfig(path)

    expect(config.data).toEqual(defaultFinancialConfig.data)
    expect(warn).toHaveBeenCalledWith(
      '[Config] Unable to read configuration file. Using defaults.',
      expect.objectContaining({ path }),
    )
  })

  it('falls back to defaults when the file is missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const config = loadFinancialConfig(join(tmpdir(), 'life-sim-missing', 'config.json'))

    expect(config.data.tax.state.taxRate).toBe(6)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('falls back to defaults when the overrides do not fit the schema', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = writeTempFile(JSON.stringify({ retirement: { rmdStartAge: -3 } }))

    const config = loadFinancialConfig(path)

    expect(config.data.retirement.rmdStartAge).toBe(72)
    expect(warn).toHaveBeenCalledWith(
      '[Config] Configuration overrides rejected. Using defaults.',
      expect.objectContaining({ path }),
    )
  })
})
