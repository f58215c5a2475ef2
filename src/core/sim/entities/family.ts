import type { FilingStatus } from '../../models'
import { createExplainTracker } from '../explain'
import { createFamilyUnit, getBankBalance } from '../funds'
import { settleTaxableUnit } from '../settlement'
import { getStandardDeduction, zeroTaxes, type TaxesDue } from '../tax'
import type { LifeModel, LifecycleEntity } from '../types'
import { collectYearlyObligations, recordTaxStats, type Person } from './person'

export type Family = LifecycleEntity & {
  kind: 'family'
  name: string
  members: Person[]
  lastTaxes: TaxesDue
  getFilingStatus: () => FilingStatus
  getDebt: () => number
  getBankBalance: () => number
  getCombinedTaxableIncome: () => number
  getDeductions: () => number
  getMember: (name: string) => Person | undefined
}

export const createFamily = (model: LifeModel, name = 'Family'): Family => {
  const members: Person[] = []
  const family: Family = {
    id: model.nextId('family'),
    kind: 'family',
    stats: {},
    name,
    members,
    lastTaxes: zeroTaxes,
    // Only the first member's filing status is consulted.
    getFilingStatus: () => members[0]?.filingStatus ?? 'single',
    getDebt: () => members.reduce((sum, member) => sum + member.debt, 0),
    getBankBalance: () => members.reduce((sum, member) => sum + getBankBalance(model, member), 0),
    getCombinedTaxableIncome: () =>
      members.reduce((sum, member) => sum + member.taxableIncome, 0),
    getDeductions: () =>
      Math.max(
        getStandardDeduction(model.config, family.getFilingStatus()),
        members.reduce((sum, member) => sum + member.getItemizedDeductions(), 0),
      ),
    getMember: (memberName) => members.find((member) => member.name === memberName),
    step: () => {
      if (members.length > 0 && family.getFilingStatus() === 'married_filing_jointly') {
        const obligations = members.reduce(
          (sum, member) => sum + collectYearlyObligations(model, member).total,
          0,
        )
        const explain = createExplainTracker(model.explainEnabled)
        const result = settleTaxableUnit(
          createFamilyUnit(model, family),
          obligations,
          model.config,
          explain,
        )
        if (model.explainEnabled) {
          model.settlements.push({ year: model.year, unitId: family.id, ...explain.snapshot() })
        }
        family.lastTaxes = result.finalTaxes
        recordTaxStats(family, result.finalTaxes)
      } else {
        recordTaxStats(family, zeroTaxes)
      }
    },
    postStep: () => {
      family.stats.debt = family.getDebt()
    },
  }
  model.addEntity(family)
  return family
}
