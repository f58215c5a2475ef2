import { defaultFinancialConfig, type FinancialConfig } from '../config/financialConfig'
import type { FamilyRequest, PersonRequest, ScenarioRequest } from '../models'
import { createLifeModel } from './engine'
import {
  createApartment,
  createBankAccount,
  createBrokerageAccount,
  createCarLoan,
  createCreditCard,
  createDonation,
  createDonorAdvisedFund,
  createFamily,
  createHealthSavingsAccount,
  createHome,
  createJob,
  createJob401k,
  createPension,
  createPerson,
  createRothIra,
  createSocialSecurity,
  createStudentLoan,
  createTraditionalIra,
  marry,
  type Family,
} from './entities'
import type { LifeModel } from './types'

export const buildConfigFromRequest = (
  request: ScenarioRequest,
  base: FinancialConfig = defaultFinancialConfig,
) => {
  const { scenario, overrides } = request.config
  const withScenario = scenario ? base.applyScenario(scenario) : base
  return overrides ? withScenario.withOverrides(overrides) : withScenario
}

// The person is created before anything it owns so it ages before its accounts run.
const addPerson = (model: LifeModel, family: Family, request: PersonRequest) => {
  const person = createPerson(model, {
    family,
    name: request.name,
    age: request.age,
    retirementAge: request.retirementAge,
    spending: request.spending,
    debt: request.debt,
  })

  request.bankAccounts.forEach((account) => {
    createBankAccount(model, person, {
      company: account.name,
      balance: account.balance,
      interestRate: account.interestRate,
    })
  })
  request.jobs.forEach((jobRequest) => {
    const job = createJob(model, person, {
      company: jobRequest.company,
      role: jobRequest.role,
      salary: jobRequest.salary,
    })
    if (jobRequest.retirement401k) {
      createJob401k(model, job, jobRequest.retirement401k)
    }
  })
  request.traditionalIras.forEach((ira) => {
    createTraditionalIra(model, person, {
      balance: ira.balance,
      yearlyContribution: ira.yearlyContribution,
      averageGrowth: ira.growthRate,
    })
  })
  request.rothIras.forEach((ira) => {
    createRothIra(model, person, {
      balance: ira.balance,
      yearlyContribution: ira.yearlyContribution,
      averageGrowth: ira.growthRate,
    })
  })
  request.brokerageAccounts.forEach((account, index) => {
    createBrokerageAccount(model, person, {
      company: `Brokerage ${index + 1}`,
      balance: account.balance,
      growthRate: account.growthRate,
    })
  })
  request.hsas.forEach((hsa) => createHealthSavingsAccount(model, person, hsa))
  request.pensions.forEach((pension) => createPension(model, person, pension))
  if (request.socialSecurity) {
    createSocialSecurity(model, person, request.socialSecurity)
  }
  request.apartments.forEach((apartment) => createApartment(model, person, apartment))
  request.homes.forEach((home) => createHome(model, person, home))
  request.carLoans.forEach((loan) => createCarLoan(model, person, loan))
  request.studentLoans.forEach((loan) => createStudentLoan(model, person, loan))
  request.creditCards.forEach((card) => createCreditCard(model, person, card))
  request.donations.forEach((donation) => createDonation(model, person, donation))
  request.donorAdvisedFunds.forEach((fund) => createDonorAdvisedFund(model, person, fund))
  return person
}

const addFamily = (model: LifeModel, request: FamilyRequest, index: number) => {
  const family = createFamily(model, `Family ${index + 1}`)
  const people = request.people.map((person) => addPerson(model, family, person))
  const [first, second] = people
  if (request.filingStatus === 'married_filing_jointly' && first && second) {
    marry(model, first, second)
  }
  return family
}

/** Builds a ready-to-run model from a validated scenario request. */
export const buildModelFromRequest = (
  request: ScenarioRequest,
  base: FinancialConfig = defaultFinancialConfig,
): LifeModel => {
  const model = createLifeModel({
    startYear: request.startYear,
    endYear: request.endYear,
    config: buildConfigFromRequest(request, base),
    explain: request.explain,
  })
  request.families.forEach((family, index) => addFamily(model, family, index))
  return model
}
