import type { Annuity } from './entities/annuity'
import type { BankAccount } from './entities/bankAccount'
import type { HealthSavingsAccount } from './entities/hsa'
import type { Home, Apartment } from './entities/housing'
import type { Insurance } from './entities/insurance'
import type { BrokerageAccount, Plan529 } from './entities/investments'
import type { RothIra, TraditionalIra } from './entities/ira'
import type { Job } from './entities/job'
import type { Job401k } from './entities/job401k'
import type { LifeInsurance } from './entities/lifeInsurance'
import type { CarLoan, CreditCard, StudentLoan } from './entities/loans'
import type { Donation } from './entities/donation'
import type { DonorAdvisedFund } from './entities/donorAdvisedFund'
import type { Pension, SocialSecurity } from './entities/benefits'
import type { PretaxRothSource } from './types'

export type RegistryOwner = { id: string }

export type Registry<T> = {
  register: (owner: RegistryOwner, item: T) => void
  unregister: (owner: RegistryOwner, item: T) => boolean
  getItems: (owner: RegistryOwner) => readonly T[]
  clear: (owner: RegistryOwner) => void
  getAllItems: () => T[]
}

export const createRegistry = <T>(): Registry<T> => {
  const itemsByOwner = new Map<string, T[]>()
  return {
    register: (owner, item) => {
      const items = itemsByOwner.get(owner.id)
      if (items) {
        items.push(item)
      } else {
        itemsByOwner.set(owner.id, [item])
      }
    },
    unregister: (owner, item) => {
      const items = itemsByOwner.get(owner.id)
      const index = items ? items.indexOf(item) : -1
      if (!items || index < 0) {
        return false
      }
      items.splice(index, 1)
      return true
    },
    getItems: (owner) => itemsByOwner.get(owner.id) ?? [],
    clear: (owner) => {
      itemsByOwner.delete(owner.id)
    },
    getAllItems: () => Array.from(itemsByOwner.values()).flat(),
  }
}

type RegistryBundle = {
  bankAccounts: Registry<BankAccount>
  jobs: Registry<Job>
  job401ks: Registry<Job401k>
  traditionalIras: Registry<TraditionalIra>
  rothIras: Registry<RothIra>
  // 401k, traditional IRA and Roth IRA share one ordering for forced draws.
  retirementSources: Registry<PretaxRothSource>
  brokerageAccounts: Registry<BrokerageAccount>
  plan529s: Registry<Plan529>
  hsas: Registry<HealthSavingsAccount>
  pensions: Registry<Pension>
  socialSecurity: Registry<SocialSecurity>
  annuities: Registry<Annuity>
  insurancePolicies: Registry<Insurance>
  lifeInsurancePolicies: Registry<LifeInsurance>
  homes: Registry<Home>
  apartments: Registry<Apartment>
  carLoans: Registry<CarLoan>
  studentLoans: Registry<StudentLoan>
  creditCards: Registry<CreditCard>
  donations: Registry<Donation>
  donorAdvisedFunds: Registry<DonorAdvisedFund>
}

export type ModelRegistries = RegistryBundle & {
  clearAll: (owner: RegistryOwner) => void
}

export const createModelRegistries = (): ModelRegistries => {
  const registries: RegistryBundle = {
    bankAccounts: createRegistry(),
    jobs: createRegistry(),
    job401ks: createRegistry(),
    traditionalIras: createRegistry(),
    rothIras: createRegistry(),
    retirementSources: createRegistry(),
    brokerageAccounts: createRegistry(),
    plan529s: createRegistry(),
    hsas: createRegistry(),
    pensions: createRegistry(),
    socialSecurity: createRegistry(),
    annuities: createRegistry(),
    insurancePolicies: createRegistry(),
    lifeInsurancePolicies: createRegistry(),
    homes: createRegistry(),
    apartments: createRegistry(),
    carLoans: createRegistry(),
    studentLoans: createRegistry(),
    creditCards: createRegistry(),
    donations: createRegistry(),
    donorAdvisedFunds: createRegistry(),
  }
  return {
    ...registries,
    clearAll: (owner) => {
      Object.values(registries).forEach((registry) => registry.clear(owner))
    },
  }
}
