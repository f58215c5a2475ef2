import { depositIntoBankAccount } from '../funds'
import type { LifeModel, LifecycleEntity } from '../types'
import type { Job401k } from './job401k'
import type { Person } from './person'

export type Salary = {
  base: number
  yearlyIncrease: number
  yearlyBonus: number
  getBonus: () => number
  advanceYear: () => void
}

export type SalaryOptions = {
  base: number
  yearlyIncrease?: number
  yearlyBonus?: number
}

export type Job = LifecycleEntity & {
  kind: 'job'
  owner: Person
  company: string
  role: string
  salary: Salary
  retirementAccount: Job401k | null
  retired: boolean
  retire: () => void
}

export type JobOptions = {
  company: string
  role?: string
  salary: SalaryOptions
}

export const createSalary = ({ base, yearlyIncrease = 0, yearlyBonus = 0 }: SalaryOptions): Salary => {
  const salary: Salary = {
    base,
    yearlyIncrease,
    yearlyBonus,
    getBonus: () => salary.base * (salary.yearlyBonus / 100),
    advanceYear: () => {
      salary.base += salary.base * (salary.yearlyIncrease / 100)
    },
  }
  return salary
}

export const createJob = (
  model: LifeModel,
  owner: Person,
  { company, role = '', salary }: JobOptions,
): Job => {
  const job: Job = {
    id: model.nextId('job'),
    kind: 'job',
    stats: {},
    owner,
    company,
    role,
    salary: createSalary(salary),
    retirementAccount: null,
    retired: false,
    retire: () => {
      job.retired = true
      if (job.retirementAccount) {
        job.retirementAccount.job = null
        job.retirementAccount = null
      }
      model.eventLog.add(`${owner.name} retired from ${company}`)
    },
    preStep: () => {
      if (job.retired) {
        job.stats.grossIncome = 0
        job.stats.retirementContrib = 0
        job.stats.retirementMatch = 0
        return
      }

      const account = job.retirementAccount
      const base = job.salary.base
      let remainingLimit = Math.min(base, model.config.getJob401kContribLimit(owner.age))
      let pretaxContrib = 0
      let rothContrib = 0
      let companyMatch = 0
      if (account) {
        pretaxContrib = Math.min(remainingLimit, account.getPretaxContribution(base))
        remainingLimit -= pretaxContrib
        rothContrib = Math.min(remainingLimit, account.getRothContribution(base))
        companyMatch = account.getCompanyMatch(pretaxContrib + rothContrib)
        account.contribute(pretaxContrib + companyMatch, rothContrib)
      }
      const totalContrib = pretaxContrib + rothContrib

      const grossIncome = base + job.salary.getBonus()
      depositIntoBankAccount(model, owner, grossIncome - totalContrib)
      owner.taxableIncome += grossIncome - pretaxContrib
      model.registries.socialSecurity
        .getItems(owner)
        .forEach((benefit) => benefit.addIncomeForYear(model.year, grossIncome))

      job.stats.grossIncome = grossIncome
      job.stats.retirementContrib = totalContrib
      job.stats.retirementMatch = companyMatch
    },
    postStep: () => {
      if (!job.retired) {
        job.salary.advanceYear()
      }
    },
  }
  model.registries.jobs.register(owner, job)
  model.addEntity(job)
  return job
}
