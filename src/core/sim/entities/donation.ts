import type { DonationType } from '../../models'
import { assertNonNegative } from '../../utils/errors'
import type { LifeModel, LifecycleEntity } from '../types'
import type { Person } from './person'

export type Donation = LifecycleEntity & {
  kind: 'donation'
  owner: Person
  charityName: string
  amount: number
  donationType: DonationType
  taxDeductible: boolean
  recurring: boolean
  year: number | null
  getAmountDue: (year: number) => number
  getTaxDeductionAmount: (year: number) => number
}

export type DonationOptions = {
  charityName: string
  amount: number
  donationType?: DonationType
  taxDeductible?: boolean
  recurring?: boolean
  year?: number
}

// One-time donations fall due in their own year only.
export const createDonation = (
  model: LifeModel,
  owner: Person,
  {
    charityName,
    amount,
    donationType = 'cash',
    taxDeductible = true,
    recurring = true,
    year,
  }: DonationOptions,
): Donation => {
  assertNonNegative(amount, 'Donation amount')
  const donation: Donation = {
    id: model.nextId('donation'),
    kind: 'donation',
    stats: {},
    owner,
    charityName,
    amount,
    donationType,
    taxDeductible,
    recurring,
    year: recurring ? null : (year ?? model.year),
    getAmountDue: (target) =>
      donation.recurring || donation.year === target ? donation.amount : 0,
    getTaxDeductionAmount: (target) => (donation.taxDeductible ? donation.getAmountDue(target) : 0),
  }
  model.registries.donations.register(owner, donation)
  model.addEntity(donation)
  return donation
}
