import type { SimulationEvent } from '../models'

export type EventLog = {
  readonly entries: readonly SimulationEvent[]
  add: (message: string) => void
  forYear: (year: number) => SimulationEvent[]
}

export const createEventLog = (getYear: () => number): EventLog => {
  const entries: SimulationEvent[] = []
  return {
    entries,
    add: (message) => {
      entries.push({ year: getYear(), message })
    },
    forYear: (year) => entries.filter((entry) => entry.year === year),
  }
}
