import type { LifeModel, LifecycleEntity } from '../types'

export type LifeEvent = {
  year: number
  name: string
  apply: () => void
}

export type LifeEvents = LifecycleEntity & {
  kind: 'life_events'
  pending: LifeEvent[]
  add: (event: LifeEvent) => void
}

/** Runs each event once, in the step of its year, and logs its name. */
export const createLifeEvents = (model: LifeModel, events: LifeEvent[] = []): LifeEvents => {
  const lifeEvents: LifeEvents = {
    id: model.nextId('life-events'),
    kind: 'life_events',
    stats: {},
    pending: [...events],
    add: (event) => {
      lifeEvents.pending.push(event)
    },
    step: () => {
      const due = lifeEvents.pending.filter((event) => event.year === model.year)
      lifeEvents.pending = lifeEvents.pending.filter((event) => event.year !== model.year)
      due.forEach((event) => {
        event.apply()
        model.eventLog.add(event.name)
      })
    },
  }
  model.addEntity(lifeEvents)
  return lifeEvents
}
