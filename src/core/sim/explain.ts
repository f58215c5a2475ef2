import type { ExplainMetric } from '../models'

export type ExplainTracker = {
  inputs: ExplainMetric[]
  checkpoints: ExplainMetric[]
  addInput: (label: string, value: ExplainMetric['value']) => void
  addCheckpoint: (label: string, value: ExplainMetric['value']) => void
  snapshot: () => { inputs: ExplainMetric[]; checkpoints: ExplainMetric[] }
}

const toMetric = (label: string, value: ExplainMetric['value']): ExplainMetric => ({
  label,
  value,
})

export const createExplainTracker = (enabled = true): ExplainTracker => {
  const inputs: ExplainMetric[] = []
  const checkpoints: ExplainMetric[] = []
  const snapshot = () => ({ inputs: [...inputs], checkpoints: [...checkpoints] })
  if (!enabled) {
    return {
      inputs,
      checkpoints,
      addInput: () => {},
      addCheckpoint: () => {},
      snapshot,
    }
  }
  return {
    inputs,
    checkpoints,
    addInput: (label, value) => {
      inputs.push(toMetric(label, value))
    },
    addCheckpoint: (label, value) => {
      checkpoints.push(toMetric(label, value))
    },
    snapshot,
  }
}

export const findCheckpoint = (metrics: ExplainMetric[], label: string) =>
  metrics.find((metric) => metric.label === label)?.value ?? null
