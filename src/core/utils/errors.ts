/** Raised for inputs that can only come from a caller bug (negative payments, unknown overlays). */
export class SimulationValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SimulationValidationError'
  }
}

/** Raised when the model is wired incorrectly, e.g. a deposit for a person with no bank account. */
export class ModelSetupError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ModelSetupError'
  }
}

export const assertNonNegative = (value: number, label: string) => {
  if (value < 0) {
    throw new SimulationValidationError(`${label} must not be negative (received ${value}).`)
  }
}
