export type LatticeErrorCode =
  | 'INVALID_PARAMETER'
  | 'EMPTY_RESULT'
  | 'DEGENERATE_GEOMETRY'

export type LatticeErrorEnvelope = {
  error: {
    code: LatticeErrorCode | 'UNKNOWN'
    message: string
    details?: Record<string, unknown>
  }
}

export class LatticeError extends Error {
  readonly code: LatticeErrorCode
  readonly details?: Record<string, unknown>
  readonly envelope: LatticeErrorEnvelope

  constructor(
    code: LatticeErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'LatticeError'
    this.code = code
    this.details = details
    this.envelope = {
      error: {
        code,
        message,
        details,
      },
    }
  }
}

export const invalidParameter = (
  message: string,
  details?: Record<string, unknown>,
): LatticeError => new LatticeError('INVALID_PARAMETER', message, details)

export const emptyResult = (
  message: string,
  details?: Record<string, unknown>,
): LatticeError => new LatticeError('EMPTY_RESULT', message, details)

export const degenerateGeometry = (
  message: string,
  details?: Record<string, unknown>,
): LatticeError => new LatticeError('DEGENERATE_GEOMETRY', message, details)

export const isLatticeError = (
  value: unknown,
  code?: LatticeErrorCode,
): value is LatticeError => {
  if (!(value instanceof LatticeError)) {
    return false
  }
  return code === undefined || value.code === code
}

export const toLatticeErrorEnvelope = (
  error: unknown,
): LatticeErrorEnvelope => {
  if (error instanceof LatticeError) {
    return error.envelope
  }
  if (error instanceof Error) {
    return {
      error: {
        code: 'UNKNOWN',
        message: error.message,
      },
    }
  }
  return {
    error: {
      code: 'UNKNOWN',
      message: 'Unknown lattice error',
    },
  }
}

export const requireFinitePositive = (name: string, value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidParameter(`${name} must be a positive finite number`, {
      [name]: value,
    })
  }
  return value
}

export const requirePositiveInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw invalidParameter(`${name} must be an integer >= 1`, {
      [name]: value,
    })
  }
  return value
}
