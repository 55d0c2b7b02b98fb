/**
 * Planner error taxonomy.
 *
 * - ConfigurationError: malformed bracket schedule or tax-year setup. Fatal.
 * - PricingError: a single grant could not be valued. That grant is excluded.
 * - InvalidInputError: bad run parameters or override text. Rejected up front.
 * - AllocationOverflowError: an override asks for more units than a grant holds.
 */

export type PlannerErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PRICING_ERROR'
  | 'INVALID_INPUT'
  | 'ALLOCATION_OVERFLOW'

export abstract class PlannerError extends Error {
  readonly code: PlannerErrorCode
  readonly details: Record<string, unknown> | undefined

  constructor(message: string, code: PlannerErrorCode, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.details = details
  }
}

export class ConfigurationError extends PlannerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details)
  }
}

export class PricingError extends PlannerError {
  readonly grantId: string
  readonly reason: string

  constructor(grantId: string, reason: string) {
    super(`Cannot value grant ${grantId}: ${reason}`, 'PRICING_ERROR', { grantId, reason })
    this.grantId = grantId
    this.reason = reason
  }
}

export class InvalidInputError extends PlannerError {
  constructor(field: string, reason: string, value?: unknown) {
    super(`Invalid ${field}: ${reason}`, 'INVALID_INPUT', { field, reason, value })
  }
}

export class AllocationOverflowError extends PlannerError {
  readonly grantId: string
  readonly requested: number
  readonly available: number

  constructor(grantId: string, requested: number, available: number) {
    super(
      `Override for ${grantId} requests ${requested} units but only ${available} are held`,
      'ALLOCATION_OVERFLOW',
      { grantId, requested, available },
    )
    this.grantId = grantId
    this.requested = requested
    this.available = available
  }
}

export function isPlannerError(err: unknown): err is PlannerError {
  return err instanceof PlannerError
}
