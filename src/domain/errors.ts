import type { ZodIssue } from 'zod'

export type PlannerErrorCode = 'VALIDATION_ERROR' | 'CONFIG_ERROR'

/**
 * Raised when an input fails a precondition (blank name, negative amount,
 * empty catalog, non-positive budget...). Never retried; the call that
 * raised it produces nothing.
 */
export class ValidationError extends Error {
  readonly code: PlannerErrorCode = 'VALIDATION_ERROR'

  constructor(
    message: string,
    public readonly field: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Raised when environment configuration does not match the config schema. */
export class ConfigError extends Error {
  readonly code: PlannerErrorCode = 'CONFIG_ERROR'

  constructor(
    message: string,
    public readonly variable: string,
    public readonly issues: readonly ZodIssue[] = [],
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
