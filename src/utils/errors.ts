/**
 * Central error classes and validation utilities
 * @module utils/errors
 */

/**
 * Base error class for all coffee-pairing errors
 */
export class CoffeePairingError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'CoffeePairingError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    Error.captureStackTrace?.(this, this.constructor)
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends CoffeePairingError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends CoffeePairingError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

/**
 * Error thrown when a pairing history file cannot be read or written
 */
export class HistoryError extends CoffeePairingError {
  public readonly fileName: string

  constructor(fileName: string, message: string, cause?: unknown) {
    super(
      `History file '${fileName}': ${message}`,
      'HISTORY_ERROR',
      { fileName },
      { cause }
    )
    this.name = 'HistoryError'
    this.fileName = fileName
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is a non-negative integer (>= 0)
 */
export function requireNonNegativeInteger(value: number, parameterName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be an integer'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a number is non-negative (>= 0)
 */
export function requireNonNegative(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Check if an error is a coffee-pairing error
 */
export function isCoffeePairingError(error: unknown): error is CoffeePairingError {
  return error instanceof CoffeePairingError
}
