/**
 * Error raised for every failed call to the group communication service
 * @module services/service-error
 */

import { CoffeePairingError } from '../utils/errors.js'
import type { CommunicationOperation } from './types.js'

/**
 * Error thrown when a remote call to the group communication service fails.
 * The underlying failure, if any, is kept as `cause`.
 */
export class CommunicationError extends CoffeePairingError {
  /** Service operation that failed */
  public readonly operation: CommunicationOperation

  constructor(
    operation: CommunicationOperation,
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `Communication error in '${operation}': ${message}`,
      'COMMUNICATION_ERROR',
      { operation, ...context },
      { cause }
    )
    this.name = 'CommunicationError'
    this.operation = operation
  }
}

/**
 * Type guard for communication errors
 */
export function isCommunicationError(error: unknown): error is CommunicationError {
  return error instanceof CommunicationError
}

/**
 * Converts any thrown value into a CommunicationError.
 * Existing CommunicationErrors are returned unchanged.
 */
export function toCommunicationError(
  operation: CommunicationOperation,
  error: unknown,
  context?: Record<string, unknown>
): CommunicationError {
  if (error instanceof CommunicationError) {
    return error
  }

  const message = error instanceof Error ? error.message : String(error)
  return new CommunicationError(operation, message, error, context)
}
