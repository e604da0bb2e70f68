/**
 * Error taxonomy shared by the dispatcher, relay and retry engine.
 * Every class carries the HTTP status the API layer answers with.
 */

export class AppError extends Error {
  public readonly statusCode: number
  public readonly errorCode: string
  public readonly metadata?: Record<string, unknown>

  constructor(message: string, statusCode = 500, errorCode = 'internal_error', metadata?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
    this.errorCode = errorCode
    this.metadata = metadata
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Bad input. Surfaced to the caller, never retried.
 */
export class ValidationError extends AppError {
  constructor(message: string, errorCode = 'validation_error', metadata?: Record<string, unknown>) {
    super(message, 400, errorCode, metadata)
  }
}

/**
 * Invalid signature or credential. Terminal.
 */
export class AuthError extends AppError {
  constructor(message = 'Unauthorized', errorCode = 'unauthorized', metadata?: Record<string, unknown>) {
    super(message, 401, errorCode, metadata)
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', errorCode = 'not_found', metadata?: Record<string, unknown>) {
    super(message, 404, errorCode, metadata)
  }
}

/**
 * Timeout, 5xx or rate limit from a downstream call. Retried per schedule.
 */
export class TransientError extends AppError {
  readonly retryable = true

  constructor(message: string, errorCode = 'transient_error', metadata?: Record<string, unknown>) {
    super(message, 503, errorCode, metadata)
  }
}

/**
 * The platform refused the message for good (invalid recipient, blocked user, bad token).
 */
export class PermanentDeliveryError extends AppError {
  readonly retryable = false

  constructor(message: string, errorCode = 'permanent_delivery_error', metadata?: Record<string, unknown>) {
    super(message, 422, errorCode, metadata)
  }
}

export class InvalidTransitionError extends AppError {
  constructor(entity: string, from: string, to: string) {
    super(`Invalid ${entity} transition ${from} -> ${to}`, 409, 'invalid_transition', { entity, from, to })
  }
}

/**
 * Optimistic lock lost: someone else updated the row first.
 */
export class ConflictError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 409, 'conflict', metadata)
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error'
}
