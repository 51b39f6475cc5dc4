/**
 * Service-specific error classes
 * @module services/service-error
 */

import type { ServiceErrorInfo, ServiceErrorType } from './types.js'

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string

  /** Error type for categorization */
  public readonly type: ServiceErrorType

  /** Whether this error is eligible for retry */
  public readonly retryable: boolean

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    type: ServiceErrorType,
    retryable: boolean,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'ServiceError'
    this.code = code
    this.type = type
    this.retryable = retryable
    this.context = context

    // Maintains proper stack trace for where error was thrown (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serializable form for a {@link ServiceResult}
   */
  toErrorInfo(): ServiceErrorInfo {
    return {
      code: this.code,
      message: this.message,
      type: this.type,
      retryable: this.retryable,
      context: this.context,
    }
  }
}

/**
 * Error thrown when service configuration is invalid
 */
export class ServiceConfigurationError extends ServiceError {
  /** Field path that has invalid configuration */
  public readonly field: string

  /** Reason for invalid configuration */
  public readonly reason: string

  constructor(
    field: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid service configuration for '${field}': ${reason}`,
      'SERVICE_CONFIGURATION_ERROR',
      'validation',
      false, // Configuration errors are not retryable
      { field, reason, ...context }
    )
    this.name = 'ServiceConfigurationError'
    this.field = field
    this.reason = reason
  }
}

/**
 * Error reported when the context's abort signal fired before validation
 */
export class ServiceAbortedError extends ServiceError {
  public readonly serviceName: string

  constructor(serviceName: string, context?: Record<string, unknown>) {
    super(
      `Service '${serviceName}' was aborted`,
      'SERVICE_ABORTED',
      'aborted',
      false,
      { serviceName, ...context }
    )
    this.name = 'ServiceAbortedError'
    this.serviceName = serviceName
  }
}

/**
 * Checks if an error is a ServiceError
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError
}

/**
 * Creates a ServiceError from an unknown error
 */
export function toServiceError(
  error: unknown,
  serviceName: string,
  defaultType: ServiceErrorType = 'unknown'
): ServiceError {
  if (error instanceof ServiceError) {
    return error
  }

  const message = error instanceof Error ? error.message : String(error)

  return new ServiceError(
    `Service '${serviceName}' error: ${message}`,
    'SERVICE_ERROR',
    defaultType,
    false,
    { originalError: message, serviceName }
  )
}
