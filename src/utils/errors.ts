/**
 * Central error classes and argument guards for formatcheck
 * @module utils/errors
 */

/**
 * Base error class for all formatcheck errors
 */
export class FormatCheckError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'FormatCheckError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when an argument is null, undefined or empty
 */
export class InvalidArgumentError extends FormatCheckError {
  public readonly parameterName: string

  constructor(
    parameterName: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'INVALID_ARGUMENT', { parameterName, ...context })
    this.name = 'InvalidArgumentError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a required reference is null or undefined.
 * Only the email validator raises it; every other validator reports a
 * missing value as an {@link InvalidArgumentError}.
 */
export class NullReferenceError extends FormatCheckError {
  public readonly parameterName: string

  constructor(
    parameterName: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'NULL_REFERENCE', { parameterName, ...context })
    this.name = 'NullReferenceError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a format name is not registered
 */
export class UnknownFormatError extends FormatCheckError {
  public readonly format: string
  public readonly availableFormats: readonly string[]

  constructor(
    format: string,
    availableFormats: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(
      `Unknown format '${format}'. Available formats: ${availableFormats.join(', ') || 'none'}`,
      'UNKNOWN_FORMAT',
      { format, availableFormats, ...context }
    )
    this.name = 'UnknownFormatError'
    this.format = format
    this.availableFormats = availableFormats
  }
}

// ==================== GUARDS ====================

/**
 * Message shared by the validators that reject empty input
 */
export const INPUT_VALUE_CANNOT_BE_EMPTY = 'Input value cannot be empty.'

/**
 * Validates that a string is neither null, undefined nor empty.
 * Whitespace-only strings pass: validators do not trim.
 */
export function requireNonEmpty(
  value: string | null | undefined,
  parameterName: string,
  message: string = INPUT_VALUE_CANNOT_BE_EMPTY
): string {
  if (value === null || value === undefined || value.length === 0) {
    throw new InvalidArgumentError(parameterName, message)
  }
  return value
}

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string,
  message: string = `Missing required parameter: '${parameterName}'`
): T {
  if (value === null || value === undefined) {
    throw new NullReferenceError(parameterName, message)
  }
  return value
}

/**
 * Check if an error is a formatcheck error
 */
export function isFormatCheckError(error: unknown): error is FormatCheckError {
  return error instanceof FormatCheckError
}
