/**
 * Service plugin type definitions for running format checks as validation services
 * @module services/types
 */

/**
 * Service types supported by the plugin contract
 */
export type ServiceType = 'validation'

/**
 * Error types that can occur during service execution
 */
export type ServiceErrorType = 'validation' | 'aborted' | 'unknown'

/**
 * Logger interface for service execution logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Request metadata for service calls
 */
export interface RequestMetadata {
  /** Unique correlation ID for tracing */
  correlationId: string

  /** When the request started */
  startedAt: Date

  /** Original caller information */
  caller?: string
}

/**
 * Health check result for a service
 */
export interface HealthCheckResult {
  /** Whether the service is healthy */
  healthy: boolean

  /** Service response time in milliseconds */
  responseTimeMs?: number

  /** Reason for unhealthy status */
  reason?: string

  /** Timestamp of health check */
  checkedAt: Date

  /** Additional health details */
  details?: Record<string, unknown>
}

/**
 * Context provided to service during execution
 */
export interface ServiceContext {
  /** Request metadata (correlation ID, timestamps, etc.) */
  metadata: RequestMetadata

  /** Logger interface */
  logger?: Logger

  /** Validation is refused once this signal has aborted */
  signal?: AbortSignal
}

/**
 * Timing information for a service call
 */
export interface ServiceTiming {
  /** When the call started */
  startedAt: Date

  /** When the call completed */
  completedAt: Date

  /** Duration in milliseconds */
  durationMs: number
}

/**
 * Error information from a service call
 */
export interface ServiceErrorInfo {
  /** Error code */
  code: string

  /** Error message */
  message: string

  /** Error type for categorization */
  type: ServiceErrorType

  /** Whether this error is eligible for retry */
  retryable: boolean

  /** Additional error context */
  context?: Record<string, unknown>
}

/**
 * Result from a service call
 */
export interface ServiceResult<T = unknown> {
  /** Whether the call succeeded */
  success: boolean

  /** Result data (if success) */
  data?: T

  /** Error information (if failure) */
  error?: ServiceErrorInfo

  /** Timing information */
  timing: ServiceTiming

  /** Whether result was cached */
  cached: boolean

  /** Service-specific metadata */
  metadata?: Record<string, unknown>
}

/**
 * Base interface for service plugins
 */
export interface ServicePlugin<TInput = unknown, TOutput = unknown> {
  /** Unique identifier for the service */
  name: string

  /** Service type */
  type: ServiceType

  /** Human-readable description */
  description?: string

  /** Execute the service call; a bare context is built when none is given */
  execute(input: TInput, context?: ServiceContext): Promise<ServiceResult<TOutput>>

  /** Health check for the service */
  healthCheck?(): Promise<HealthCheckResult>
}

/**
 * Validation check performed by a validation service
 */
export interface ValidationCheck {
  /** Check name */
  name: string

  /** Whether check passed */
  passed: boolean

  /** Details about the check */
  message?: string
}

/**
 * Input for validation services
 */
export interface ValidationInput {
  /** Field being validated */
  field: string

  /** Value to validate */
  value: unknown
}

/**
 * Output from validation services
 */
export interface ValidationOutput {
  /** Whether the value is valid */
  valid: boolean

  /** Validation details */
  details?: {
    /** Specific validation checks performed */
    checks: ValidationCheck[]

    /** Value as it was checked */
    normalizedValue?: unknown

    /** Confidence score (0-1) */
    confidence?: number
  }

  /** Reason for invalid (if not valid) */
  invalidReason?: string

  /** Suggestions for correction */
  suggestions?: string[]
}

/**
 * Service that validates field values
 */
export interface ValidationService extends ServicePlugin<ValidationInput, ValidationOutput> {
  type: 'validation'
}
