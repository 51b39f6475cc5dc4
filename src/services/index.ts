/**
 * Services module - runs format checks behind the validation service plugin contract
 * @module services
 */

// Types
export type {
  ServiceType,
  ServiceErrorType,
  Logger,
  RequestMetadata,
  HealthCheckResult,
  ServiceContext,
  ServiceTiming,
  ServiceErrorInfo,
  ServiceResult,
  ServicePlugin,
  ValidationCheck,
  ValidationInput,
  ValidationOutput,
  ValidationService,
} from './types.js'

// Error classes
export {
  ServiceError,
  ServiceConfigurationError,
  ServiceAbortedError,
  isServiceError,
  toServiceError,
} from './service-error.js'

// Configuration
export {
  validateFormatValidatorOptions,
  type FormatValidatorOptions,
} from './validation.js'

// Execution context
export {
  buildServiceContext,
  generateCorrelationId,
  createSilentLogger,
  createPrefixedLogger,
  resolveServiceLogger,
  type ExecutionContextOptions,
} from './execution-context.js'

// Plugins
export * from './plugins/index.js'
