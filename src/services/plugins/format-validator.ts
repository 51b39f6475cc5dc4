/**
 * Format Validator
 * Runs a registered format check as a validation service plugin
 * @module services/plugins/format-validator
 */

import type {
  ValidationService,
  ValidationInput,
  ValidationOutput,
  ValidationCheck,
  ServiceResult,
  ServiceContext,
  HealthCheckResult,
} from '../types.js'
import { getFormatDefinition, listFormats } from '../../core/validators/registry.js'
import type {
  FormatDefinition,
  FormatName,
} from '../../core/validators/types.js'
import { isFormatCheckError } from '../../utils/errors.js'
import {
  validateFormatValidatorOptions,
  type FormatValidatorOptions,
} from '../validation.js'
import {
  buildServiceContext,
  resolveServiceLogger,
} from '../execution-context.js'
import {
  ServiceAbortedError,
  toServiceError,
  type ServiceError,
} from '../service-error.js'

/**
 * Default format validator options
 */
const DEFAULT_OPTIONS: Required<
  Omit<FormatValidatorOptions, 'name' | 'description'>
> = {
  allowEmpty: false,
}

/**
 * Creates a successful service result
 */
function createSuccessResult(
  data: ValidationOutput,
  startedAt: Date
): ServiceResult<ValidationOutput> {
  const completedAt = new Date()
  return {
    success: true,
    data,
    timing: {
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    },
    cached: false,
  }
}

/**
 * Creates a failed service result
 */
function createFailureResult(
  error: ServiceError,
  startedAt: Date
): ServiceResult<ValidationOutput> {
  const completedAt = new Date()
  return {
    success: false,
    error: error.toErrorInfo(),
    timing: {
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    },
    cached: false,
  }
}

/**
 * Turns an input value into the string a validator checks.
 * Numbers are accepted for ports only; anything else that is not a string
 * yields null.
 */
function toCheckedText(format: FormatName, value: unknown): string | null {
  if (typeof value === 'string') {
    return value
  }
  if (format === 'port' && typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return null
}

function lookupDefinition(format: FormatName): FormatDefinition {
  const definition = getFormatDefinition(format)
  if (!definition) {
    throw new Error(`Format '${format}' has no registered definition`)
  }
  return definition
}

/**
 * Creates a validation service for one format.
 *
 * @throws {ServiceConfigurationError} If the format is unknown or an option is invalid
 *
 * @example
 * ```typescript
 * const cepValidator = createFormatValidator('cep')
 *
 * // Optional field: empty values pass
 * const optionalEmail = createFormatValidator('email', { allowEmpty: true })
 *
 * const result = await cepValidator.execute({
 *   field: 'zip',
 *   value: '01310-100'
 * })
 * ```
 */
export function createFormatValidator(
  format: string,
  options: FormatValidatorOptions = {}
): ValidationService {
  validateFormatValidatorOptions(format, options)

  const definition = lookupDefinition(format)
  const formatName = definition.name
  const {
    name = `${format}-validator`,
    description = definition.description,
    allowEmpty = DEFAULT_OPTIONS.allowEmpty,
  } = options

  return {
    name,
    type: 'validation',
    description,

    async execute(
      input: ValidationInput,
      context: ServiceContext = buildServiceContext()
    ): Promise<ServiceResult<ValidationOutput>> {
      const startedAt = new Date()
      const { field, value } = input
      const logger = resolveServiceLogger(name, context)
      const checks: ValidationCheck[] = []

      if (context.signal?.aborted) {
        logger.warn('Aborted before validation', {
          field,
          correlationId: context.metadata.correlationId,
        })
        return createFailureResult(
          new ServiceAbortedError(name, { field }),
          startedAt
        )
      }

      // Check for empty value
      if (value === null || value === undefined || value === '') {
        checks.push({
          name: 'presence',
          passed: allowEmpty,
          message: allowEmpty
            ? `Empty ${definition.label} allowed`
            : `${definition.label} is required`,
        })
        logger.debug('Empty value', {
          field,
          allowEmpty,
          correlationId: context.metadata.correlationId,
        })

        return createSuccessResult(
          allowEmpty
            ? { valid: true, details: { checks } }
            : {
                valid: false,
                details: { checks },
                invalidReason: `${definition.label} is required`,
              },
          startedAt
        )
      }

      const text = toCheckedText(formatName, value)
      if (text === null) {
        checks.push({
          name: 'type',
          passed: false,
          message: `Expected a string, received ${typeof value}`,
        })

        return createSuccessResult(
          {
            valid: false,
            details: { checks },
            invalidReason: `${definition.label} must be a string`,
          },
          startedAt
        )
      }

      checks.push({ name: 'type', passed: true, message: 'Value is a string' })

      let valid: boolean
      try {
        valid = definition.predicate(text)
      } catch (error) {
        if (isFormatCheckError(error)) {
          checks.push({ name: 'format', passed: false, message: error.message })
          return createSuccessResult(
            {
              valid: false,
              details: { checks, normalizedValue: text },
              invalidReason: error.message,
            },
            startedAt
          )
        }

        const serviceError = toServiceError(error, name)
        logger.error('Format check failed', {
          field,
          error: serviceError.message,
          correlationId: context.metadata.correlationId,
        })
        return createFailureResult(serviceError, startedAt)
      }

      checks.push({
        name: 'format',
        passed: valid,
        message: valid
          ? `Valid ${definition.label}`
          : `Invalid ${definition.label} format`,
      })
      logger.debug('Format checked', {
        field,
        format: formatName,
        valid,
        correlationId: context.metadata.correlationId,
      })

      if (!valid) {
        return createSuccessResult(
          {
            valid: false,
            details: { checks, normalizedValue: text },
            invalidReason: `Invalid ${definition.label} format`,
            suggestions: [`Example of a valid value: ${definition.example}`],
          },
          startedAt
        )
      }

      // All checks passed
      return createSuccessResult(
        {
          valid: true,
          details: {
            checks,
            normalizedValue: text,
            confidence: 1.0,
          },
        },
        startedAt
      )
    },

    async healthCheck(): Promise<HealthCheckResult> {
      const startedAt = new Date()

      try {
        // Test with known valid and invalid values
        const exampleAccepted = definition.predicate(definition.example)
        const counterExampleRejected = !definition.predicate(
          definition.counterExample
        )

        const completedAt = new Date()
        return {
          healthy: exampleAccepted && counterExampleRejected,
          responseTimeMs: completedAt.getTime() - startedAt.getTime(),
          checkedAt: completedAt,
          details: {
            format: formatName,
            exampleAccepted,
            counterExampleRejected,
            allowEmpty,
          },
        }
      } catch (error) {
        return {
          healthy: false,
          reason: error instanceof Error ? error.message : 'Unknown error',
          checkedAt: new Date(),
        }
      }
    },
  }
}

/**
 * Creates one validation service per format, every registered format by default.
 *
 * @example
 * ```typescript
 * const [cpf, cnpj] = createFormatValidators(['cpf', 'cnpj'])
 * ```
 */
export function createFormatValidators(
  formats: readonly string[] = listFormats(),
  options: Omit<FormatValidatorOptions, 'name'> = {}
): ValidationService[] {
  return formats.map((format) => createFormatValidator(format, options))
}
