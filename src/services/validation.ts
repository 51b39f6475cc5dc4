/**
 * Validation functions for format validator configuration
 * @module services/validation
 */

import { isFormatName, listFormats } from '../core/validators/registry.js'
import type { FormatName } from '../core/validators/types.js'
import { ServiceConfigurationError } from './service-error.js'

/**
 * Format validator configuration options
 */
export interface FormatValidatorOptions {
  /** Custom name for the validator instance - default: '<format>-validator' */
  name?: string

  /** Custom description - default: the format's description */
  description?: string

  /** Treat null, undefined and empty values as valid (optional fields) - default: false */
  allowEmpty?: boolean
}

/**
 * Validates the format and options passed to a format validator factory
 * @param format - The requested format name
 * @param options - The options to validate
 * @throws {ServiceConfigurationError} If the format or an option is invalid
 */
export function validateFormatValidatorOptions(
  format: string,
  options: FormatValidatorOptions
): asserts format is FormatName {
  if (!isFormatName(format)) {
    throw new ServiceConfigurationError(
      'format',
      `must be one of: ${listFormats().join(', ')}`,
      { providedFormat: format }
    )
  }

  const { name, description, allowEmpty } = options

  if (name !== undefined) {
    if (typeof name !== 'string' || name.length === 0) {
      throw new ServiceConfigurationError(
        'name',
        'must be a non-empty string'
      )
    }

    if (name.trim() !== name) {
      throw new ServiceConfigurationError(
        'name',
        'must not have leading or trailing whitespace',
        { providedName: name }
      )
    }
  }

  if (description !== undefined && typeof description !== 'string') {
    throw new ServiceConfigurationError('description', 'must be a string')
  }

  if (allowEmpty !== undefined && typeof allowEmpty !== 'boolean') {
    throw new ServiceConfigurationError('allowEmpty', 'must be a boolean')
  }
}
