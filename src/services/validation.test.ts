/**
 * Tests for format validator configuration validation
 */

import { describe, it, expect } from 'vitest'
import { validateFormatValidatorOptions } from './validation.js'
import { ServiceConfigurationError } from './service-error.js'

const ALL_FORMATS =
  'ascii, base64, cep, cnpj, cpf, date, decimal, email, mac-address, md5, number, port, postal-code, time'

describe('validateFormatValidatorOptions', () => {
  it('accepts a known format with no options', () => {
    expect(() => validateFormatValidatorOptions('cep', {})).not.toThrow()
  })

  it('accepts a fully specified options object', () => {
    expect(() =>
      validateFormatValidatorOptions('email', {
        name: 'contact-email',
        description: 'Checks contact email addresses',
        allowEmpty: true,
      })
    ).not.toThrow()
  })

  it('rejects an unknown format and lists the available formats', () => {
    try {
      validateFormatValidatorOptions('zip', {})
      expect.fail('should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ServiceConfigurationError)
      if (error instanceof ServiceConfigurationError) {
        expect(error.field).toBe('format')
        expect(error.reason).toBe(`must be one of: ${ALL_FORMATS}`)
        expect(error.context).toMatchObject({ providedFormat: 'zip' })
      }
    }
  })

  it('rejects format names that differ in case', () => {
    expect(() => validateFormatValidatorOptions('CEP', {})).toThrow(
      ServiceConfigurationError
    )
  })

  it('rejects an empty name', () => {
    expect(() => validateFormatValidatorOptions('cep', { name: '' })).toThrow(
      "Invalid service configuration for 'name': must be a non-empty string"
    )
  })

  it('rejects a non-string name', () => {
    expect(() =>
      // @ts-expect-error - testing invalid input
      validateFormatValidatorOptions('cep', { name: 42 })
    ).toThrow("Invalid service configuration for 'name': must be a non-empty string")
  })

  it('rejects a name with surrounding whitespace', () => {
    expect(() =>
      validateFormatValidatorOptions('cep', { name: ' cep-check ' })
    ).toThrow(
      "Invalid service configuration for 'name': must not have leading or trailing whitespace"
    )
  })

  it('rejects a non-string description', () => {
    expect(() =>
      // @ts-expect-error - testing invalid input
      validateFormatValidatorOptions('cep', { description: 7 })
    ).toThrow("Invalid service configuration for 'description': must be a string")
  })

  it('rejects a non-boolean allowEmpty', () => {
    expect(() =>
      // @ts-expect-error - testing invalid input
      validateFormatValidatorOptions('cep', { allowEmpty: 'yes' })
    ).toThrow("Invalid service configuration for 'allowEmpty': must be a boolean")
  })
})
