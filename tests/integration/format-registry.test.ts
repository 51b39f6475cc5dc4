import { describe, it, expect } from 'vitest'
import {
  validate,
  listFormats,
  getFormatDefinition,
  isCPF,
  isCNPJ,
  normalizeCPF,
  UnknownFormatError,
} from '../../src/index.js'

describe('Integration: Format Registry', () => {
  it('answers the same way for repeated calls', () => {
    const samples: Array<[string, string]> = [
      ['email', 'john.doe@example.com'],
      ['date', '15-Jan-2023'],
      ['time', '1:30 PM'],
      ['port', '65535'],
      ['decimal', '2.5f'],
    ]

    for (const [format, value] of samples) {
      const first = validate(format, value)
      expect(validate(format, value)).toBe(first)
      expect(first).toBe(true)
    }
  })

  it('agrees with the direct validator functions', () => {
    expect(validate('cpf', '123.456.789-09')).toBe(isCPF('123.456.789-09'))
    expect(validate('cnpj', '11222333000181')).toBe(isCNPJ('11222333000181'))
  })

  it('accepts every example and rejects every counter-example', () => {
    for (const format of listFormats()) {
      const definition = getFormatDefinition(format)
      expect(definition).toBeDefined()
      if (definition) {
        expect(validate(format, definition.example), format).toBe(true)
        expect(validate(format, definition.counterExample), format).toBe(false)
      }
    }
  })

  it('strips punctuation from a CPF before checking digits', () => {
    expect(normalizeCPF('111.444.777-35')).toBe('11144477735')
    expect(validate('cpf', '11144477735')).toBe(true)
  })

  it('fails loudly for unregistered formats', () => {
    expect(() => validate('iban', 'GB00TEST')).toThrow(UnknownFormatError)
  })
})
