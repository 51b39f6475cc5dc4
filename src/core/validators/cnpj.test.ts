import { describe, it, expect } from 'vitest'
import { isCNPJ, normalizeCNPJ } from './cnpj.js'
import { InvalidArgumentError } from '../../utils/errors.js'

describe('CNPJ Validator', () => {
  describe('normalizeCNPJ', () => {
    it('strips punctuation', () => {
      expect(normalizeCNPJ('11.222.333/0001-81')).toBe('11222333000181')
    })
  })

  describe('isCNPJ', () => {
    it('accepts formatted and bare numbers with correct check digits', () => {
      expect(isCNPJ('11.222.333/0001-81')).toBe(true)
      expect(isCNPJ('11222333000181')).toBe(true)
    })

    it('rejects a wrong first or second check digit', () => {
      expect(isCNPJ('11.222.333/0001-71')).toBe(false)
      expect(isCNPJ('11.222.333/0001-82')).toBe(false)
    })

    it('rejects numbers made of one repeated digit', () => {
      expect(isCNPJ('00.000.000/0000-00')).toBe(false)
    })

    it('rejects the wrong length or separators', () => {
      expect(isCNPJ('11.222.333/0001-8')).toBe(false)
      expect(isCNPJ('11-222-333/0001-81')).toBe(false)
    })

    it('throws InvalidArgumentError for null and empty input', () => {
      expect(() => isCNPJ(undefined)).toThrow(InvalidArgumentError)
      expect(() => isCNPJ('')).toThrow(InvalidArgumentError)
    })
  })
})
