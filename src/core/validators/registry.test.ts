import { describe, it, expect } from 'vitest'
import {
  validate,
  getValidator,
  getFormatDefinition,
  listFormats,
  isFormatName,
} from './registry.js'
import { isMD5 } from './md5.js'
import { UnknownFormatError, InvalidArgumentError } from '../../utils/errors.js'

describe('Format Registry', () => {
  describe('listFormats', () => {
    it('lists every format in registration order', () => {
      expect(listFormats()).toEqual([
        'ascii',
        'base64',
        'cep',
        'cnpj',
        'cpf',
        'date',
        'decimal',
        'email',
        'mac-address',
        'md5',
        'number',
        'port',
        'postal-code',
        'time',
      ])
    })
  })

  describe('isFormatName', () => {
    it('narrows registered names', () => {
      expect(isFormatName('mac-address')).toBe(true)
      expect(isFormatName('phone')).toBe(false)
      expect(isFormatName('MD5')).toBe(false)
    })
  })

  describe('getValidator', () => {
    it('returns the registered predicate', () => {
      expect(getValidator('md5')).toBe(isMD5)
    })

    it('returns undefined for unknown formats', () => {
      expect(getValidator('phone')).toBeUndefined()
    })
  })

  describe('getFormatDefinition', () => {
    it('exposes label and samples', () => {
      const definition = getFormatDefinition('cpf')

      expect(definition?.label).toBe('CPF')
      expect(definition?.example).toBe('111.444.777-35')
    })

    it('has examples each format accepts and counter-examples each rejects', () => {
      for (const name of listFormats()) {
        const definition = getFormatDefinition(name)
        expect(definition).toBeDefined()

        if (definition) {
          expect(definition.predicate(definition.example)).toBe(true)
          expect(definition.predicate(definition.counterExample)).toBe(false)
        }
      }
    })

    it('hands out definitions that cannot be changed', () => {
      const definition = getFormatDefinition('md5')
      expect(definition).toBeDefined()

      if (definition) {
        expect(Object.isFrozen(definition)).toBe(true)
        expect(Reflect.set(definition, 'predicate', () => true)).toBe(false)
        expect(() => Object.assign(definition, { example: 'zz' })).toThrow(TypeError)
      }

      expect(validate('md5', 'zz')).toBe(false)
      expect(getFormatDefinition('md5')?.example).toBe(
        'd41d8cd98f00b204e9800998ecf8427e'
      )
    })
  })

  describe('validate', () => {
    it('runs the named validator', () => {
      expect(validate('cep', '12345-678')).toBe(true)
      expect(validate('time', '25:00')).toBe(false)
    })

    it('lets validator errors propagate', () => {
      expect(() => validate('md5', '')).toThrow(InvalidArgumentError)
    })

    it('throws UnknownFormatError listing the available formats', () => {
      expect(() => validate('phone', '555-0100')).toThrow(UnknownFormatError)
      expect(() => validate('phone', '555-0100')).toThrow(
        "Unknown format 'phone'. Available formats: ascii, base64, cep, cnpj, cpf, date, decimal, email, mac-address, md5, number, port, postal-code, time"
      )
    })
  })
})
