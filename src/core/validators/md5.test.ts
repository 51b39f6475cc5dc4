import { describe, it, expect } from 'vitest'
import { isMD5 } from './md5.js'
import { InvalidArgumentError } from '../../utils/errors.js'

describe('isMD5', () => {
  it('accepts 32 hex characters in either case', () => {
    expect(isMD5('d41d8cd98f00b204e9800998ecf8427e')).toBe(true)
    expect(isMD5('D41D8CD98F00B204E9800998ECF8427E')).toBe(true)
  })

  it('rejects 31 and 33 characters', () => {
    expect(isMD5('d41d8cd98f00b204e9800998ecf8427')).toBe(false)
    expect(isMD5('d41d8cd98f00b204e9800998ecf8427e0')).toBe(false)
  })

  it('rejects non-hex characters', () => {
    expect(isMD5('g41d8cd98f00b204e9800998ecf8427e')).toBe(false)
  })

  it('throws InvalidArgumentError for null and empty input', () => {
    expect(() => isMD5(null)).toThrow(InvalidArgumentError)
    expect(() => isMD5('')).toThrow(InvalidArgumentError)
  })
})
