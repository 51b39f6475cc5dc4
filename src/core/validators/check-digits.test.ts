import { describe, it, expect } from 'vitest'
import { computeMod11CheckDigit, hasRepeatedDigits } from './check-digits.js'

describe('computeMod11CheckDigit', () => {
  it('computes both CPF check digits', () => {
    expect(computeMod11CheckDigit('111444777', [10, 9, 8, 7, 6, 5, 4, 3, 2])).toBe(3)
    expect(
      computeMod11CheckDigit('1114447773', [11, 10, 9, 8, 7, 6, 5, 4, 3, 2])
    ).toBe(5)
  })

  it('maps a remainder below 2 to zero', () => {
    // 123456789 sums to 210, and 210 % 11 is 1
    expect(computeMod11CheckDigit('123456789', [10, 9, 8, 7, 6, 5, 4, 3, 2])).toBe(0)
  })

  it('computes the first CNPJ check digit', () => {
    expect(
      computeMod11CheckDigit('112223330001', [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2])
    ).toBe(8)
  })
})

describe('hasRepeatedDigits', () => {
  it('detects a single repeated digit', () => {
    expect(hasRepeatedDigits('00000000000')).toBe(true)
    expect(hasRepeatedDigits('99999999999999')).toBe(true)
  })

  it('returns false for mixed digits', () => {
    expect(hasRepeatedDigits('11144477735')).toBe(false)
  })
})
