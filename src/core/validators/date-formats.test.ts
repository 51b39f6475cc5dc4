import { describe, it, expect } from 'vitest'
import {
  compileDateFormat,
  DATE_FORMATS,
  DATE_TIME_FORMATS,
} from './date-formats.js'

describe('compileDateFormat', () => {
  it('splits a pattern into fields and literals', () => {
    const format = compileDateFormat('dd.MM.yyyy')

    expect(format.pattern).toBe('dd.MM.yyyy')
    expect(format.hasTime).toBe(false)
    expect(format.segments).toEqual([
      { kind: 'field', token: 'dd' },
      { kind: 'literal', text: '.' },
      { kind: 'field', token: 'MM' },
      { kind: 'literal', text: '.' },
      { kind: 'field', token: 'yyyy' },
    ])
  })

  it('reads quoted text as a literal and flags time fields', () => {
    const format = compileDateFormat("yyyy-MM-dd'T'HH:mm:ss")

    expect(format.hasTime).toBe(true)
    expect(format.segments).toHaveLength(11)
    expect(format.segments[5]).toEqual({ kind: 'literal', text: 'T' })
  })

  it('merges adjacent literals', () => {
    const format = compileDateFormat("HH'h'-mm")

    expect(format.segments).toEqual([
      { kind: 'field', token: 'HH' },
      { kind: 'literal', text: 'h-' },
      { kind: 'field', token: 'mm' },
    ])
  })

  it('distinguishes short and full month names', () => {
    expect(compileDateFormat('MMM').segments).toEqual([
      { kind: 'field', token: 'MMM' },
    ])
    expect(compileDateFormat('MMMM').segments).toEqual([
      { kind: 'field', token: 'MMMM' },
    ])
  })

  it('throws for unsupported tokens', () => {
    expect(() => compileDateFormat('YYYY-MM-dd')).toThrow(
      "Unsupported token 'YYYY' in date pattern 'YYYY-MM-dd'"
    )
  })

  it('throws for an unclosed quote', () => {
    expect(() => compileDateFormat("yyyy'T")).toThrow(
      "Unclosed quote in date pattern 'yyyy'T'"
    )
  })
})

describe('format tables', () => {
  it('lists ten date-only layouts in priority order', () => {
    expect(DATE_FORMATS.map((format) => format.pattern)).toEqual([
      'yyyy-MM-dd',
      'MM/dd/yyyy',
      'dd-MM-yyyy',
      'yyyy/MM/dd',
      'dd.MM.yyyy',
      'yyyy.MM.dd',
      'dd-MMM-yyyy',
      'dd-MMMM-yyyy',
      'dd-MMM-yy',
      'dd-MMMM-yy',
    ])
    expect(DATE_FORMATS.every((format) => !format.hasTime)).toBe(true)
  })

  it('lists ten date-time layouts', () => {
    expect(DATE_TIME_FORMATS).toHaveLength(10)
    expect(DATE_TIME_FORMATS[0].pattern).toBe("yyyy-MM-dd'T'HH:mm:ss")
    expect(DATE_TIME_FORMATS.every((format) => format.hasTime)).toBe(true)
  })

  it('freezes the tables', () => {
    expect(Object.isFrozen(DATE_FORMATS)).toBe(true)
    expect(Object.isFrozen(DATE_TIME_FORMATS)).toBe(true)
    expect(Object.isFrozen(DATE_FORMATS[0])).toBe(true)
  })
})
