/**
 * Decimal Validator
 * @module core/validators/decimal
 */

import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Floating-point literal: optional sign, digits with an optional fraction
 * (either side of the point may be empty, not both), optional exponent and
 * an optional float/double suffix.
 */
const FLOAT_LITERAL_REGEX =
  /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[fFdD]?$/

/**
 * Hexadecimal floating-point literal: `0x` mantissa with an optional point,
 * a required binary exponent and an optional suffix, e.g. `0x1.4p1`
 */
const HEX_FLOAT_LITERAL_REGEX =
  /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)[fFdD]?$/

/**
 * Space and control characters trimmed before parsing
 */
const EDGE_CONTROL_CHARACTERS = /^[\u0000- ]+|[\u0000- ]+$/g

/**
 * Parses a floating-point literal, returning null when the text is not one.
 *
 * @example
 * ```typescript
 * parseFloatLiteral(' 10.5 ')  // 10.5
 * parseFloatLiteral('2.5f')    // 2.5
 * parseFloatLiteral('1e3')     // 1000
 * parseFloatLiteral('0x1.4p1') // 2.5
 * parseFloatLiteral('abc')     // null
 * ```
 */
export function parseFloatLiteral(value: string): number | null {
  const trimmed = value.replace(EDGE_CONTROL_CHARACTERS, '')

  if (FLOAT_LITERAL_REGEX.test(trimmed)) {
    return Number.parseFloat(trimmed.replace(/[fFdD]$/, ''))
  }

  return parseHexFloatLiteral(trimmed)
}

function parseHexFloatLiteral(literal: string): number | null {
  const match = HEX_FLOAT_LITERAL_REGEX.exec(literal)
  if (!match) {
    return null
  }

  const [, sign, integerDigits = '', fractionDigits = '', exponent = '0'] = match
  const digits = integerDigits + fractionDigits
  if (digits.length === 0) {
    return null
  }

  const mantissa = Number.parseInt(digits, 16) / 16 ** fractionDigits.length
  const magnitude = mantissa * 2 ** Number.parseInt(exponent, 10)
  return sign === '-' ? -magnitude : magnitude
}

/**
 * Checks if a string is a number with a non-zero fractional part.
 * Integers and integer-valued floats (`10`, `10.0`, `1.5e1`) are not
 * decimals; neither is unparseable text.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isDecimal('10.5')  // true
 * isDecimal('10')    // false
 * isDecimal('abc')   // false
 * ```
 */
export function isDecimal(value: string | null | undefined): boolean {
  const parsed = parseFloatLiteral(requireNonEmpty(value, 'value'))

  if (parsed === null || !Number.isFinite(parsed)) {
    return false
  }

  return parsed % 1 !== 0
}
