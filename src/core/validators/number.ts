import { requireNonEmpty } from '../../utils/errors.js'

const INTEGER_REGEX = /^-?\d+$/

/**
 * Checks if a string is a whole number with an optional leading minus.
 * No `+` sign, fraction, exponent or whitespace.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isNumber(value: string | null | undefined): boolean {
  return INTEGER_REGEX.test(requireNonEmpty(value, 'value'))
}
