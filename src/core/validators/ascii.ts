import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Checks that every UTF-16 code unit of a string is below 128.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isAscii('hello')  // true
 * isAscii('olá')    // false
 * ```
 */
export function isAscii(value: string | null | undefined): boolean {
  const input = requireNonEmpty(value, 'value')

  for (let i = 0; i < input.length; i++) {
    if (input.charCodeAt(i) >= 128) {
      return false
    }
  }

  return true
}
