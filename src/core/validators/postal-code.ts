/**
 * Postal Code Validator
 * Matches a postal code against a fixed list of regional layouts
 * @module core/validators/postal-code
 */

import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Regional postal code layouts, tried in order.
 * The US and five-digit layouts overlap; only the combined result matters.
 */
export const POSTAL_CODE_PATTERNS: ReadonlyArray<{
  region: string
  pattern: RegExp
}> = [
  { region: 'US ZIP', pattern: /^\d{5}(-\d{4})?$/ },
  { region: 'Canada', pattern: /^[A-Za-z]\d[A-Za-z] \d[A-Za-z]\d$/ },
  { region: 'UK', pattern: /^[A-Za-z]{1,2}\d[A-Za-z\d]? \d[A-Za-z]{2}$/ },
  // France, Spain, Italy, Germany, US
  { region: 'five-digit', pattern: /^\d{5}$/ },
  // Netherlands, South Africa, Switzerland
  { region: 'four-digit', pattern: /^\d{4}$/ },
  { region: 'Japan', pattern: /^\d{3}-\d{4}$/ },
  { region: 'Brazil', pattern: /^\d{5}-\d{3}$/ },
]

/**
 * Checks if a string matches any known postal code layout.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isPostalCode('90210-1234')  // true (US ZIP+4)
 * isPostalCode('K1A 0B1')     // true (Canada)
 * isPostalCode('SW1A 1AA')    // true (UK)
 * isPostalCode('123-4567')    // true (Japan)
 * isPostalCode('123456')      // false
 * ```
 */
export function isPostalCode(postalCode: string | null | undefined): boolean {
  const input = requireNonEmpty(
    postalCode,
    'postalCode',
    'Input value must be a string.'
  )

  return POSTAL_CODE_PATTERNS.some(({ pattern }) => pattern.test(input))
}
