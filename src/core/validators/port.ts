import { requireNonEmpty } from '../../utils/errors.js'

const MIN_PORT = 0
const MAX_PORT = 65535

/**
 * Optionally signed run of decimal digits, as accepted by integer parsing
 */
const SIGNED_INTEGER_REGEX = /^[+-]?\d+$/

function isInPortRange(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT
}

/**
 * Checks if a value is a TCP/UDP port number (0-65535).
 *
 * A number must be an integer in range. A string is parsed as a signed
 * integer first; text that does not parse returns false rather than throwing.
 *
 * @throws {InvalidArgumentError} If a string value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isPort(8080)      // true
 * isPort(65536)     // false
 * isPort('+443')    // true
 * isPort('http')    // false
 * ```
 */
export function isPort(port: number): boolean
export function isPort(port: string | null | undefined): boolean
export function isPort(port: number | string | null | undefined): boolean {
  if (typeof port === 'number') {
    return isInPortRange(port)
  }

  const input = requireNonEmpty(port, 'port')

  if (!SIGNED_INTEGER_REGEX.test(input)) {
    return false
  }

  return isInPortRange(Number.parseInt(input, 10))
}
