import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Hours 0-23 with an optional leading zero, minutes, optional seconds and an
 * optional ` AM`/` PM` suffix in any case.
 */
const TIME_REGEX =
  /^(?:2[0-3]|1\d|0?\d):[0-5]\d(?::[0-5]\d)?(?: [APap][Mm])?$/

/**
 * Checks if a string is a time of day.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isTime('23:59:59')  // true
 * isTime('1:30 PM')   // true
 * isTime('24:00:00')  // false
 * ```
 */
export function isTime(time: string | null | undefined): boolean {
  return TIME_REGEX.test(requireNonEmpty(time, 'time'))
}
