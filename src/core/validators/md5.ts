import { requireNonEmpty } from '../../utils/errors.js'

const MD5_REGEX = /^[a-fA-F0-9]{32}$/

/**
 * Checks if a string looks like an MD5 digest (32 hex characters).
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isMD5(value: string | null | undefined): boolean {
  return MD5_REGEX.test(requireNonEmpty(value, 'value'))
}
