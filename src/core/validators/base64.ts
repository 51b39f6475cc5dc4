import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Standard alphabet, groups of four, optional `=`/`==` padding on the last group
 */
const BASE64_REGEX =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/**
 * Checks if a string is valid standard Base64.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isBase64(value: string | null | undefined): boolean {
  return BASE64_REGEX.test(requireNonEmpty(value, 'value'))
}
