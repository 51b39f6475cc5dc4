import { requireNonEmpty } from '../../utils/errors.js'

/**
 * Six hex pairs. Each separator is matched on its own, so `:` and `-` may
 * be mixed within one address.
 */
const MAC_ADDRESS_REGEX = /^([0-9A-Fa-f]{2}[:-]){5}([0-9A-Fa-f]{2})$/

/**
 * Checks if a string is a MAC address such as `00:1A:2B:3C:4D:5E`.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isMACAddress(macAddress: string | null | undefined): boolean {
  return MAC_ADDRESS_REGEX.test(requireNonEmpty(macAddress, 'macAddress'))
}
