/**
 * Email Validator
 * Syntactic email check with extra structural rules on the local part and domain
 * @module core/validators/email
 */

import { requireNonNull } from '../../utils/errors.js'

const STARTS_WITH_NON_LETTER_REGEX = /^[^a-zA-Z]/

// No multiline flag: `$` does not match before a final line break
const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/

const DIGIT_REGEX = /^\d$/

/**
 * Checks if a string is a valid email address.
 *
 * Beyond the `local@domain.tld` shape, an address is rejected when it:
 * - starts with anything but a letter
 * - has a digit right after the `@` or right after the last `.`
 * - has `..` in the local part or the domain, or a local part ending in `.`
 * - has the same segment twice in a row at the end of its dot-split
 *   (the split runs over the whole address, not just the domain)
 * - has more than one `@`
 * - repeats a domain label anywhere
 *
 * The empty string is not special-cased and simply fails the shape check.
 *
 * @throws {NullReferenceError} If the email is null or undefined
 *
 * @example
 * ```typescript
 * isEmail('john.doe@example.com')      // true
 * isEmail('1john@example.com')         // false
 * isEmail('john@example.example.com')  // false
 * ```
 */
export function isEmail(email: string | null | undefined): boolean {
  const input = requireNonNull(email, 'email', 'Email cannot be null')

  if (STARTS_WITH_NON_LETTER_REGEX.test(input)) {
    return false
  }

  if (!EMAIL_REGEX.test(input)) {
    return false
  }

  const atIndex = input.indexOf('@')
  const localPart = input.slice(0, atIndex)
  const domain = input.slice(atIndex + 1)

  if (DIGIT_REGEX.test(input.charAt(atIndex + 1))) {
    return false
  }

  if (DIGIT_REGEX.test(input.charAt(input.lastIndexOf('.') + 1))) {
    return false
  }

  if (localPart.includes('..') || localPart.endsWith('.')) {
    return false
  }

  const parts = input.split('.')
  if (
    parts.length > 2 &&
    parts[parts.length - 2] === parts[parts.length - 3]
  ) {
    return false
  }

  if (input.split('@').length - 1 > 1) {
    return false
  }

  if (domain.includes('..')) {
    return false
  }

  const domainLabels = domain.split('.')
  return new Set(domainLabels).size === domainLabels.length
}
