/**
 * CEP Validator
 * Brazilian postal code (Código de Endereçamento Postal)
 * @module core/validators/cep
 */

const MIN_CEP_LENGTH = 8
const MAX_CEP_LENGTH = 10
const CEP_DIGITS = 8

/**
 * Checks if a string is a valid CEP: exactly eight digits once every
 * non-digit character (usually the `-` separator) is removed, within a raw
 * length of 8 to 10 characters.
 *
 * Unlike the other validators this one has no empty-input guard: an empty
 * string is simply too short and returns false.
 *
 * @example
 * ```typescript
 * isCEP('12345-678')  // true
 * isCEP('12345678')   // true
 * isCEP('1234567')    // false
 * ```
 */
export function isCEP(cep: string): boolean {
  if (cep.length < MIN_CEP_LENGTH || cep.length > MAX_CEP_LENGTH) {
    return false
  }

  const digits = cep.replace(/\D/g, '')

  if (digits.length !== CEP_DIGITS) {
    return false
  }

  return Number.isSafeInteger(Number.parseInt(digits, 10))
}
