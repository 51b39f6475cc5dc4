/**
 * CNPJ Validator
 * Brazilian corporate taxpayer number (Cadastro Nacional da Pessoa Jurídica)
 * @module core/validators/cnpj
 */

import { requireNonEmpty } from '../../utils/errors.js'
import { computeMod11CheckDigit, hasRepeatedDigits } from './check-digits.js'

/**
 * 00.000.000/0000-00 with every separator optional
 */
const CNPJ_FORMAT_REGEX = /^\d{2}\.?\d{3}\.?\d{3}\/?\d{4}-?\d{2}$/

const FIRST_DIGIT_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]
const SECOND_DIGIT_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]

/**
 * Strips CNPJ punctuation, leaving the digits
 */
export function normalizeCNPJ(cnpj: string): string {
  return cnpj.replace(/\D/g, '')
}

/**
 * Checks if a string is a valid CNPJ, formatted (`11.222.333/0001-81`) or
 * bare (`11222333000181`), with both check digits correct.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isCNPJ(cnpj: string | null | undefined): boolean {
  const input = requireNonEmpty(cnpj, 'cnpj')

  if (!CNPJ_FORMAT_REGEX.test(input)) {
    return false
  }

  const digits = normalizeCNPJ(input)

  if (hasRepeatedDigits(digits)) {
    return false
  }

  return (
    computeMod11CheckDigit(digits.slice(0, 12), FIRST_DIGIT_WEIGHTS) ===
      Number(digits.charAt(12)) &&
    computeMod11CheckDigit(digits.slice(0, 13), SECOND_DIGIT_WEIGHTS) ===
      Number(digits.charAt(13))
  )
}
