/**
 * CPF Validator
 * Brazilian individual taxpayer number (Cadastro de Pessoas Físicas)
 * @module core/validators/cpf
 */

import { requireNonEmpty } from '../../utils/errors.js'
import { computeMod11CheckDigit, hasRepeatedDigits } from './check-digits.js'

/**
 * 000.000.000-00 with every separator optional
 */
const CPF_FORMAT_REGEX = /^\d{3}\.?\d{3}\.?\d{3}-?\d{2}$/

const FIRST_DIGIT_WEIGHTS = [10, 9, 8, 7, 6, 5, 4, 3, 2]
const SECOND_DIGIT_WEIGHTS = [11, 10, 9, 8, 7, 6, 5, 4, 3, 2]

/**
 * Strips CPF punctuation, leaving the digits
 */
export function normalizeCPF(cpf: string): string {
  return cpf.replace(/\D/g, '')
}

/**
 * Checks if a string is a valid CPF, formatted (`111.444.777-35`) or bare
 * (`11144477735`), with both check digits correct.
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 */
export function isCPF(cpf: string | null | undefined): boolean {
  const input = requireNonEmpty(cpf, 'cpf')

  if (!CPF_FORMAT_REGEX.test(input)) {
    return false
  }

  const digits = normalizeCPF(input)

  if (hasRepeatedDigits(digits)) {
    return false
  }

  return (
    computeMod11CheckDigit(digits.slice(0, 9), FIRST_DIGIT_WEIGHTS) ===
      Number(digits.charAt(9)) &&
    computeMod11CheckDigit(digits.slice(0, 10), SECOND_DIGIT_WEIGHTS) ===
      Number(digits.charAt(10))
  )
}
