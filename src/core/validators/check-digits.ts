/**
 * Mod-11 check digit helpers shared by the CPF and CNPJ validators
 * @module core/validators/check-digits
 */

/**
 * Computes a mod-11 check digit: the weighted digit sum's remainder maps to
 * 0 when below 2, otherwise to 11 minus the remainder.
 *
 * This is the same digit the CPF rule derives as `(sum * 10) % 11` with 10
 * folded to 0.
 *
 * @example
 * ```typescript
 * computeMod11CheckDigit('111444777', [10, 9, 8, 7, 6, 5, 4, 3, 2])  // 3
 * ```
 */
export function computeMod11CheckDigit(
  digits: string,
  weights: readonly number[]
): number {
  const sum = weights.reduce(
    (total, weight, i) => total + Number(digits.charAt(i)) * weight,
    0
  )

  const remainder = sum % 11
  return remainder < 2 ? 0 : 11 - remainder
}

/**
 * Checks if every digit is the same (e.g. 00000000000)
 */
export function hasRepeatedDigits(digits: string): boolean {
  return /^(\d)\1+$/.test(digits)
}
