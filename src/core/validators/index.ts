/**
 * Built-in format validators
 * @module core/validators
 */

export { isAscii } from './ascii.js'
export { isBase64 } from './base64.js'
export { isCEP } from './cep.js'
export { isCNPJ, normalizeCNPJ } from './cnpj.js'
export { isCPF, normalizeCPF } from './cpf.js'
export { computeMod11CheckDigit, hasRepeatedDigits } from './check-digits.js'
export {
  isDate,
  findDateFormat,
  parseWithFormat,
  resolveDateFields,
  daysInMonth,
  type ParsedDateFields,
} from './date.js'
export {
  DATE_FORMATS,
  DATE_TIME_FORMATS,
  compileDateFormat,
  type DateToken,
  type DateFormatSegment,
  type DateFormatDescriptor,
} from './date-formats.js'
export { isDecimal, parseFloatLiteral } from './decimal.js'
export { isEmail } from './email.js'
export { isMACAddress } from './mac-address.js'
export { isMD5 } from './md5.js'
export { isNumber } from './number.js'
export { isPort } from './port.js'
export { isPostalCode, POSTAL_CODE_PATTERNS } from './postal-code.js'
export { isTime } from './time.js'
export {
  validate,
  getValidator,
  getFormatDefinition,
  listFormats,
  isFormatName,
} from './registry.js'
export type {
  FormatName,
  FormatPredicate,
  FormatDefinition,
} from './types.js'
