/**
 * Lookup table from format names to validators
 * @module core/validators/registry
 */

import { UnknownFormatError } from '../../utils/errors.js'
import { isAscii } from './ascii.js'
import { isBase64 } from './base64.js'
import { isCEP } from './cep.js'
import { isCNPJ } from './cnpj.js'
import { isCPF } from './cpf.js'
import { isDate } from './date.js'
import { isDecimal } from './decimal.js'
import { isEmail } from './email.js'
import { isMACAddress } from './mac-address.js'
import { isMD5 } from './md5.js'
import { isNumber } from './number.js'
import { isPort } from './port.js'
import { isPostalCode } from './postal-code.js'
import { isTime } from './time.js'
import type { FormatDefinition, FormatName, FormatPredicate } from './types.js'

/**
 * Every built-in format, in registration order
 */
const BUILT_IN_FORMATS: readonly FormatDefinition[] = [
  {
    name: 'ascii',
    label: 'ASCII text',
    description: 'Text made only of ASCII characters',
    predicate: isAscii,
    example: 'hello world',
    counterExample: 'olá',
  },
  {
    name: 'base64',
    label: 'Base64 value',
    description: 'Standard Base64 with optional padding',
    predicate: isBase64,
    example: 'aGVsbG8=',
    counterExample: 'aGVsbG8',
  },
  {
    name: 'cep',
    label: 'CEP',
    description: 'Brazilian postal code with eight digits',
    predicate: isCEP,
    example: '01310-100',
    counterExample: '0131-100',
  },
  {
    name: 'cnpj',
    label: 'CNPJ',
    description: 'Brazilian corporate taxpayer number with valid check digits',
    predicate: isCNPJ,
    example: '11.222.333/0001-81',
    counterExample: '11.222.333/0001-82',
  },
  {
    name: 'cpf',
    label: 'CPF',
    description: 'Brazilian individual taxpayer number with valid check digits',
    predicate: isCPF,
    example: '111.444.777-35',
    counterExample: '111.444.777-36',
  },
  {
    name: 'date',
    label: 'Date',
    description: 'Date or date-time in one of the supported layouts',
    predicate: isDate,
    example: '2023-01-15',
    counterExample: '15/13/2023',
  },
  {
    name: 'decimal',
    label: 'Decimal',
    description: 'Number with a non-zero fractional part',
    predicate: isDecimal,
    example: '10.5',
    counterExample: '10',
  },
  {
    name: 'email',
    label: 'Email',
    description: 'Email address starting with a letter',
    predicate: isEmail,
    example: 'john.doe@example.com',
    counterExample: 'john@@example.com',
  },
  {
    name: 'mac-address',
    label: 'MAC address',
    description: 'Six hex pairs separated by colons or hyphens',
    predicate: isMACAddress,
    example: '00:1A:2B:3C:4D:5E',
    counterExample: '00:1A:2B:3C:4D',
  },
  {
    name: 'md5',
    label: 'MD5 hash',
    description: 'Thirty-two hexadecimal characters',
    predicate: isMD5,
    example: 'd41d8cd98f00b204e9800998ecf8427e',
    counterExample: 'd41d8cd98f00b204e9800998ecf8427',
  },
  {
    name: 'number',
    label: 'Number',
    description: 'Whole number with an optional leading minus',
    predicate: isNumber,
    example: '-42',
    counterExample: '4.2',
  },
  {
    name: 'port',
    label: 'Port',
    description: 'Port number between 0 and 65535',
    predicate: isPort,
    example: '8080',
    counterExample: '65536',
  },
  {
    name: 'postal-code',
    label: 'Postal code',
    description: 'US, Canadian, UK, Japanese, Brazilian or 4/5-digit postal code',
    predicate: isPostalCode,
    example: '90210',
    counterExample: '123456',
  },
  {
    name: 'time',
    label: 'Time',
    description: 'Time of day as HH:mm[:ss] with optional AM/PM',
    predicate: isTime,
    example: '23:59:59',
    counterExample: '24:00:00',
  },
]

/**
 * Frozen copies of the built-in formats; callers share these objects, so
 * neither the table nor an entry can be changed.
 */
const FORMAT_DEFINITIONS: readonly FormatDefinition[] = Object.freeze(
  BUILT_IN_FORMATS.map((definition) => Object.freeze({ ...definition }))
)

const formatRegistry: ReadonlyMap<FormatName, FormatDefinition> = new Map(
  FORMAT_DEFINITIONS.map((definition) => [definition.name, definition])
)

const registeredNames: ReadonlySet<string> = new Set(formatRegistry.keys())

/**
 * Narrows an arbitrary string to a registered format name
 */
export function isFormatName(value: string): value is FormatName {
  return registeredNames.has(value)
}

/**
 * Lists every registered format name in registration order.
 *
 * @example
 * ```typescript
 * listFormats()  // ['ascii', 'base64', 'cep', ...]
 * ```
 */
export function listFormats(): FormatName[] {
  return Array.from(formatRegistry.keys())
}

/**
 * Retrieves the full definition of a format
 */
export function getFormatDefinition(
  name: string
): FormatDefinition | undefined {
  return isFormatName(name) ? formatRegistry.get(name) : undefined
}

/**
 * Retrieves a registered validator by format name.
 *
 * @example
 * ```typescript
 * const check = getValidator('md5')
 * if (check) {
 *   check('d41d8cd98f00b204e9800998ecf8427e') // true
 * }
 * ```
 */
export function getValidator(name: string): FormatPredicate | undefined {
  return getFormatDefinition(name)?.predicate
}

/**
 * Runs the validator registered under a format name.
 * Errors thrown by the validator for degenerate input propagate.
 *
 * @throws {UnknownFormatError} If no format is registered under the name
 *
 * @example
 * ```typescript
 * validate('cep', '12345-678')  // true
 * validate('time', '25:00')     // false
 * ```
 */
export function validate(name: string, value: string): boolean {
  const predicate = getValidator(name)

  if (!predicate) {
    throw new UnknownFormatError(name, listFormats())
  }

  return predicate(value)
}
