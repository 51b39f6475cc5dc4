// Validators
export {
  isAscii,
  isBase64,
  isCEP,
  isCNPJ,
  isCPF,
  isDate,
  isDecimal,
  isEmail,
  isMACAddress,
  isMD5,
  isNumber,
  isPort,
  isPostalCode,
  isTime,
} from './core/validators/index.js'

// Validator helpers
export {
  normalizeCPF,
  normalizeCNPJ,
  computeMod11CheckDigit,
  hasRepeatedDigits,
  findDateFormat,
  parseWithFormat,
  resolveDateFields,
  daysInMonth,
  compileDateFormat,
  DATE_FORMATS,
  DATE_TIME_FORMATS,
  parseFloatLiteral,
  POSTAL_CODE_PATTERNS,
  type ParsedDateFields,
  type DateToken,
  type DateFormatSegment,
  type DateFormatDescriptor,
} from './core/validators/index.js'

// Format registry
export {
  validate,
  getValidator,
  getFormatDefinition,
  listFormats,
  isFormatName,
  type FormatName,
  type FormatPredicate,
  type FormatDefinition,
} from './core/validators/index.js'

// Errors
export {
  FormatCheckError,
  InvalidArgumentError,
  NullReferenceError,
  UnknownFormatError,
  INPUT_VALUE_CANNOT_BE_EMPTY,
  requireNonEmpty,
  requireNonNull,
  isFormatCheckError,
} from './utils/errors.js'

// Services
export * from './services/index.js'
