/**
 * Ordered date and date-time layouts consulted by the date validator
 * @module core/validators/date-formats
 */

/**
 * Field tokens understood in a layout pattern.
 * - `yyyy` four-digit year (`+` and more digits for larger years)
 * - `yy` two-digit year in 2000-2099
 * - `MM` / `dd` / `HH` / `mm` / `ss` two-digit month, day, hour, minute, second
 * - `MMM` / `MMMM` English short / full month name
 */
export type DateToken =
  | 'yyyy'
  | 'yy'
  | 'MM'
  | 'MMM'
  | 'MMMM'
  | 'dd'
  | 'HH'
  | 'mm'
  | 'ss'

/**
 * One piece of a compiled layout
 */
export type DateFormatSegment =
  | { kind: 'field'; token: DateToken }
  | { kind: 'literal'; text: string }

/**
 * A compiled layout pattern
 */
export interface DateFormatDescriptor {
  /** Source pattern, e.g. `dd-MMM-yyyy HH:mm:ss` */
  readonly pattern: string

  /** Whether the layout carries a time of day */
  readonly hasTime: boolean

  /** Fields and literals in order */
  readonly segments: readonly DateFormatSegment[]
}

const TOKENS: ReadonlySet<string> = new Set<DateToken>([
  'yyyy',
  'yy',
  'MM',
  'MMM',
  'MMMM',
  'dd',
  'HH',
  'mm',
  'ss',
])

function isDateToken(value: string): value is DateToken {
  return TOKENS.has(value)
}

function appendLiteral(segments: DateFormatSegment[], text: string): void {
  const last = segments[segments.length - 1]
  if (last !== undefined && last.kind === 'literal') {
    segments[segments.length - 1] = { kind: 'literal', text: last.text + text }
  } else {
    segments.push({ kind: 'literal', text })
  }
}

/**
 * Compiles a layout pattern into segments.
 * Letter runs are field tokens, text between single quotes is literal and
 * any other character stands for itself.
 *
 * @throws {Error} If the pattern holds an unsupported letter run or an unclosed quote
 *
 * @example
 * ```typescript
 * compileDateFormat("yyyy-MM-dd'T'HH:mm:ss").segments.length  // 11
 * ```
 */
export function compileDateFormat(pattern: string): DateFormatDescriptor {
  const segments: DateFormatSegment[] = []
  let hasTime = false
  let i = 0

  while (i < pattern.length) {
    const char = pattern.charAt(i)

    if (char === "'") {
      const end = pattern.indexOf("'", i + 1)
      if (end === -1) {
        throw new Error(`Unclosed quote in date pattern '${pattern}'`)
      }
      appendLiteral(segments, pattern.slice(i + 1, end))
      i = end + 1
      continue
    }

    if (/[A-Za-z]/.test(char)) {
      let end = i
      while (end < pattern.length && pattern.charAt(end) === char) {
        end++
      }
      const run = pattern.slice(i, end)
      if (!isDateToken(run)) {
        throw new Error(`Unsupported token '${run}' in date pattern '${pattern}'`)
      }
      if (run === 'HH' || run === 'mm' || run === 'ss') {
        hasTime = true
      }
      segments.push({ kind: 'field', token: run })
      i = end
      continue
    }

    appendLiteral(segments, char)
    i++
  }

  return Object.freeze({
    pattern,
    hasTime,
    segments: Object.freeze(segments),
  })
}

/**
 * Date-only layouts in priority order
 */
export const DATE_FORMATS: readonly DateFormatDescriptor[] = Object.freeze(
  [
    'yyyy-MM-dd',
    'MM/dd/yyyy',
    'dd-MM-yyyy',
    'yyyy/MM/dd',
    'dd.MM.yyyy',
    'yyyy.MM.dd',
    'dd-MMM-yyyy',
    'dd-MMMM-yyyy',
    'dd-MMM-yy',
    'dd-MMMM-yy',
  ].map(compileDateFormat)
)

/**
 * Date-time layouts in priority order, tried after every date-only layout
 */
export const DATE_TIME_FORMATS: readonly DateFormatDescriptor[] = Object.freeze(
  [
    "yyyy-MM-dd'T'HH:mm:ss",
    'yyyy-MM-dd HH:mm:ss',
    'yyyy/MM/dd HH:mm:ss',
    'dd-MM-yyyy HH:mm:ss',
    'dd.MM.yyyy HH:mm:ss',
    'yyyy.MM.dd HH:mm:ss',
    'dd-MMM-yyyy HH:mm:ss',
    'dd-MMMM-yyyy HH:mm:ss',
    'dd-MMM-yy HH:mm:ss',
    'dd-MMMM-yy HH:mm:ss',
  ].map(compileDateFormat)
)
