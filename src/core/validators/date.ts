/**
 * Date Validator
 * Full-string parsing against a fixed, ordered list of layouts
 * @module core/validators/date
 */

import { requireNonEmpty } from '../../utils/errors.js'
import {
  DATE_FORMATS,
  DATE_TIME_FORMATS,
  type DateFormatDescriptor,
} from './date-formats.js'

/**
 * Fields read from a date string, before resolution
 */
export interface ParsedDateFields {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

/**
 * English month names, matched case-sensitively
 */
const FULL_MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const

const SHORT_MONTH_NAMES = FULL_MONTH_NAMES.map((name) => name.slice(0, 3))

const MAX_YEAR = 999_999_999

/**
 * Two-digit years count from this base
 */
const TWO_DIGIT_YEAR_BASE = 2000

/**
 * Number of days in a month, leap years included.
 *
 * @example
 * ```typescript
 * daysInMonth(2024, 2)  // 29
 * daysInMonth(2023, 2)  // 28
 * daysInMonth(2023, 4)  // 30
 * ```
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
    return isLeapYear ? 29 : 28
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31
}

function countDigits(input: string, start: number): number {
  let end = start
  while (end < input.length && /\d/.test(input.charAt(end))) {
    end++
  }
  return end - start
}

/**
 * Widest signed year field, leading zeros included
 */
const MAX_YEAR_DIGITS = 19

/**
 * Reads a four-digit year, or a `+` followed by five to nineteen digits.
 * Returns the year and the cursor after it.
 */
function readYear(
  input: string,
  pos: number
): { value: number; next: number } | null {
  const signed = input.charAt(pos) === '+'
  const start = signed ? pos + 1 : pos
  const length = countDigits(input, start)

  if (signed ? length <= 4 || length > MAX_YEAR_DIGITS : length !== 4) {
    return null
  }

  return {
    value: Number(input.slice(start, start + length)),
    next: start + length,
  }
}

function readFixedDigits(
  input: string,
  pos: number,
  width: number
): number | null {
  const text = input.slice(pos, pos + width)
  return /^\d+$/.test(text) && text.length === width ? Number(text) : null
}

function readMonthName(
  input: string,
  pos: number,
  names: readonly string[]
): { value: number; next: number } | null {
  const index = names.findIndex((name) => input.startsWith(name, pos))
  const name = names[index]
  return name === undefined ? null : { value: index + 1, next: pos + name.length }
}

/**
 * Reads the fields of a date string laid out exactly as the descriptor says.
 * Returns null when the layout does not cover the whole string.
 * Values are not range-checked here; see {@link resolveDateFields}.
 *
 * @example
 * ```typescript
 * parseWithFormat('15-Jan-2023', compileDateFormat('dd-MMM-yyyy'))
 * // { year: 2023, month: 1, day: 15, hour: 0, minute: 0, second: 0 }
 * ```
 */
export function parseWithFormat(
  input: string,
  format: DateFormatDescriptor
): ParsedDateFields | null {
  const fields: ParsedDateFields = {
    year: 0,
    month: 0,
    day: 0,
    hour: 0,
    minute: 0,
    second: 0,
  }
  let pos = 0

  for (const segment of format.segments) {
    if (segment.kind === 'literal') {
      if (!input.startsWith(segment.text, pos)) {
        return null
      }
      pos += segment.text.length
      continue
    }

    switch (segment.token) {
      case 'yyyy': {
        const year = readYear(input, pos)
        if (!year) return null
        fields.year = year.value
        pos = year.next
        break
      }
      case 'MMM':
      case 'MMMM': {
        const month = readMonthName(
          input,
          pos,
          segment.token === 'MMM' ? SHORT_MONTH_NAMES : FULL_MONTH_NAMES
        )
        if (!month) return null
        fields.month = month.value
        pos = month.next
        break
      }
      default: {
        const value = readFixedDigits(input, pos, 2)
        if (value === null) return null
        pos += 2

        if (segment.token === 'yy') fields.year = TWO_DIGIT_YEAR_BASE + value
        else if (segment.token === 'MM') fields.month = value
        else if (segment.token === 'dd') fields.day = value
        else if (segment.token === 'HH') fields.hour = value
        else if (segment.token === 'mm') fields.minute = value
        else fields.second = value
      }
    }
  }

  return pos === input.length ? fields : null
}

/**
 * Range-checks parsed fields the way a smart resolver does.
 *
 * Month must be 1-12 and day 1-31; a day past the end of its month is moved
 * back to the last day, so 30 February resolves rather than failing.
 * `24:00:00` resolves to midnight of the next day.
 * Returns the resolved fields, or null when a value is out of range.
 */
export function resolveDateFields(
  fields: ParsedDateFields
): ParsedDateFields | null {
  const { year, month, day, hour, minute, second } = fields

  if (year < 1 || year > MAX_YEAR) return null
  if (month < 1 || month > 12) return null
  if (day < 1 || day > 31) return null
  if (minute > 59 || second > 59) return null

  const endOfDay = hour === 24 && minute === 0 && second === 0
  if (hour > 23 && !endOfDay) return null

  return {
    year,
    month,
    day: Math.min(day, daysInMonth(year, month)),
    hour: endOfDay ? 0 : hour,
    minute,
    second,
  }
}

/**
 * Finds the first layout, date-only ones first, that parses and resolves the
 * whole string.
 *
 * @example
 * ```typescript
 * findDateFormat('2023-01-15')?.pattern           // 'yyyy-MM-dd'
 * findDateFormat('2023-01-15T10:30:00')?.pattern  // "yyyy-MM-dd'T'HH:mm:ss"
 * findDateFormat('15/01/2023')                    // undefined
 * ```
 */
export function findDateFormat(
  dateStr: string
): DateFormatDescriptor | undefined {
  return [...DATE_FORMATS, ...DATE_TIME_FORMATS].find((format) => {
    const fields = parseWithFormat(dateStr, format)
    return fields !== null && resolveDateFields(fields) !== null
  })
}

/**
 * Checks if a string is a date or date-time in one of the supported layouts.
 *
 * Date-only layouts: `yyyy-MM-dd`, `MM/dd/yyyy`, `dd-MM-yyyy`, `yyyy/MM/dd`,
 * `dd.MM.yyyy`, `yyyy.MM.dd`, `dd-MMM-yyyy`, `dd-MMMM-yyyy`, `dd-MMM-yy`,
 * `dd-MMMM-yy`. Date-time layouts add `HH:mm:ss` to most of them
 * (`yyyy-MM-dd'T'HH:mm:ss`, `yyyy-MM-dd HH:mm:ss`, ...).
 *
 * @throws {InvalidArgumentError} If the value is null, undefined or empty
 *
 * @example
 * ```typescript
 * isDate('2023-01-15')            // true
 * isDate('15-January-2023')       // true
 * isDate('2023-01-15 08:00:00')   // true
 * isDate('15/13/2023')            // false
 * ```
 */
export function isDate(dateStr: string | null | undefined): boolean {
  const input = requireNonEmpty(
    dateStr,
    'dateStr',
    'Date string cannot be null or empty'
  )

  return findDateFormat(input) !== undefined
}
