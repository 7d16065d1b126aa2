/**
 * Date-time parsing for source exports
 * @module core/normalizers/date
 */

/**
 * Components of a parsed date-time.
 */
interface DateTimeParts {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  millisecond: number
  /** Offset east of UTC in minutes; 0 when the value carried no zone */
  offsetMinutes: number
}

/** `2025-10-02`, `2025-10-02T14:30:00Z`, `2025-10-02 14:30:00`, `...+05:30` */
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i

/** `10/02/2025`, `10/2/2025 14:30`, `10/02/2025 2:30:00 PM` */
const US_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]M)?)?$/i

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : Number.parseInt(value, 10)
}

function parseOffset(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0
  const sign = zone.startsWith('-') ? -1 : 1
  const digits = zone.slice(1).replace(':', '')
  return sign * (toInt(digits.slice(0, 2)) * 60 + toInt(digits.slice(2)))
}

function matchIso(text: string): DateTimeParts | null {
  const m = ISO_PATTERN.exec(text)
  if (!m) return null
  return {
    year: toInt(m[1]),
    month: toInt(m[2]),
    day: toInt(m[3]),
    hour: toInt(m[4]),
    minute: toInt(m[5]),
    second: toInt(m[6]),
    millisecond: m[7] === undefined ? 0 : toInt(m[7].padEnd(3, '0')),
    offsetMinutes: parseOffset(m[8]),
  }
}

function matchUs(text: string): DateTimeParts | null {
  const m = US_PATTERN.exec(text)
  if (!m) return null
  let hour = toInt(m[4])
  const meridiem = m[7]?.toUpperCase()
  if (meridiem) {
    if (hour < 1 || hour > 12) return null
    if (meridiem === 'PM' && hour !== 12) hour += 12
    if (meridiem === 'AM' && hour === 12) hour = 0
  }
  return {
    year: toInt(m[3]),
    month: toInt(m[1]),
    day: toInt(m[2]),
    hour,
    minute: toInt(m[5]),
    second: toInt(m[6]),
    millisecond: 0,
    offsetMinutes: 0,
  }
}

function toDate(parts: DateTimeParts): Date | null {
  const { year, month, day, hour, minute, second, millisecond } = parts
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null
  }
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millisecond)
  const date = new Date(utc)
  // Date.UTC rolls 02/30 over into March; reject instead
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null
  }
  return new Date(utc - parts.offsetMinutes * 60_000)
}

/**
 * Parses a date-time from an import file. Accepts ISO-8601 (with `T` or a
 * space, optional seconds, fraction and zone) and US `MM/DD/YYYY` with an
 * optional 24-hour or AM/PM time. Values without a zone are read as UTC.
 *
 * @returns The instant, or null when the value is empty or not a real date
 *
 * @example
 * ```typescript
 * parseSourceDateTime('2025-10-02 14:30:00')?.toISOString() // '2025-10-02T14:30:00.000Z'
 * parseSourceDateTime('10/02/2025 2:30 PM')?.toISOString()  // '2025-10-02T14:30:00.000Z'
 * parseSourceDateTime('02/30/2025')                         // null
 * ```
 */
export function parseSourceDateTime(value: unknown): Date | null {
  if (value === null || value === undefined) return null
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value
  }
  const text = String(value).trim()
  if (!text) return null

  const parts = matchIso(text) ?? matchUs(text)
  return parts ? toDate(parts) : null
}

/**
 * ISO string form of {@link parseSourceDateTime}
 */
export function toIsoDateTime(value: unknown): string | null {
  return parseSourceDateTime(value)?.toISOString() ?? null
}
