/**
 * Academic-year and semester reporting windows
 *
 * An academic year `YYYY-YYYY` runs from July 1 of its first year up to (not
 * including) July 1 of the next. Fall covers July through December, Spring
 * January through June. All boundaries are UTC midnights.
 *
 * @module status/academic-year
 */

import type { SemesterName } from '../types/entities.js'
import { InvalidParameterError } from '../utils/errors.js'

/**
 * Half-open interval `[start, end)`
 */
export interface ReportingWindow {
  /** `2025-2026`, `Fall 2025`, ... */
  label: string
  start: Date
  end: Date
}

const ACADEMIC_YEAR = /^(\d{4})-(\d{4})$/

/**
 * @throws {InvalidParameterError} unless the value is `YYYY-YYYY` with
 * consecutive years
 */
export function parseAcademicYear(value: string): { startYear: number; endYear: number } {
  const match = ACADEMIC_YEAR.exec(value.trim())
  const startYear = match ? Number(match[1]) : NaN
  const endYear = match ? Number(match[2]) : NaN
  if (!match || endYear !== startYear + 1) {
    throw new InvalidParameterError(
      'academicYear',
      value,
      'must be YYYY-YYYY with consecutive years, e.g. 2025-2026'
    )
  }
  return { startYear, endYear }
}

export function academicYearWindow(academicYear: string): ReportingWindow {
  const { startYear, endYear } = parseAcademicYear(academicYear)
  return {
    label: `${startYear}-${endYear}`,
    start: new Date(Date.UTC(startYear, 6, 1)),
    end: new Date(Date.UTC(endYear, 6, 1)),
  }
}

/**
 * Academic year containing the instant
 *
 * @example
 * ```typescript
 * academicYearOf(new Date('2025-09-15T00:00:00Z')) // '2025-2026'
 * academicYearOf(new Date('2026-03-01T00:00:00Z')) // '2025-2026'
 * ```
 */
export function academicYearOf(date: Date): string {
  const year = date.getUTCFullYear()
  return date.getUTCMonth() >= 6 ? `${year}-${year + 1}` : `${year - 1}-${year}`
}

export function semesterWindow(academicYear: string, semester: SemesterName): ReportingWindow {
  const { startYear, endYear } = parseAcademicYear(academicYear)
  if (semester === 'Fall') {
    return {
      label: `Fall ${startYear}`,
      start: new Date(Date.UTC(startYear, 6, 1)),
      end: new Date(Date.UTC(endYear, 0, 1)),
    }
  }
  return {
    label: `Spring ${endYear}`,
    start: new Date(Date.UTC(endYear, 0, 1)),
    end: new Date(Date.UTC(endYear, 6, 1)),
  }
}

export function semesterOf(date: Date): { academicYear: string; semester: SemesterName } {
  return {
    academicYear: academicYearOf(date),
    semester: date.getUTCMonth() >= 6 ? 'Fall' : 'Spring',
  }
}

/**
 * Whether an ISO timestamp falls inside the window. Unparseable values never do.
 */
export function inWindow(iso: string, window: ReportingWindow): boolean {
  const time = Date.parse(iso)
  return Number.isFinite(time) && time >= window.start.getTime() && time < window.end.getTime()
}
