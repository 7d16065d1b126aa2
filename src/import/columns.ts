/**
 * Semantic column mapping for source rows
 * @module import/columns
 */

import { RowInvalidError } from './import-error.js'
import type { ColumnSpec, SourceRow } from './types.js'

/**
 * Header comparison key: lowercase letters and digits only, so that
 * `Teacher Email`, `teacher_email` and `TeacherEmail` all compare equal.
 */
export function headerKey(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, '')
}

export interface ColumnMapping {
  /** Semantic key → header as it appears in the source */
  headers: Map<string, string>
  /** Required keys with no matching header */
  missing: string[]
}

/**
 * Maps each semantic column to the first source header matching one of its
 * aliases.
 *
 * @example
 * ```typescript
 * const mapping = mapColumns(['Session ID', 'Teacher Email'], [
 *   { key: 'sessionId', aliases: ['session id', 'session_id'], required: true },
 *   { key: 'date', aliases: ['date', 'session start'], required: true },
 * ])
 * mapping.missing // ['date']
 * ```
 */
export function mapColumns(
  headers: readonly string[],
  specs: readonly ColumnSpec[]
): ColumnMapping {
  const byKey = new Map<string, string>()
  for (const header of headers) {
    const key = headerKey(header)
    if (!byKey.has(key)) byKey.set(key, header)
  }

  const mapped = new Map<string, string>()
  const missing: string[] = []
  for (const spec of specs) {
    const header = [spec.key, ...spec.aliases]
      .map((alias) => byKey.get(headerKey(alias)))
      .find((found) => found !== undefined)
    if (header !== undefined) {
      mapped.set(spec.key, header)
    } else if (spec.required) {
      missing.push(spec.key)
    }
  }
  return { headers: mapped, missing }
}

/**
 * Read access to one row through its semantic column keys. Cells are
 * trimmed, and blank cells read as absent.
 */
export class SourceRowView {
  constructor(
    readonly raw: SourceRow,
    readonly rowNumber: number,
    private readonly headers: ReadonlyMap<string, string>
  ) {}

  /** Whether the source has a column for `key` at all */
  hasColumn(key: string): boolean {
    return this.headers.has(key)
  }

  get(key: string): string | undefined {
    const header = this.headers.get(key)
    if (header === undefined) return undefined
    const value = this.raw[header]?.trim()
    return value ? value : undefined
  }

  /**
   * @throws {RowInvalidError} when the cell is blank
   */
  require(key: string): string {
    const value = this.get(key)
    if (value === undefined) {
      throw new RowInvalidError(`Missing value for '${key}'`, key)
    }
    return value
  }

  /**
   * Whole number cell, or undefined when blank
   *
   * @throws {RowInvalidError} when the cell is not a number
   */
  getNumber(key: string): number | undefined {
    const value = this.get(key)
    if (value === undefined) return undefined
    const parsed = Number(value.replace(/,/g, ''))
    if (!Number.isFinite(parsed)) {
      throw new RowInvalidError(`Invalid number for '${key}': ${value}`, key, value)
    }
    return parsed
  }
}
