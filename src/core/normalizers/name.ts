/**
 * Person-name parsing and comparison keys
 * @module core/normalizers/name
 */

/**
 * Components of a parsed name.
 */
export interface NameParts {
  /** Title stripped from the front (Mr., Dr., ...) */
  title?: string
  /** Given name(s); everything before the surname */
  firstName: string
  /** Family name; the last token */
  lastName: string
  /** Suffix stripped from the end (Jr., III, ...) */
  suffix?: string
}

/**
 * Titles that appear before names in roster and virtual-platform exports.
 */
const TITLES = ['mr', 'mrs', 'ms', 'miss', 'mx', 'dr', 'prof', 'coach']

/**
 * Suffixes that appear after names.
 */
const SUFFIXES = ['jr', 'sr', 'ii', 'iii', 'iv', 'phd', 'md', 'edd']

function bare(token: string): string {
  return token.toLowerCase().replace(/[.,]/g, '')
}

/**
 * Splits a display name into first and last name. A single token is treated
 * as the last name, and a trailing `Last, First` form is reordered.
 *
 * @example
 * ```typescript
 * parseFullName('Ms. Jane Q. Doe')  // { title: 'Ms.', firstName: 'Jane Q.', lastName: 'Doe' }
 * parseFullName('Doe, Jane')        // { firstName: 'Jane', lastName: 'Doe' }
 * parseFullName('Madonna')          // { firstName: '', lastName: 'Madonna' }
 * ```
 */
export function parseFullName(value: unknown): NameParts {
  if (value === null || value === undefined) {
    return { firstName: '', lastName: '' }
  }
  let name = String(value).trim().replace(/\s+/g, ' ')

  const comma = name.indexOf(',')
  if (comma > 0 && !SUFFIXES.includes(bare(name.slice(comma + 1).trim()))) {
    name = `${name.slice(comma + 1).trim()} ${name.slice(0, comma).trim()}`
  }

  const tokens = name.split(' ').filter(Boolean)
  const parts: NameParts = { firstName: '', lastName: '' }

  if (tokens.length > 1 && TITLES.includes(bare(tokens[0]))) {
    parts.title = tokens.shift()
  }
  if (tokens.length > 1 && SUFFIXES.includes(bare(tokens[tokens.length - 1]))) {
    parts.suffix = tokens.pop()
    const last = tokens.length - 1
    tokens[last] = tokens[last].replace(/,$/, '')
  }

  if (tokens.length === 0) return parts
  parts.lastName = tokens[tokens.length - 1]
  parts.firstName = tokens.slice(0, -1).join(' ')
  return parts
}

/**
 * Comparison key for fuzzy name matching: lowercase, hyphens become spaces,
 * and periods, commas and apostrophes are removed.
 *
 * @example
 * ```typescript
 * nameMatchKey("Mary-Kate O'Neil") // 'mary kate oneil'
 * ```
 */
export function nameMatchKey(value: unknown): string {
  if (value === null || value === undefined) return ''
  return String(value)
    .toLowerCase()
    .replace(/-/g, ' ')
    .replace(/[.,']/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Joins first and last name into a display name
 */
export function displayName(firstName: string, lastName: string): string {
  return [firstName.trim(), lastName.trim()].filter(Boolean).join(' ')
}
