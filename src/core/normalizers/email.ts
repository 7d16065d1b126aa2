/**
 * Email normalization used as the dedupe key for volunteers and teachers
 * @module core/normalizers/email
 */

const LOCAL_PART = /^[a-zA-Z0-9_][a-zA-Z0-9._+%'_-]*[a-zA-Z0-9_]$|^[a-zA-Z0-9_]$/
const DOMAIN_LABEL = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/

/**
 * Validates if a string looks like a valid email address.
 * Basic RFC 5322 shape only: one `@`, a sane local part, a dotted domain
 * with a TLD of at least two characters.
 *
 * @example
 * ```typescript
 * isValidEmail('teacher@kckps.org') // true
 * isValidEmail('not-an-email')      // false
 * ```
 */
export function isValidEmail(email: string): boolean {
  const parts = email.split('@')
  if (parts.length !== 2) return false

  const [localPart, domain] = parts
  if (!localPart || !domain || !LOCAL_PART.test(localPart)) {
    return false
  }

  const labels = domain.split('.')
  if (labels.length < 2) return false
  if (!labels.every((label) => DOMAIN_LABEL.test(label))) return false

  return labels[labels.length - 1].length >= 2
}

/**
 * Trims and lowercases an email address.
 *
 * Plus-addressing is kept: `jo+pathful@school.org` and `jo@school.org` are
 * different dedupe keys.
 *
 * @returns The normalized address, or null when the input is empty or not an
 * email address
 *
 * @example
 * ```typescript
 * normalizeEmail('  Jane.Doe@Example.ORG ') // 'jane.doe@example.org'
 * normalizeEmail('')                       // null
 * ```
 */
export function normalizeEmail(value: unknown): string | null {
  if (value === null || value === undefined) return null
  const email = String(value).trim().toLowerCase()
  if (!email || !isValidEmail(email)) return null
  return email
}

/**
 * Normalizes every address, dropping invalid ones and duplicates while
 * keeping first-seen order
 */
export function normalizeEmails(values: readonly unknown[]): string[] {
  const result: string[] = []
  for (const value of values) {
    const email = normalizeEmail(value)
    if (email && !result.includes(email)) {
      result.push(email)
    }
  }
  return result
}
