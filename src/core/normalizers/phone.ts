import { parsePhoneNumber, isValidPhoneNumber, type CountryCode } from 'libphonenumber-js'

/**
 * Default region for numbers written without a country code.
 */
const DEFAULT_COUNTRY: CountryCode = 'US'

/**
 * Validates a phone number using libphonenumber-js.
 */
export function isValidPhone(phone: string, country: CountryCode = DEFAULT_COUNTRY): boolean {
  if (!phone) {
    return false
  }

  try {
    return isValidPhoneNumber(phone, country)
  } catch {
    return false
  }
}

/**
 * Normalizes a phone number to E.164.
 *
 * @returns The E.164 form, or null when the value is empty or not a valid
 * number
 *
 * @example
 * ```typescript
 * normalizePhone('(213) 373-4253') // '+12133734253'
 * normalizePhone('call me')        // null
 * ```
 */
export function normalizePhone(
  value: unknown,
  country: CountryCode = DEFAULT_COUNTRY
): string | null {
  if (value === null || value === undefined) return null

  const phone = String(value).trim()
  if (!phone) return null

  try {
    const parsed = parsePhoneNumber(phone, country)
    return parsed.isValid() ? parsed.format('E.164') : null
  } catch {
    return null
  }
}

/**
 * Normalizes every number, dropping invalid ones and duplicates
 */
export function normalizePhones(values: readonly unknown[]): string[] {
  const result: string[] = []
  for (const value of values) {
    const phone = normalizePhone(value)
    if (phone && !result.includes(phone)) {
      result.push(phone)
    }
  }
  return result
}
