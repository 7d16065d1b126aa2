/**
 * Tenant slug rules
 * @module tenancy/slug
 */

import { InvalidTenantSlugError } from './tenant-error.js'

export const MAX_SLUG_LENGTH = 50

/**
 * Slugs that collide with application routes
 */
export const RESERVED_SLUGS: readonly string[] = [
  'usage',
  'events',
  'event',
  'virtual',
  'purge',
  'import-sheet',
  'google-sheets',
]

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/

/**
 * @throws {InvalidTenantSlugError} unless the slug is lowercase alphanumeric
 * words joined by single hyphens, at most 50 characters and not reserved
 */
export function validateTenantSlug(slug: string): string {
  if (!slug) {
    throw new InvalidTenantSlugError(slug, 'must not be empty')
  }
  if (slug.length > MAX_SLUG_LENGTH) {
    throw new InvalidTenantSlugError(slug, `must be at most ${MAX_SLUG_LENGTH} characters`)
  }
  if (!SLUG_PATTERN.test(slug)) {
    throw new InvalidTenantSlugError(
      slug,
      'use lowercase letters, digits and single hyphens between words'
    )
  }
  if (RESERVED_SLUGS.includes(slug)) {
    throw new InvalidTenantSlugError(slug, 'is reserved')
  }
  return slug
}

export function isValidTenantSlug(slug: string): boolean {
  try {
    validateTenantSlug(slug)
    return true
  } catch (error) {
    if (error instanceof InvalidTenantSlugError) return false
    throw error
  }
}
