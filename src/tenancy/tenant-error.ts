/**
 * Tenancy error classes
 * @module tenancy/tenant-error
 */

import { ReconcileError } from '../utils/errors.js'

/**
 * Base error class for tenant routing and provisioning errors
 */
export class TenantError extends ReconcileError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'TenantError'
  }
}

/**
 * A request would read or write across a tenant boundary. Never retried and
 * never answered by falling back to another store.
 */
export class TenantIsolationError extends TenantError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TENANT_ISOLATION', context)
    this.name = 'TenantIsolationError'
  }
}

export class TenantNotFoundError extends TenantError {
  constructor(slug: string) {
    super(`Tenant not found: ${slug}`, 'TENANT_NOT_FOUND', { slug })
    this.name = 'TenantNotFoundError'
  }
}

export class TenantInactiveError extends TenantError {
  constructor(slug: string) {
    super(`Tenant '${slug}' is deactivated`, 'TENANT_INACTIVE', { slug })
    this.name = 'TenantInactiveError'
  }
}

/**
 * Error thrown when a tenant slug breaks the naming rules
 *
 * @example
 * ```typescript
 * throw new InvalidTenantSlugError('Events', 'must be lowercase')
 * ```
 */
export class InvalidTenantSlugError extends TenantError {
  readonly slug: string

  constructor(slug: string, reason: string) {
    super(`Invalid tenant slug '${slug}': ${reason}`, 'INVALID_TENANT_SLUG', { slug, reason })
    this.name = 'InvalidTenantSlugError'
    this.slug = slug
  }
}

/**
 * Error thrown when a tenant must be deactivated before its store is destroyed
 */
export class TenantStillActiveError extends TenantError {
  constructor(slug: string) {
    super(`Tenant '${slug}' must be deactivated before it is destroyed`, 'TENANT_STILL_ACTIVE', {
      slug,
    })
    this.name = 'TenantStillActiveError'
  }
}
