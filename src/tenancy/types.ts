/**
 * Tenancy type definitions
 * @module tenancy/types
 */

import type { CanonicalStore } from '../store/types.js'
import type { Tenant, TenantFeatures, UserRole } from '../types/entities.js'

export const DEFAULT_TENANT_FEATURES: TenantFeatures = {
  events: true,
  volunteers: true,
  recruitment: false,
  publishingVisibility: false,
}

/**
 * Who is asking, and for which store. No tenant slug means the main store.
 */
export interface RequestContext {
  tenantSlug?: string | null
  actor?: {
    username?: string
    role?: UserRole
    /** Tenant the user belongs to; null for main-store users */
    tenantId: string | null
  } | null
}

export interface TenantStoreHandle {
  /** Null for the main store */
  tenant: Tenant | null
  store: CanonicalStore
}

export interface ProvisionRequest {
  slug: string
  name: string
  adminEmail: string
  /** Defaults to `<slug>-admin` */
  adminUsername?: string
  features?: Partial<TenantFeatures>
}

export type ProvisionResult =
  | { status: 'provisioned'; tenant: Tenant }
  | { status: 'already-exists'; tenant: Tenant }

/** Row count per collection name */
export type TenantStats = Record<string, number>
