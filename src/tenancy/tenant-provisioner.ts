/**
 * Tenant provisioning and lifecycle
 * @module tenancy/tenant-provisioner
 */

import { v4 as uuidv4 } from 'uuid'
import { isValidEmail, normalizeEmail } from '../core/normalizers/email.js'
import type { StoreProvider } from '../store/providers.js'
import {
  COLLECTION_NAMES,
  REFERENCE_COLLECTIONS,
  type CanonicalStore,
  type ReferenceCollection,
} from '../store/types.js'
import type { Tenant, User } from '../types/entities.js'
import { errorMessage, InvalidParameterError, requireNonEmptyString } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { validateTenantSlug } from './slug.js'
import { TenantNotFoundError, TenantStillActiveError } from './tenant-error.js'
import {
  DEFAULT_TENANT_FEATURES,
  type ProvisionRequest,
  type ProvisionResult,
  type TenantStats,
} from './types.js'

export interface TenantProvisionerOptions {
  now?: () => Date
  generateId?: () => string
  logger?: Logger
}

async function copyCollection<K extends ReferenceCollection>(
  name: K,
  from: CanonicalStore,
  to: CanonicalStore
): Promise<number> {
  const rows = await from.repository(name).findMany()
  const target = to.repository(name)
  for (const row of rows) {
    await target.upsert(row)
  }
  return target.count()
}

/**
 * Allocates and manages tenant stores.
 *
 * Provisioning allocates the store (schema included), copies a snapshot of
 * the reference collections, records the copied row counts and creates the
 * tenant's first administrator. The tenant record is written to the main
 * store last, so a slug with a tenant record is fully provisioned and a
 * second call for it returns `already-exists` without touching anything.
 *
 * @example
 * ```typescript
 * const provisioner = new TenantProvisioner(provider)
 * const result = await provisioner.provision({
 *   slug: 'kck',
 *   name: 'Kansas City Kansas Public Schools',
 *   adminEmail: 'admin@example.org',
 * })
 * ```
 */
export class TenantProvisioner {
  private readonly now: () => Date
  private readonly generateId: () => string
  private readonly logger: Logger
  /** Provisioning runs in flight, one per slug */
  private readonly inFlight = new Map<string, Promise<ProvisionResult>>()

  constructor(
    private readonly provider: StoreProvider,
    options: TenantProvisionerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? uuidv4
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Provisions a tenant. Calls for the same slug run one after another, so a
   * concurrent repeat sees the finished tenant and returns `already-exists`.
   *
   * @throws {InvalidTenantSlugError} when the slug is malformed or reserved
   */
  async provision(request: ProvisionRequest): Promise<ProvisionResult> {
    const slug = validateTenantSlug(request.slug)
    const name = requireNonEmptyString(request.name, 'name').trim()
    const adminEmail = normalizeEmail(request.adminEmail)
    if (!adminEmail || !isValidEmail(adminEmail)) {
      throw new InvalidParameterError('adminEmail', request.adminEmail, 'must be an email address')
    }

    const previous = this.inFlight.get(slug)
    const run = this.provisionAfter(previous, { ...request, slug, name, adminEmail })
    this.inFlight.set(slug, run)
    try {
      return await run
    } finally {
      if (this.inFlight.get(slug) === run) this.inFlight.delete(slug)
    }
  }

  private async provisionAfter(
    previous: Promise<ProvisionResult> | undefined,
    request: ProvisionRequest
  ): Promise<ProvisionResult> {
    if (previous) {
      // The earlier caller receives its own failure
      await previous.then(
        () => undefined,
        () => undefined
      )
    }
    return this.provisionSlug(request)
  }

  private async provisionSlug(request: ProvisionRequest): Promise<ProvisionResult> {
    const { slug, name, adminEmail } = request
    const main = this.provider.main
    const existing = await main.tenants.findOne({ slug })
    if (existing) {
      this.logger.info('Tenant already provisioned', { slug, tenantId: existing.id })
      return { status: 'already-exists', tenant: existing }
    }

    if (await this.provider.tenantStoreExists(slug)) {
      this.logger.warn('Removing store left by an incomplete provisioning run', {
        slug,
        location: this.provider.tenantLocation(slug),
      })
      await this.provider.destroyTenantStore(slug)
    }

    const tenantId = this.generateId()
    const timestamp = this.now().toISOString()
    const store = await this.provider.createTenantStore(slug)
    this.logger.info('Tenant store allocated', { slug, location: store.location })

    try {
      const referenceCounts = await store.transaction(async (tx) => {
        const counts: Record<string, number> = {}
        for (const collection of REFERENCE_COLLECTIONS) {
          counts[collection] = await copyCollection(collection, main, tx)
        }
        return counts
      })
      this.logger.info('Reference data copied', { slug, ...referenceCounts })

      const admin: User = {
        id: this.generateId(),
        createdAt: timestamp,
        updatedAt: timestamp,
        username: request.adminUsername?.trim() || `${slug}-admin`,
        email: adminEmail,
        role: 'admin',
        tenantId,
      }
      await store.users.insert(admin)
      this.logger.info('Tenant admin created', { slug, username: admin.username })

      const tenant: Tenant = {
        id: tenantId,
        createdAt: timestamp,
        updatedAt: timestamp,
        slug,
        name,
        storeLocation: store.location,
        active: true,
        features: { ...DEFAULT_TENANT_FEATURES, ...request.features },
        provisionedAt: timestamp,
        deactivatedAt: null,
        referenceCounts,
      }
      await main.tenants.insert(tenant)
      this.logger.info('Tenant provisioned', { slug, tenantId })
      return { status: 'provisioned', tenant }
    } catch (error) {
      this.logger.error('Tenant provisioning failed; releasing store', {
        slug,
        error: errorMessage(error),
      })
      await this.provider.destroyTenantStore(slug)
      throw error
    }
  }

  async getTenant(slug: string): Promise<Tenant> {
    const tenant = await this.provider.main.tenants.findOne({ slug })
    if (!tenant) {
      throw new TenantNotFoundError(slug)
    }
    return tenant
  }

  async listTenants(): Promise<Tenant[]> {
    return this.provider.main.tenants.findMany()
  }

  /**
   * Marks the tenant inactive; its store is kept
   */
  async deactivate(slug: string): Promise<Tenant> {
    const tenant = await this.getTenant(slug)
    if (!tenant.active) return tenant
    const timestamp = this.now().toISOString()
    const updated = await this.provider.main.tenants.update(tenant.id, {
      active: false,
      deactivatedAt: timestamp,
      updatedAt: timestamp,
    })
    this.logger.info('Tenant deactivated', { slug })
    return updated
  }

  /**
   * Physically removes an inactive tenant's store and its tenant record
   *
   * @throws {TenantStillActiveError} when the tenant is active
   */
  async destroy(slug: string): Promise<void> {
    const tenant = await this.getTenant(slug)
    if (tenant.active) {
      throw new TenantStillActiveError(slug)
    }
    await this.provider.destroyTenantStore(slug)
    await this.provider.main.tenants.delete(tenant.id)
    this.logger.info('Tenant destroyed', { slug })
  }

  /**
   * Row counts per collection in the tenant's store
   */
  async tenantStats(slug: string): Promise<TenantStats> {
    await this.getTenant(slug)
    const store = await this.provider.openTenantStore(slug)
    const stats: TenantStats = {}
    for (const collection of COLLECTION_NAMES) {
      stats[collection] = await store.repository(collection).count()
    }
    return stats
  }
}
