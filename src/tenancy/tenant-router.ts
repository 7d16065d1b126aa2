/**
 * Routes a request context to the main store or one tenant's store
 * @module tenancy/tenant-router
 */

import type { StoreProvider } from '../store/providers.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { validateTenantSlug } from './slug.js'
import {
  TenantInactiveError,
  TenantIsolationError,
  TenantNotFoundError,
} from './tenant-error.js'
import type { RequestContext, TenantStoreHandle } from './types.js'

export interface TenantRouterOptions {
  logger?: Logger
}

/**
 * Resolves the store a request may use. Contexts that mix scopes are
 * rejected instead of guessed:
 * - a tenant user asking for the main store
 * - a tenant user asking for another tenant's store
 * - a main-store user who is not an administrator asking for a tenant store
 *
 * @example
 * ```typescript
 * const router = new TenantRouter(provider)
 * const { store } = await router.resolveStore({ tenantSlug: 'kck' })
 * ```
 */
export class TenantRouter {
  private readonly logger: Logger

  constructor(
    private readonly provider: StoreProvider,
    options: TenantRouterOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
  }

  async resolveStore(context: RequestContext = {}): Promise<TenantStoreHandle> {
    const slug = context.tenantSlug?.trim() || null
    const actor = context.actor ?? null

    if (!slug) {
      if (actor?.tenantId) {
        this.reject('Tenant user cannot use the main store', {
          actor: actor.username,
          actorTenantId: actor.tenantId,
        })
      }
      return { tenant: null, store: this.provider.main }
    }

    validateTenantSlug(slug)
    const tenant = await this.provider.main.tenants.findOne({ slug })
    if (!tenant) {
      throw new TenantNotFoundError(slug)
    }

    if (actor) {
      if (actor.tenantId !== null && actor.tenantId !== tenant.id) {
        this.reject(`User of another tenant cannot use tenant '${slug}'`, {
          actor: actor.username,
          actorTenantId: actor.tenantId,
          tenantId: tenant.id,
        })
      }
      if (actor.tenantId === null && actor.role !== 'admin') {
        this.reject(`Only administrators of the main store may use tenant '${slug}'`, {
          actor: actor.username,
          tenantId: tenant.id,
        })
      }
    }

    if (!tenant.active) {
      throw new TenantInactiveError(slug)
    }

    const store = await this.provider.openTenantStore(slug)
    return { tenant, store }
  }

  private reject(message: string, context: Record<string, unknown>): never {
    this.logger.warn(message, context)
    throw new TenantIsolationError(message, context)
  }
}
