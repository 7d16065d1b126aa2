/**
 * Physical store allocation for the main store and per-tenant stores
 * @module store/providers
 */

import { existsSync, mkdirSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { createMemoryStore } from './memory-store.js'
import { openSqliteStore } from './sqlite/sqlite-store.js'
import { ConnectionError } from './store-error.js'
import type { CanonicalStore } from './types.js'

/**
 * Allocates and opens physical stores. Tenant stores share the main store's
 * schema but never its rows.
 */
export interface StoreProvider {
  /** The shared (non-tenant) store */
  readonly main: CanonicalStore

  /** Where the tenant's store lives (or would live) */
  tenantLocation(slug: string): string

  tenantStoreExists(slug: string): Promise<boolean>

  /**
   * Allocates a new physical store with the schema applied
   *
   * @throws {ConnectionError} when a store already exists for the slug
   */
  createTenantStore(slug: string): Promise<CanonicalStore>

  /**
   * @throws {ConnectionError} when no store exists for the slug
   */
  openTenantStore(slug: string): Promise<CanonicalStore>

  /** Physically removes the tenant's store */
  destroyTenantStore(slug: string): Promise<void>

  /** Closes the main store and every tenant store opened through this provider */
  close(): Promise<void>
}

/**
 * Keeps every store in memory. Used by tests and dry runs.
 */
export class MemoryStoreProvider implements StoreProvider {
  readonly main: CanonicalStore
  private readonly tenants = new Map<string, CanonicalStore>()

  constructor(main: CanonicalStore = createMemoryStore('main')) {
    this.main = main
  }

  tenantLocation(slug: string): string {
    return `memory:polaris_${slug}`
  }

  async tenantStoreExists(slug: string): Promise<boolean> {
    return this.tenants.has(slug)
  }

  async createTenantStore(slug: string): Promise<CanonicalStore> {
    if (this.tenants.has(slug)) {
      throw new ConnectionError(`Store for tenant '${slug}' already exists`, { slug })
    }
    const store = createMemoryStore(`polaris_${slug}`)
    this.tenants.set(slug, store)
    return store
  }

  async openTenantStore(slug: string): Promise<CanonicalStore> {
    const store = this.tenants.get(slug)
    if (!store) {
      throw new ConnectionError(`No store allocated for tenant '${slug}'`, { slug })
    }
    return store
  }

  async destroyTenantStore(slug: string): Promise<void> {
    const store = this.tenants.get(slug)
    if (store) {
      await store.close()
      this.tenants.delete(slug)
    }
  }

  /**
   * Closes every store. Memory stores lose their rows, so tenants are
   * forgotten as well.
   */
  async close(): Promise<void> {
    for (const store of this.tenants.values()) {
      await store.close()
    }
    this.tenants.clear()
    await this.main.close()
  }
}

/**
 * One SQLite file per store under a data directory: `polaris.db` for the
 * main store and `polaris_<slug>.db` for each tenant.
 */
export class SqliteStoreProvider implements StoreProvider {
  readonly main: CanonicalStore
  private readonly open = new Map<string, CanonicalStore>()

  constructor(private readonly dataDir: string) {
    mkdirSync(dataDir, { recursive: true })
    this.main = openSqliteStore(join(dataDir, 'polaris.db'))
  }

  tenantLocation(slug: string): string {
    return join(this.dataDir, `polaris_${slug}.db`)
  }

  async tenantStoreExists(slug: string): Promise<boolean> {
    return existsSync(this.tenantLocation(slug))
  }

  async createTenantStore(slug: string): Promise<CanonicalStore> {
    if (await this.tenantStoreExists(slug)) {
      throw new ConnectionError(`Store for tenant '${slug}' already exists`, {
        slug,
        location: this.tenantLocation(slug),
      })
    }
    const store = openSqliteStore(this.tenantLocation(slug))
    this.open.set(slug, store)
    return store
  }

  async openTenantStore(slug: string): Promise<CanonicalStore> {
    const cached = this.open.get(slug)
    if (cached) return cached
    if (!(await this.tenantStoreExists(slug))) {
      throw new ConnectionError(`No store allocated for tenant '${slug}'`, {
        slug,
        location: this.tenantLocation(slug),
      })
    }
    const store = openSqliteStore(this.tenantLocation(slug))
    this.open.set(slug, store)
    return store
  }

  async destroyTenantStore(slug: string): Promise<void> {
    const store = this.open.get(slug)
    if (store) {
      await store.close()
      this.open.delete(slug)
    }
    const location = this.tenantLocation(slug)
    for (const file of [location, `${location}-wal`, `${location}-shm`]) {
      rmSync(file, { force: true })
    }
  }

  /**
   * Closes every open database handle. Tenant files stay on disk and are
   * opened again on the next request.
   */
  async close(): Promise<void> {
    for (const store of this.open.values()) {
      await store.close()
    }
    this.open.clear()
    await this.main.close()
  }

  /** Slugs with an open tenant handle */
  openTenants(): string[] {
    return [...this.open.keys()]
  }
}
