import { describe, it, expect, beforeEach } from 'vitest'
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/config.js'
import { ReconcileEngine } from '../../src/engine.js'
import { arraySource } from '../../src/import/sources/array-source.js'
import { MemoryStoreProvider } from '../../src/store/providers.js'
import {
  InvalidTenantSlugError,
  TenantInactiveError,
  TenantIsolationError,
  TenantNotFoundError,
  TenantStillActiveError,
} from '../../src/tenancy/tenant-error.js'
import type { Tenant } from '../../src/types/entities.js'
import { createSilentLogger } from '../../src/utils/logger.js'
import {
  DISTRICT,
  ROSTER_TEACHERS,
  YEAR,
  rosterRow,
  seedDistrict,
  sequentialIds,
  testClock,
} from '../fixtures/polaris.js'

describe('Tenant-scoped engine', () => {
  let provider: MemoryStoreProvider
  let engine: ReconcileEngine

  const roster = arraySource(
    ROSTER_TEACHERS.slice(0, 3).map((teacher) => rosterRow(teacher.name, teacher.email))
  )

  async function provisionKck(): Promise<Tenant> {
    const result = await engine.provisioner.provision({
      slug: 'kck',
      name: 'Kansas City Kansas Public Schools',
      adminEmail: 'Admin@KCK.test',
    })
    return result.tenant
  }

  beforeEach(async () => {
    provider = new MemoryStoreProvider()
    engine = new ReconcileEngine({
      provider,
      config: DEFAULT_ENGINE_CONFIG,
      logger: createSilentLogger(),
      now: testClock('2025-09-01T12:00:00Z').now,
      generateId: sequentialIds('id'),
    })
    await seedDistrict(provider.main, 'district-hm', DISTRICT, 'a0D1')
  })

  describe('provisioning', () => {
    it('allocates a store, copies reference data and creates the admin', async () => {
      const result = await engine.provisioner.provision({
        slug: 'kck',
        name: 'Kansas City Kansas Public Schools',
        adminEmail: 'Admin@KCK.test',
      })

      expect(result.status).toBe('provisioned')
      expect(result.tenant).toMatchObject({
        slug: 'kck',
        storeLocation: 'memory:polaris_kck',
        active: true,
        provisionedAt: '2025-09-01T12:00:00.000Z',
        referenceCounts: { districts: 1, schools: 0, skills: 0, careerTypes: 0 },
        features: { events: true, volunteers: true, recruitment: false, publishingVisibility: false },
      })

      const store = await provider.openTenantStore('kck')
      expect(await store.districts.findById('district-hm')).toMatchObject({ name: DISTRICT })
      const [admin] = await store.users.findMany()
      expect(admin).toMatchObject({
        username: 'kck-admin',
        email: 'admin@kck.test',
        role: 'admin',
        tenantId: result.tenant.id,
      })
    })

    it('returns the existing tenant on a repeated request', async () => {
      const first = await provisionKck()
      const before = await engine.provisioner.tenantStats('kck')
      const again = await engine.provisioner.provision({
        slug: 'kck',
        name: 'Another Name',
        adminEmail: 'other@kck.test',
      })

      expect(again).toEqual({ status: 'already-exists', tenant: first })
      expect(await provider.main.tenants.count()).toBe(1)
      expect(before).toMatchObject({ districts: 1, users: 1 })
      expect(await engine.provisioner.tenantStats('kck')).toEqual(before)
    })

    it('rejects reserved and malformed slugs', async () => {
      const request = { name: 'Test', adminEmail: 'admin@test.test' }
      await expect(engine.provisioner.provision({ ...request, slug: 'events' })).rejects.toThrow(
        "Invalid tenant slug 'events': is reserved"
      )
      await expect(
        engine.provisioner.provision({ ...request, slug: 'KCK' })
      ).rejects.toBeInstanceOf(InvalidTenantSlugError)
      expect(await provider.tenantStoreExists('events')).toBe(false)
    })

    it('destroys a tenant only after deactivation', async () => {
      await provisionKck()

      await expect(engine.provisioner.destroy('kck')).rejects.toBeInstanceOf(
        TenantStillActiveError
      )

      const deactivated = await engine.provisioner.deactivate('kck')
      expect(deactivated).toMatchObject({ active: false, deactivatedAt: '2025-09-01T12:00:00.000Z' })

      await engine.provisioner.destroy('kck')
      expect(await provider.tenantStoreExists('kck')).toBe(false)
      await expect(engine.provisioner.getTenant('kck')).rejects.toBeInstanceOf(TenantNotFoundError)
    })
  })

  describe('routing imports', () => {
    it('writes tenant imports to the tenant store only', async () => {
      await provisionKck()

      const batch = await engine.run(
        { tenantSlug: 'kck' },
        engine.importers.roster({ academicYear: YEAR, districtName: DISTRICT }),
        roster
      )

      expect(batch.rowsCreated).toBe(3)
      const store = await provider.openTenantStore('kck')
      expect(await store.teacherProgress.count()).toBe(3)
      expect(await store.importBatches.count()).toBe(1)
      expect(await provider.main.teacherProgress.count()).toBe(0)
      expect(await provider.main.importBatches.count()).toBe(0)

      const stats = await engine.provisioner.tenantStats('kck')
      expect(stats).toMatchObject({
        teacherProgress: 3,
        teachers: 3,
        districts: 1,
        users: 1,
        importBatches: 1,
      })
    })

    it('keeps the same import on two tenants apart', async () => {
      await provisionKck()
      await engine.provisioner.provision({
        slug: 'hickman-mills',
        name: 'Hickman Mills',
        adminEmail: 'admin@hm.test',
      })

      await engine.run(
        { tenantSlug: 'kck' },
        engine.importers.roster({ academicYear: YEAR, districtName: DISTRICT }),
        roster
      )
      const second = await engine.run(
        { tenantSlug: 'hickman-mills' },
        engine.importers.roster({ academicYear: YEAR, districtName: DISTRICT }),
        roster
      )

      // Same rows, separate store: created again rather than skipped
      expect(second.rowsCreated).toBe(3)
    })

    it('reports an unknown or deactivated tenant', async () => {
      await expect(engine.router.resolveStore({ tenantSlug: 'nowhere' })).rejects.toThrow(
        'Tenant not found: nowhere'
      )

      await provisionKck()
      await engine.provisioner.deactivate('kck')
      await expect(
        engine.run(
          { tenantSlug: 'kck' },
          engine.importers.roster({ academicYear: YEAR, districtName: DISTRICT }),
          roster
        )
      ).rejects.toBeInstanceOf(TenantInactiveError)
    })
  })

  describe('isolation', () => {
    let kck: Tenant

    beforeEach(async () => {
      kck = await provisionKck()
    })

    it('lets a tenant user reach their own store', async () => {
      const handle = await engine.router.resolveStore({
        tenantSlug: 'kck',
        actor: { username: 'kck-admin', role: 'admin', tenantId: kck.id },
      })
      expect(handle.tenant?.id).toBe(kck.id)
      expect(handle.store.location).toBe('memory:polaris_kck')
    })

    it('keeps a tenant user out of the main store', async () => {
      await expect(
        engine.router.resolveStore({ actor: { username: 'kck-admin', tenantId: kck.id } })
      ).rejects.toThrow('Tenant user cannot use the main store')
    })

    it('keeps a tenant user out of other tenants', async () => {
      await expect(
        engine.router.resolveStore({
          tenantSlug: 'kck',
          actor: { username: 'hm-admin', role: 'admin', tenantId: 'tenant-hm' },
        })
      ).rejects.toBeInstanceOf(TenantIsolationError)
    })

    it('lets only main-store administrators into tenant stores', async () => {
      await expect(
        engine.router.resolveStore({
          tenantSlug: 'kck',
          actor: { username: 'staffer', role: 'staff', tenantId: null },
        })
      ).rejects.toThrow("Only administrators of the main store may use tenant 'kck'")

      const handle = await engine.router.resolveStore({
        tenantSlug: 'kck',
        actor: { username: 'root', role: 'admin', tenantId: null },
      })
      expect(handle.tenant?.slug).toBe('kck')
    })

    it('routes a request without a tenant to the main store', async () => {
      const handle = await engine.router.resolveStore({})
      expect(handle).toEqual({ tenant: null, store: provider.main })
    })
  })
})
