/**
 * Wires configuration, stores, importers and derived status together
 * @module engine
 */

import { DEFAULT_ENGINE_CONFIG, loadConfig, type EngineConfig, type EnvSource } from './config/config.js'
import { IdentityResolver } from './identity/identity-resolver.js'
import { ImportBatchProcessor, recoverInterruptedBatches, type RunOptions } from './import/batch-processor.js'
import { deltaWatermark, type DeltaSource } from './import/delta-sync.js'
import type { ImportBatch, ImportDefinition, RowSource } from './import/types.js'
import { pathfulSessionImport } from './importers/pathful/pathful-import.js'
import { rosterImport, type RosterImportOptions } from './importers/roster/roster-import.js'
import { salesforceEventImport } from './importers/salesforce/events.js'
import { salesforceOrganizationImport } from './importers/salesforce/organizations.js'
import {
  salesforceStudentParticipationImport,
  salesforceVolunteerParticipationImport,
} from './importers/salesforce/participations.js'
import { salesforceDistrictImport, salesforceSchoolImport } from './importers/salesforce/reference-data.js'
import { salesforceStudentImport } from './importers/salesforce/students.js'
import { salesforceTeacherImport } from './importers/salesforce/teachers.js'
import { salesforceVolunteerImport } from './importers/salesforce/volunteers.js'
import { voluntechVisibilitySync } from './importers/voluntech/visibility-sync.js'
import {
  linkTeacherProgress,
  relinkExternalId,
  type AdminActionOptions,
  type LinkTeacherProgressRequest,
  type RelinkRequest,
  type RelinkResult,
} from './queue/admin-actions.js'
import { ReviewQueue } from './queue/review-queue.js'
import { ReportCache } from './status/cache/report-cache.js'
import { StatusDerivationEngine } from './status/status-engine.js'
import type { TeacherProgressSummary } from './status/teacher-progress.js'
import { SqliteStoreProvider, type StoreProvider } from './store/providers.js'
import type { CanonicalStore, CollectionName } from './store/types.js'
import { TenantProvisioner } from './tenancy/tenant-provisioner.js'
import { TenantRouter } from './tenancy/tenant-router.js'
import type { RequestContext } from './tenancy/types.js'
import type { TeacherProgress } from './types/entities.js'
import { createLevelLogger, createPrefixedLogger, defaultLogger, type Logger } from './utils/logger.js'

export interface ReconcileEngineOptions {
  provider: StoreProvider
  config?: EngineConfig
  /** Base logger; filtered by `config.logLevel` */
  logger?: Logger
  now?: () => Date
  generateId?: () => string
}

/**
 * One configured instance of the reconciliation engine.
 *
 * Every import goes through the tenant router, so a request scoped to a
 * tenant only ever reaches that tenant's store, and every completed batch
 * invalidates the derived status it affected.
 *
 * @example
 * ```typescript
 * const engine = ReconcileEngine.fromEnv(process.env)
 * const batch = await engine.run(
 *   { tenantSlug: 'kck' },
 *   engine.importers.pathful(),
 *   csvFileSource('sessions.csv')
 * )
 * ```
 */
export class ReconcileEngine {
  readonly config: EngineConfig
  readonly provider: StoreProvider
  readonly logger: Logger
  readonly processor: ImportBatchProcessor
  readonly status: StatusDerivationEngine
  readonly router: TenantRouter
  readonly provisioner: TenantProvisioner
  private readonly now: () => Date

  /**
   * Import definitions configured from {@link EngineConfig}
   */
  readonly importers = {
    pathful: () =>
      pathfulSessionImport({ partnerFilter: this.config.pathfulPartnerFilter }),
    roster: (options: RosterImportOptions) =>
      rosterImport({ removalPolicy: this.config.rosterRemovalPolicy, ...options }),
    salesforceDistricts: () => salesforceDistrictImport(),
    salesforceSchools: () => salesforceSchoolImport(),
    salesforceOrganizations: () => salesforceOrganizationImport(),
    salesforceTeachers: () => salesforceTeacherImport(),
    salesforceVolunteers: () => salesforceVolunteerImport({ locality: this.config.locality }),
    salesforceStudents: () => salesforceStudentImport(),
    salesforceEvents: () => salesforceEventImport(),
    salesforceVolunteerParticipations: () => salesforceVolunteerParticipationImport(),
    salesforceStudentParticipations: () => salesforceStudentParticipationImport(),
    voluntechVisibility: () => voluntechVisibilitySync(),
  }

  constructor(options: ReconcileEngineOptions) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG
    this.provider = options.provider
    this.now = options.now ?? (() => new Date())
    this.logger = createLevelLogger(this.config.logLevel, options.logger ?? defaultLogger)

    this.status = new StatusDerivationEngine({
      cache: new ReportCache<TeacherProgressSummary>({
        maxSize: this.config.cache.maxSize,
        ttlSeconds: this.config.cache.ttlSeconds,
        now: () => this.now().getTime(),
        logger: createPrefixedLogger('cache', this.logger),
      }),
      now: this.now,
      locality: this.config.locality,
      logger: createPrefixedLogger('status', this.logger),
    })

    const importLogger = createPrefixedLogger('import', this.logger)
    this.processor = new ImportBatchProcessor({
      resolver: new IdentityResolver({
        fuzzyThreshold: this.config.fuzzyThreshold,
        logger: importLogger,
      }),
      now: this.now,
      generateId: options.generateId,
      logger: importLogger,
      onComplete: [this.status.completionHook()],
    })

    const tenancyLogger = createPrefixedLogger('tenancy', this.logger)
    this.router = new TenantRouter(this.provider, { logger: tenancyLogger })
    this.provisioner = new TenantProvisioner(this.provider, {
      now: this.now,
      generateId: options.generateId,
      logger: tenancyLogger,
    })
  }

  /**
   * Engine over SQLite files in `POLARIS_DATA_DIR`
   *
   * @throws {ConfigurationError} when an environment variable is invalid
   */
  static fromEnv(env: EnvSource, overrides: Partial<EngineConfig> = {}): ReconcileEngine {
    const config = loadConfig(env, overrides)
    return new ReconcileEngine({ config, provider: new SqliteStoreProvider(config.dataDir) })
  }

  /**
   * Runs one import against the store the request context resolves to
   *
   * @throws {TenantIsolationError} when the context mixes tenant scopes
   * @throws {ImportInProgressError} when the same import type is running
   */
  async run<P>(
    context: RequestContext,
    definition: ImportDefinition<P>,
    source: RowSource,
    options: RunOptions = {}
  ): Promise<ImportBatch> {
    const { store } = await this.router.resolveStore(context)
    return this.processor.run(store, definition, source, options)
  }

  /**
   * Runs an import over the records changed since its last completed run
   * (less `deltaSyncBufferMinutes`), or over every record when there is none
   */
  async runDelta<P>(
    context: RequestContext,
    definition: ImportDefinition<P>,
    source: DeltaSource,
    options: RunOptions = {}
  ): Promise<ImportBatch> {
    const { store } = await this.router.resolveStore(context)
    const since = await deltaWatermark(store, definition.name, {
      bufferMinutes: this.config.deltaSyncBufferMinutes,
    })
    this.logger.info(since ? 'Delta sync window' : 'No completed run; reading every record', {
      importName: definition.name,
      since: since?.toISOString() ?? null,
    })
    return this.processor.run(store, definition, source(since), { ...options, deltaSince: since })
  }

  reviewQueue(store: CanonicalStore): ReviewQueue {
    return new ReviewQueue(store.reviewItems, {
      now: this.now,
      logger: createPrefixedLogger('review', this.logger),
    })
  }

  /**
   * Moves an external id to another entity; cached status of both entities
   * is dropped once the relink commits
   */
  async relinkExternalId<K extends CollectionName>(
    store: CanonicalStore,
    request: RelinkRequest<K>
  ): Promise<RelinkResult> {
    return relinkExternalId(store, request, this.adminOptions())
  }

  /**
   * Links a roster entry to a teacher; cached progress of the entry and of
   * both teachers is dropped once the link commits
   */
  async linkTeacherProgress(
    store: CanonicalStore,
    request: LinkTeacherProgressRequest
  ): Promise<TeacherProgress> {
    return linkTeacherProgress(store, request, this.adminOptions())
  }

  /**
   * Marks batches left running by a crashed process as failed
   */
  async recover(store: CanonicalStore): Promise<ImportBatch[]> {
    return recoverInterruptedBatches(store, { now: this.now, logger: this.logger })
  }

  /**
   * Closes the main store and every tenant store the engine opened
   */
  async close(): Promise<void> {
    await this.provider.close()
  }

  private adminOptions(): AdminActionOptions {
    return {
      now: this.now,
      logger: createPrefixedLogger('admin', this.logger),
      onChange: this.status.changeHook(),
    }
  }
}
