// Main entry point
export { ReconcileEngine, type ReconcileEngineOptions } from './engine.js'

// Configuration
export {
  loadConfig,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_LOCALITY,
  ROSTER_REMOVAL_POLICIES,
  type EngineConfig,
  type EnvSource,
  type LocalityConfig,
  type RosterRemovalPolicy,
} from './config/config.js'

// Types - Entities
export type * from './types/entities.js'
export { SOURCE_SYSTEMS } from './types/entities.js'

// Comparators
export {
  levenshtein,
  jaroWinkler,
  ratio,
  tokenSortRatio,
  type SimilarityFunction,
} from './core/comparators.js'

// Normalizers
export { normalizeEmail, normalizeEmails, isValidEmail } from './core/normalizers/email.js'
export {
  parseFullName,
  nameMatchKey,
  displayName,
  type NameParts,
} from './core/normalizers/name.js'
export { normalizePhone, normalizePhones, isValidPhone } from './core/normalizers/phone.js'
export { parseSourceDateTime, toIsoDateTime } from './core/normalizers/date.js'

// Store
export type {
  CanonicalStore,
  CollectionMap,
  CollectionName,
  DocumentBackend,
  FindOptions,
  Query,
  Repository,
} from './store/types.js'
export { COLLECTION_NAMES, REFERENCE_COLLECTIONS } from './store/types.js'
export { createDocumentStore } from './store/document-store.js'
export { createMemoryStore, MemoryBackend } from './store/memory-store.js'
export { openSqliteStore, SqliteBackend } from './store/sqlite/sqlite-store.js'
export {
  MemoryStoreProvider,
  SqliteStoreProvider,
  type StoreProvider,
} from './store/providers.js'

// Field ownership & merge
export { FieldOwnershipRegistry, parseOwnershipTable } from './ownership/field-ownership-registry.js'
export type {
  EntityType,
  FieldRule,
  OwnerSpec,
  OwnershipTable,
} from './ownership/types.js'
export { MergeEngine, type MergeEngineOptions } from './merge/merge-engine.js'
export type {
  ChangeSummary,
  FieldChange,
  IncomingFields,
  MergeOutcome,
  MergeRequest,
  MergeResult,
  PreservedField,
} from './merge/types.js'

// Identity resolution
export {
  IdentityResolver,
  type IdentityResolverOptions,
} from './identity/identity-resolver.js'
export type {
  RowKeys,
  IdentityStrategy,
  MatchRule,
  Resolution,
} from './identity/types.js'

// Import batches
export {
  ImportBatchProcessor,
  recoverInterruptedBatches,
  toImportReport,
  type BatchProcessorOptions,
  type RunOptions,
} from './import/batch-processor.js'
export { ImportRunLock } from './import/run-lock.js'
export { mapColumns, SourceRowView } from './import/columns.js'
export { readCsvRows, csvTextSource, csvFileSource } from './import/sources/csv-source.js'
export {
  readXlsxRows,
  xlsxBufferSource,
  xlsxFileSource,
  cellText,
  type XlsxReadOptions,
} from './import/sources/xlsx-source.js'
export { arraySource, lazySource } from './import/sources/array-source.js'
export {
  salesforceDeltaSource,
  soqlDateTime,
  withDeltaFilter,
} from './import/sources/salesforce-source.js'
export {
  deltaWatermark,
  type DeltaSource,
  type DeltaWatermarkOptions,
} from './import/delta-sync.js'
export type {
  BatchCompletionHook,
  BatchStatus,
  EntityChangeHook,
  ColumnSpec,
  ImportBatch,
  ImportDefinition,
  ImportReport,
  RowError,
  RowSource,
  SourceRow,
} from './import/types.js'

// Importers
export {
  pathfulSessionImport,
  type PathfulImportOptions,
} from './importers/pathful/pathful-import.js'
export { salesforceOrganizationImport } from './importers/salesforce/organizations.js'
export {
  salesforceVolunteerImport,
  type VolunteerImportOptions,
} from './importers/salesforce/volunteers.js'
export { salesforceStudentImport } from './importers/salesforce/students.js'
export {
  salesforceDistrictImport,
  salesforceSchoolImport,
} from './importers/salesforce/reference-data.js'
export {
  salesforceTeacherImport,
  type SchoolsBySalesforceId,
} from './importers/salesforce/teachers.js'
export { salesforceEventImport } from './importers/salesforce/events.js'
export {
  salesforceVolunteerParticipationImport,
  salesforceStudentParticipationImport,
} from './importers/salesforce/participations.js'
export { voluntechVisibilitySync } from './importers/voluntech/visibility-sync.js'
export { rosterImport, type RosterImportOptions } from './importers/roster/roster-import.js'

// Review queue
export { ReviewQueue, type ReviewQueueOptions } from './queue/review-queue.js'
export {
  relinkExternalId,
  linkTeacherProgress,
  type AdminActionOptions,
  type LinkTeacherProgressRequest,
  type RelinkRequest,
  type RelinkResult,
} from './queue/admin-actions.js'
export type { ReviewItem, ReviewReason, ReviewStatus } from './queue/types.js'

// Derived status
export {
  StatusDerivationEngine,
  type TeacherProgressReportRow,
} from './status/status-engine.js'
export {
  deriveTeacherProgress,
  type SessionOccurrence,
  type TeacherProgressSummary,
} from './status/teacher-progress.js'
export { deriveLocalStatus } from './status/local-status.js'
export { isPubliclyVisible } from './status/event-visibility.js'
export {
  academicYearOf,
  academicYearWindow,
  semesterOf,
  semesterWindow,
  type ReportingWindow,
} from './status/academic-year.js'
export { archiveSemester, type ArchiveSemesterResult } from './status/semester-archive.js'
export { ReportCache, type ReportCacheConfig } from './status/cache/report-cache.js'

// Tenancy
export { TenantRouter } from './tenancy/tenant-router.js'
export { TenantProvisioner } from './tenancy/tenant-provisioner.js'
export { validateTenantSlug, RESERVED_SLUGS } from './tenancy/slug.js'
export type {
  ProvisionRequest,
  ProvisionResult,
  RequestContext,
  TenantStoreHandle,
} from './tenancy/types.js'

// Errors
export {
  ReconcileError,
  ConfigurationError,
  InvalidParameterError,
  isReconcileError,
} from './utils/errors.js'
export {
  BatchFatalError,
  RowInvalidError,
  RowUnmatchedError,
  AmbiguousMatchError,
  ImportInProgressError,
} from './import/import-error.js'
export { ExternalIdConflictError, MergeError } from './merge/merge-error.js'
export {
  StoreError,
  ConnectionError,
  DuplicateKeyError,
  NotFoundError,
  TransactionError,
} from './store/store-error.js'
export {
  TenantError,
  TenantIsolationError,
  TenantNotFoundError,
  TenantInactiveError,
  InvalidTenantSlugError,
  TenantStillActiveError,
} from './tenancy/tenant-error.js'
export {
  QueueError,
  QueueItemNotFoundError,
  InvalidStatusTransitionError,
  QueueValidationError,
} from './queue/queue-error.js'

// Logging
export {
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
  createLevelLogger,
  type Logger,
  type LogLevel,
} from './utils/logger.js'
