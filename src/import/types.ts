/**
 * Import batch type definitions
 * @module import/types
 */

import type { IdentityResolver } from '../identity/identity-resolver.js'
import type { MergeEngine } from '../merge/merge-engine.js'
import type { ChangeSummary } from '../merge/types.js'
import type { CanonicalStore } from '../store/types.js'
import type { SourceSystem, StoredRecord } from '../types/entities.js'
import type { Logger } from '../utils/logger.js'
import type { SourceRowView } from './columns.js'

/**
 * One decoded source row: header → cell text
 */
export type SourceRow = Record<string, string>

/**
 * Decoded source: header row plus data rows
 */
export interface SourceTable {
  columns: string[]
  rows: SourceRow[]
}

/**
 * Where a batch reads its rows from. `read` throwing anything other than a
 * {@link BatchFatalError} means the source could not be reached.
 */
export interface RowSource {
  readonly description: string
  read(): Promise<SourceTable>
}

/**
 * Batch state machine: `started → processing → completed | failed`
 */
export type BatchStatus = 'started' | 'processing' | 'completed' | 'failed'

/**
 * Why a batch failed
 * - missing-columns: required semantic columns absent
 * - unreadable: the file could not be parsed
 * - source-unavailable: reading the source threw (connection, permissions)
 * - interrupted: the process stopped mid-batch; found by recovery
 * - internal: an unexpected error outside row processing
 */
export type BatchFailureKind =
  | 'missing-columns'
  | 'unreadable'
  | 'source-unavailable'
  | 'interrupted'
  | 'internal'

export interface RowError {
  /** 1-based data row number (the header is not counted) */
  row: number
  column?: string
  code: string
  message: string
  value?: string
}

export interface RowWarning {
  row: number | null
  message: string
}

export interface BatchCounts {
  rowsProcessed: number
  rowsCreated: number
  rowsUpdated: number
  rowsSkipped: number
  /** Includes ambiguous rows */
  rowsUnmatched: number
  rowsInvalid: number
}

/**
 * Audit entry for one row that changed canonical data
 */
export interface RowChangeLog {
  row: number
  changes: ChangeSummary[]
}

/**
 * One import run, as persisted in `importBatches`
 */
export interface ImportBatch extends StoredRecord, BatchCounts {
  importName: string
  entityType: string
  source: SourceSystem
  /** Description of the source (file name, API object) */
  sourceDescription: string
  status: BatchStatus
  startedAt: string
  finishedAt: string | null
  /** Data rows read from the source, once known */
  totalRows: number | null
  /** Completed with nothing to process; distinct from a source failure */
  emptySource: boolean
  /** Stopped early on request; counts cover the rows that were processed */
  terminatedEarly: boolean
  /** Watermark of a delta sync; null when the source was read in full */
  deltaSince: string | null
  failureKind: BatchFailureKind | null
  failureMessage: string | null
  missingColumns: string[]
  /** Subset of `rowsUnmatched` that matched more than one entity */
  rowsAmbiguous: number
  errors: RowError[]
  warnings: RowWarning[]
  changeLog: RowChangeLog[]
}

/**
 * Fixed report shape consumed by dashboards and ops tooling
 */
export interface ImportReport {
  rows_processed: number
  rows_created: number
  rows_updated: number
  rows_skipped: number
  rows_unmatched: number
  rows_invalid: number
}

/**
 * Header aliases for one semantic column
 */
export interface ColumnSpec {
  /** Key rows are read by */
  key: string
  /** Accepted header spellings; compared ignoring case, spaces and punctuation */
  aliases: readonly string[]
  /** Missing required columns fail the whole batch */
  required?: boolean
}

export type DuplicatePolicy = 'keep-first' | 'keep-last'

/**
 * Collapses repeated rows within one file before processing
 */
export interface DedupeSpec {
  key: (row: SourceRowView) => string | null
  keep: DuplicatePolicy
}

/**
 * Result of a successful row
 * - created: the row's primary entity was created
 * - updated: at least one canonical field changed
 * - skipped: nothing changed (re-import, filtered row)
 */
export type RowResultKind = 'created' | 'updated' | 'skipped'

export interface RowResult {
  kind: RowResultKind
  changes?: ChangeSummary[]
}

/**
 * Context shared by every stage of one batch
 */
export interface BatchContext {
  store: CanonicalStore
  batchId: string
  source: SourceSystem
  now: Date
  merge: MergeEngine
  resolver: IdentityResolver
  logger: Logger
  /** Record a cache/status key affected by this batch */
  affect(key: string): void
  /** Attach a warning to the batch */
  warn(message: string, row?: number | null): void
}

/**
 * Context for one row. `store` is the row's transaction.
 */
export interface RowContext<P> extends BatchContext {
  rowNumber: number
  prepared: P
}

export interface FinalizeContext<P> extends BatchContext {
  prepared: P
  /** Every data row read from the source, whatever its outcome */
  rows: readonly SourceRowView[]
  /** Rows after the stopping point were never processed */
  terminatedEarly: boolean
}

/**
 * What one import does with its rows. The batch processor supplies the
 * state machine, transactions, counting and error routing around it.
 */
export interface ImportDefinition<P> {
  /** e.g. `pathful-sessions` */
  name: string
  /** Run-lock scope; two batches with the same value never overlap */
  entityType: string
  source: SourceSystem
  columns: readonly ColumnSpec[]
  dedupe?: DedupeSpec
  /** Loads lookups once per batch, before any row */
  prepare(context: BatchContext): Promise<P>
  /**
   * Resolves and merges one row. Throw {@link RowInvalidError},
   * {@link RowUnmatchedError} or {@link AmbiguousMatchError} to classify a
   * failure; writes are rolled back.
   */
  processRow(row: SourceRowView, context: RowContext<P>): Promise<RowResult>
  /** Runs after the last row, in its own transaction */
  finalize?(context: FinalizeContext<P>): Promise<void>
}

/**
 * Called after a batch completes, with the keys its rows affected
 */
export type BatchCompletionHook = (
  batch: ImportBatch,
  affectedKeys: readonly string[],
  store: CanonicalStore
) => Promise<void>

/**
 * Called after a change outside an import batch (an admin relink) commits,
 * with the cache keys it affected
 */
export type EntityChangeHook = (
  store: CanonicalStore,
  affectedKeys: readonly string[]
) => Promise<void>
