/**
 * Runs one import batch: reading, column checks, per-row transactions,
 * outcome counting and error routing
 * @module import/batch-processor
 */

import { v4 as uuidv4 } from 'uuid'
import { IdentityResolver } from '../identity/identity-resolver.js'
import { ExternalIdConflictError } from '../merge/merge-error.js'
import { MergeEngine } from '../merge/merge-engine.js'
import { ReviewQueue } from '../queue/review-queue.js'
import type { ReviewReason } from '../queue/types.js'
import type { CanonicalStore } from '../store/types.js'
import { errorMessage, isReconcileError } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { mapColumns, SourceRowView } from './columns.js'
import {
  AmbiguousMatchError,
  BatchFatalError,
  RowInvalidError,
  RowUnmatchedError,
} from './import-error.js'
import { sharedRunLock, type ImportRunLock } from './run-lock.js'
import type {
  BatchCompletionHook,
  BatchContext,
  DedupeSpec,
  ImportBatch,
  ImportDefinition,
  ImportReport,
  RowError,
  RowResult,
  RowSource,
  RowWarning,
  SourceTable,
} from './types.js'

export interface BatchProcessorOptions {
  merge?: MergeEngine
  resolver?: IdentityResolver
  now?: () => Date
  generateId?: () => string
  logger?: Logger
  /** Defaults to the process-wide lock */
  lock?: ImportRunLock
  /** Called after every completed batch */
  onComplete?: BatchCompletionHook[]
}

export interface RunOptions {
  /** Stops the batch before the next row; processed rows stay committed */
  signal?: AbortSignal
  /** Watermark the source was read from, recorded on the batch */
  deltaSince?: Date | null
}

/**
 * Converts a batch to the fixed report shape
 */
export function toImportReport(batch: ImportBatch): ImportReport {
  return {
    rows_processed: batch.rowsProcessed,
    rows_created: batch.rowsCreated,
    rows_updated: batch.rowsUpdated,
    rows_skipped: batch.rowsSkipped,
    rows_unmatched: batch.rowsUnmatched,
    rows_invalid: batch.rowsInvalid,
  }
}

type ContextFactory = (
  scope: CanonicalStore,
  warnings: RowWarning[],
  keys: Set<string>
) => BatchContext

interface RowFailure {
  outcome: 'invalid' | 'unmatched' | 'ambiguous'
  error: RowError
  review?: {
    reason: ReviewReason
    entityType: string
    attemptedKeys: string[]
    candidateIds: string[]
  }
}

/**
 * Sorts a row error into the batch taxonomy. Anything that is not one of
 * the row error classes counts as invalid, keeping its code.
 */
function classifyRowError(error: unknown, row: number, entityType: string): RowFailure {
  if (error instanceof RowInvalidError) {
    return {
      outcome: 'invalid',
      error: {
        row,
        column: error.column,
        code: error.code,
        message: error.message,
        value: error.value,
      },
    }
  }
  if (error instanceof RowUnmatchedError) {
    return {
      outcome: 'unmatched',
      error: { row, code: error.code, message: error.message },
      review: {
        reason: 'unmatched',
        entityType: error.entityType,
        attemptedKeys: error.attemptedKeys,
        candidateIds: [],
      },
    }
  }
  if (error instanceof AmbiguousMatchError) {
    return {
      outcome: 'ambiguous',
      error: { row, code: error.code, message: error.message },
      review: {
        reason: 'ambiguous',
        entityType: error.entityType,
        attemptedKeys: error.attemptedKeys,
        candidateIds: error.candidateIds,
      },
    }
  }
  if (error instanceof ExternalIdConflictError) {
    return {
      outcome: 'ambiguous',
      error: {
        row,
        column: `externalIds.${error.source}`,
        code: error.code,
        message: error.message,
        value: error.incomingId,
      },
      review: {
        reason: 'ambiguous',
        entityType,
        attemptedKeys: [`external:${error.source}:${error.incomingId}`],
        candidateIds: [error.entityId],
      },
    }
  }
  return {
    outcome: 'invalid',
    error: {
      row,
      code: isReconcileError(error) ? error.code : 'ROW_FAILED',
      message: errorMessage(error),
    },
  }
}

/**
 * Rows dropped as repeats within the file: dropped row → row that was kept
 */
function planDuplicates(
  rows: readonly SourceRowView[],
  dedupe: DedupeSpec | undefined
): Map<number, number> {
  const dropped = new Map<number, number>()
  if (!dedupe) return dropped

  const groups = new Map<string, SourceRowView[]>()
  for (const row of rows) {
    const key = dedupe.key(row)
    if (key === null) continue
    const group = groups.get(key)
    if (group) group.push(row)
    else groups.set(key, [row])
  }

  for (const group of groups.values()) {
    if (group.length < 2) continue
    const kept = dedupe.keep === 'keep-first' ? group[0] : group[group.length - 1]
    for (const row of group) {
      if (row !== kept) dropped.set(row.rowNumber, kept.rowNumber)
    }
  }
  return dropped
}

/**
 * Runs import definitions against a canonical store.
 *
 * Each row is resolved and merged inside its own transaction together with
 * the batch record update, so a batch interrupted at any point is stored
 * exactly up to its last committed row. Row failures are counted and
 * reported; only source and column problems fail the whole batch.
 *
 * @example
 * ```typescript
 * const processor = new ImportBatchProcessor({ logger })
 * const batch = await processor.run(store, pathfulSessionImport(), csvFileSource(path))
 * console.log(toImportReport(batch))
 * ```
 */
export class ImportBatchProcessor {
  readonly merge: MergeEngine
  readonly resolver: IdentityResolver
  private readonly now: () => Date
  private readonly generateId: () => string
  private readonly logger: Logger
  private readonly lock: ImportRunLock
  private readonly hooks: BatchCompletionHook[]

  constructor(options: BatchProcessorOptions = {}) {
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? uuidv4
    this.logger = options.logger ?? createSilentLogger()
    this.merge = options.merge ?? new MergeEngine({ now: this.now })
    this.resolver = options.resolver ?? new IdentityResolver({ logger: this.logger })
    this.lock = options.lock ?? sharedRunLock
    this.hooks = [...(options.onComplete ?? [])]
  }

  /**
   * Register a hook called after each completed batch
   */
  onComplete(hook: BatchCompletionHook): void {
    this.hooks.push(hook)
  }

  /**
   * Run one batch to completion or failure and return its final record.
   *
   * @throws {ImportInProgressError} when a batch of the same entity type is
   * already running against the store; no batch record is written
   */
  async run<P>(
    store: CanonicalStore,
    definition: ImportDefinition<P>,
    source: RowSource,
    options: RunOptions = {}
  ): Promise<ImportBatch> {
    const batchId = this.generateId()
    const release = this.lock.acquire(store.location, definition.entityType, batchId)
    try {
      return await this.execute(store, definition, source, batchId, options)
    } finally {
      release()
    }
  }

  private async execute<P>(
    store: CanonicalStore,
    definition: ImportDefinition<P>,
    source: RowSource,
    batchId: string,
    options: RunOptions
  ): Promise<ImportBatch> {
    const startedAt = this.now()
    let batch = await store.importBatches.insert({
      id: batchId,
      createdAt: startedAt.toISOString(),
      updatedAt: startedAt.toISOString(),
      importName: definition.name,
      entityType: definition.entityType,
      source: definition.source,
      sourceDescription: source.description,
      status: 'started',
      startedAt: startedAt.toISOString(),
      finishedAt: null,
      totalRows: null,
      emptySource: false,
      terminatedEarly: false,
      deltaSince: options.deltaSince?.toISOString() ?? null,
      failureKind: null,
      failureMessage: null,
      missingColumns: [],
      rowsProcessed: 0,
      rowsCreated: 0,
      rowsUpdated: 0,
      rowsSkipped: 0,
      rowsUnmatched: 0,
      rowsInvalid: 0,
      rowsAmbiguous: 0,
      errors: [],
      warnings: [],
      changeLog: [],
    })
    this.logger.info('Import batch started', {
      batchId,
      importName: definition.name,
      source: source.description,
      store: store.location,
    })

    let table: SourceTable
    try {
      table = await source.read()
    } catch (error) {
      const fatal =
        error instanceof BatchFatalError
          ? error
          : new BatchFatalError(
              `Source unavailable: ${errorMessage(error)}`,
              'source-unavailable'
            )
      return this.fail(store, batch, fatal)
    }

    if (table.columns.length === 0 && table.rows.length === 0) {
      return this.complete(store, { ...batch, totalRows: 0, emptySource: true }, [])
    }

    const mapping = mapColumns(table.columns, definition.columns)
    if (mapping.missing.length > 0) {
      return this.fail(
        store,
        batch,
        new BatchFatalError(
          `Missing required columns: ${mapping.missing.join(', ')}`,
          'missing-columns',
          mapping.missing
        )
      )
    }

    if (table.rows.length === 0) {
      return this.complete(store, { ...batch, totalRows: 0, emptySource: true }, [])
    }

    batch = await store.importBatches.upsert({
      ...batch,
      status: 'processing',
      totalRows: table.rows.length,
      updatedAt: this.now().toISOString(),
    })

    const affected = new Set<string>()
    const context: ContextFactory = (scope, warnings, keys) => ({
      store: scope,
      batchId,
      source: definition.source,
      now: startedAt,
      merge: this.merge,
      resolver: this.resolver,
      logger: this.logger,
      affect: (key) => keys.add(key),
      warn: (message, row = null) => warnings.push({ row, message }),
    })

    try {
      const prepareWarnings: RowWarning[] = []
      const prepared = await definition.prepare(context(store, prepareWarnings, affected))
      batch = { ...batch, warnings: [...batch.warnings, ...prepareWarnings] }

      const rows = table.rows.map(
        (raw, index) => new SourceRowView(raw, index + 1, mapping.headers)
      )
      const duplicates = planDuplicates(rows, definition.dedupe)

      for (const row of rows) {
        if (options.signal?.aborted) {
          batch = { ...batch, terminatedEarly: true }
          this.logger.warn('Import batch terminated early', {
            batchId,
            rowsProcessed: batch.rowsProcessed,
            totalRows: rows.length,
          })
          break
        }

        const keptRow = duplicates.get(row.rowNumber)
        if (keptRow !== undefined) {
          batch = {
            ...batch,
            rowsProcessed: batch.rowsProcessed + 1,
            rowsSkipped: batch.rowsSkipped + 1,
            warnings: [
              ...batch.warnings,
              { row: row.rowNumber, message: `Duplicate of row ${keptRow} in this file; skipped` },
            ],
          }
          continue
        }

        batch = await this.processRow(store, definition, row, prepared, batch, context, affected)
      }

      if (definition.finalize) {
        const finalizeWarnings: RowWarning[] = []
        const finalizeKeys = new Set<string>()
        const finalize = definition.finalize.bind(definition)
        await store.transaction(async (tx) =>
          finalize({
            ...context(tx, finalizeWarnings, finalizeKeys),
            prepared,
            rows,
            terminatedEarly: batch.terminatedEarly,
          })
        )
        for (const key of finalizeKeys) affected.add(key)
        batch = { ...batch, warnings: [...batch.warnings, ...finalizeWarnings] }
      }
    } catch (error) {
      this.logger.error('Import batch aborted by an unexpected error', {
        batchId,
        error: errorMessage(error),
      })
      return this.fail(
        store,
        batch,
        new BatchFatalError(`Import aborted: ${errorMessage(error)}`, 'internal')
      )
    }

    return this.complete(store, batch, [...affected])
  }

  private async processRow<P>(
    store: CanonicalStore,
    definition: ImportDefinition<P>,
    row: SourceRowView,
    prepared: P,
    batch: ImportBatch,
    context: ContextFactory,
    affected: Set<string>
  ): Promise<ImportBatch> {
    const warnings: RowWarning[] = []
    const keys = new Set<string>()

    try {
      const next = await store.transaction(async (tx) => {
        const result = await definition.processRow(row, {
          ...context(tx, warnings, keys),
          rowNumber: row.rowNumber,
          prepared,
        })
        const updated = this.applyResult(batch, row.rowNumber, result, warnings)
        await tx.importBatches.upsert(updated)
        return updated
      })
      for (const key of keys) affected.add(key)
      return next
    } catch (error) {
      return this.recordFailure(store, definition, row, batch, error)
    }
  }

  private applyResult(
    batch: ImportBatch,
    rowNumber: number,
    result: RowResult,
    warnings: RowWarning[]
  ): ImportBatch {
    const changes = result.changes?.filter((change) => change.outcome !== 'unchanged') ?? []
    return {
      ...batch,
      updatedAt: this.now().toISOString(),
      rowsProcessed: batch.rowsProcessed + 1,
      rowsCreated: batch.rowsCreated + (result.kind === 'created' ? 1 : 0),
      rowsUpdated: batch.rowsUpdated + (result.kind === 'updated' ? 1 : 0),
      rowsSkipped: batch.rowsSkipped + (result.kind === 'skipped' ? 1 : 0),
      warnings: warnings.length > 0 ? [...batch.warnings, ...warnings] : batch.warnings,
      changeLog:
        changes.length > 0 ? [...batch.changeLog, { row: rowNumber, changes }] : batch.changeLog,
    }
  }

  private async recordFailure<P>(
    store: CanonicalStore,
    definition: ImportDefinition<P>,
    row: SourceRowView,
    batch: ImportBatch,
    error: unknown
  ): Promise<ImportBatch> {
    const failure = classifyRowError(error, row.rowNumber, definition.entityType)
    const log = failure.outcome === 'invalid' && !isReconcileError(error) ? 'error' : 'warn'
    this.logger[log](`Row ${failure.outcome}`, {
      batchId: batch.id,
      row: row.rowNumber,
      code: failure.error.code,
      message: failure.error.message,
    })

    const unmatched = failure.outcome === 'invalid' ? 0 : 1
    const next: ImportBatch = {
      ...batch,
      updatedAt: this.now().toISOString(),
      rowsProcessed: batch.rowsProcessed + 1,
      rowsInvalid: batch.rowsInvalid + (failure.outcome === 'invalid' ? 1 : 0),
      rowsUnmatched: batch.rowsUnmatched + unmatched,
      rowsAmbiguous: batch.rowsAmbiguous + (failure.outcome === 'ambiguous' ? 1 : 0),
      errors: [...batch.errors, failure.error],
    }

    const review = failure.review
    await store.transaction(async (tx) => {
      if (review) {
        const queue = new ReviewQueue(tx.reviewItems, {
          now: this.now,
          generateId: this.generateId,
        })
        await queue.add({
          reason: review.reason,
          entityType: review.entityType,
          source: definition.source,
          batchId: batch.id,
          rowNumber: row.rowNumber,
          row: row.raw,
          message: failure.error.message,
          attemptedKeys: review.attemptedKeys,
          candidateIds: review.candidateIds,
        })
      }
      await tx.importBatches.upsert(next)
    })
    return next
  }

  private async fail(
    store: CanonicalStore,
    batch: ImportBatch,
    error: BatchFatalError
  ): Promise<ImportBatch> {
    const finishedAt = this.now().toISOString()
    const failed = await store.importBatches.upsert({
      ...batch,
      status: 'failed',
      finishedAt,
      updatedAt: finishedAt,
      failureKind: error.failureKind,
      failureMessage: error.message,
      missingColumns: error.missingColumns,
    })
    this.logger.error('Import batch failed', {
      batchId: batch.id,
      failureKind: error.failureKind,
      message: error.message,
      ...toImportReport(failed),
    })
    return failed
  }

  private async complete(
    store: CanonicalStore,
    batch: ImportBatch,
    affectedKeys: string[]
  ): Promise<ImportBatch> {
    const finishedAt = this.now().toISOString()
    let completed: ImportBatch = {
      ...batch,
      status: 'completed',
      finishedAt,
      updatedAt: finishedAt,
    }

    for (const hook of this.hooks) {
      try {
        await hook(completed, affectedKeys, store)
      } catch (error) {
        this.logger.warn('Batch completion hook failed', {
          batchId: batch.id,
          error: errorMessage(error),
        })
        completed = {
          ...completed,
          warnings: [
            ...completed.warnings,
            { row: null, message: `Completion hook failed: ${errorMessage(error)}` },
          ],
        }
      }
    }

    const saved = await store.importBatches.upsert(completed)
    this.logger.info(
      saved.emptySource ? 'Import batch completed: source was empty' : 'Import batch completed',
      {
        batchId: saved.id,
        importName: saved.importName,
        terminatedEarly: saved.terminatedEarly,
        ...toImportReport(saved),
      }
    )
    return saved
  }
}

/**
 * Marks batches left in `started` or `processing` by a stopped process as
 * failed, so no batch stays in progress forever. Batches currently holding
 * the run lock are left alone.
 *
 * @returns the batches that were marked failed
 */
export async function recoverInterruptedBatches(
  store: CanonicalStore,
  options: { now?: () => Date; lock?: ImportRunLock; logger?: Logger } = {}
): Promise<ImportBatch[]> {
  const now = options.now ?? (() => new Date())
  const lock = options.lock ?? sharedRunLock
  const logger = options.logger ?? createSilentLogger()

  const stale = await store.importBatches.findMany(
    (batch) =>
      (batch.status === 'started' || batch.status === 'processing') &&
      !lock.isHeld(store.location, batch.entityType)
  )

  const recovered: ImportBatch[] = []
  for (const batch of stale) {
    const finishedAt = now().toISOString()
    recovered.push(
      await store.importBatches.update(batch.id, {
        status: 'failed',
        finishedAt,
        updatedAt: finishedAt,
        failureKind: 'interrupted',
        failureMessage: `Interrupted after ${batch.rowsProcessed} of ${batch.totalRows ?? 'unknown'} rows`,
      })
    )
    logger.warn('Recovered interrupted import batch', {
      batchId: batch.id,
      rowsProcessed: batch.rowsProcessed,
    })
  }
  return recovered
}
