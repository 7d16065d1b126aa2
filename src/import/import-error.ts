/**
 * Import error classes
 * @module import/import-error
 */

import { ReconcileError } from '../utils/errors.js'
import type { BatchFailureKind } from './types.js'

/**
 * Aborts a batch before any row is processed
 */
export class BatchFatalError extends ReconcileError {
  constructor(
    message: string,
    public readonly failureKind: BatchFailureKind,
    public readonly missingColumns: string[] = []
  ) {
    super(message, 'BATCH_FATAL', { failureKind, missingColumns })
    this.name = 'BatchFatalError'
  }
}

/**
 * A row with a malformed value. The row is skipped and the batch continues.
 */
export class RowInvalidError extends ReconcileError {
  constructor(
    message: string,
    public readonly column?: string,
    public readonly value?: string
  ) {
    super(message, 'ROW_INVALID', { column, value })
    this.name = 'RowInvalidError'
  }
}

/**
 * No entity matched and the row may not create one
 */
export class RowUnmatchedError extends ReconcileError {
  constructor(
    message: string,
    public readonly entityType: string,
    public readonly attemptedKeys: string[] = []
  ) {
    super(message, 'ROW_UNMATCHED', { entityType, attemptedKeys })
    this.name = 'RowUnmatchedError'
  }
}

/**
 * More than one existing entity matched the row
 */
export class AmbiguousMatchError extends ReconcileError {
  constructor(
    public readonly entityType: string,
    public readonly candidateIds: string[],
    public readonly attemptedKeys: string[] = []
  ) {
    super(
      `Ambiguous ${entityType} match: ${candidateIds.length} candidates (${candidateIds.join(', ')})`,
      'AMBIGUOUS_MATCH',
      { entityType, candidateIds, attemptedKeys }
    )
    this.name = 'AmbiguousMatchError'
  }
}

/**
 * A batch for the same entity type is already running against the store
 */
export class ImportInProgressError extends ReconcileError {
  constructor(
    public readonly entityType: string,
    location: string
  ) {
    super(
      `An import for '${entityType}' is already running against ${location}`,
      'IMPORT_IN_PROGRESS',
      { entityType, location }
    )
    this.name = 'ImportInProgressError'
  }
}
