/**
 * Merge-specific error classes
 * @module merge/merge-error
 */

import { ReconcileError } from '../utils/errors.js'
import type { SourceSystem } from '../types/entities.js'

/**
 * Base error class for all merge-related errors
 */
export class MergeError extends ReconcileError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'MergeError'
  }
}

/**
 * Error thrown when an incoming row carries a different external id for a
 * source than the one already linked to the matched entity. Linking is never
 * reassigned by an import; an administrator has to relink explicitly.
 */
export class ExternalIdConflictError extends MergeError {
  public readonly entityId: string
  public readonly source: SourceSystem
  public readonly linkedId: string
  public readonly incomingId: string

  constructor(
    entityId: string,
    source: SourceSystem,
    linkedId: string,
    incomingId: string
  ) {
    super(
      `Entity ${entityId} is linked to ${source} id '${linkedId}', row carries '${incomingId}'`,
      'EXTERNAL_ID_CONFLICT',
      { entityId, source, linkedId, incomingId }
    )
    this.name = 'ExternalIdConflictError'
    this.entityId = entityId
    this.source = source
    this.linkedId = linkedId
    this.incomingId = incomingId
  }
}
