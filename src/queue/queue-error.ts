/**
 * Queue-specific error classes
 * @module queue/queue-error
 */

import { ReconcileError } from '../utils/errors.js'
import type { ReviewStatus } from './types.js'

/**
 * Base error class for all queue-related errors
 */
export class QueueError extends ReconcileError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'QueueError'
  }
}

/**
 * Error thrown when a review item is not found
 */
export class QueueItemNotFoundError extends QueueError {
  constructor(id: string) {
    super(`Review item not found: ${id}`, 'QUEUE_ITEM_NOT_FOUND', { id })
    this.name = 'QueueItemNotFoundError'
  }
}

/**
 * Error thrown when attempting an invalid status transition
 */
export class InvalidStatusTransitionError extends QueueError {
  constructor(from: ReviewStatus, to: ReviewStatus) {
    super(
      `Invalid status transition from '${from}' to '${to}': only pending items can be decided`,
      'INVALID_STATUS_TRANSITION',
      { from, to }
    )
    this.name = 'InvalidStatusTransitionError'
  }
}

/**
 * Error thrown when review item data is invalid
 */
export class QueueValidationError extends QueueError {
  constructor(field: string, reason: string, context?: Record<string, unknown>) {
    super(`Review item validation failed for '${field}': ${reason}`, 'QUEUE_VALIDATION_ERROR', {
      field,
      reason,
      ...context,
    })
    this.name = 'QueueValidationError'
  }
}
