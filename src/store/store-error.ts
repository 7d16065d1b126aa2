import { ReconcileError } from '../utils/errors.js'

/**
 * Base error class for all store-related errors.
 */
export class StoreError extends ReconcileError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'StoreError'
    Object.setPrototypeOf(this, StoreError.prototype)
  }
}

/**
 * Error thrown when the physical store cannot be opened.
 *
 * @example
 * ```typescript
 * throw new ConnectionError(
 *   'Failed to open store',
 *   { location: './data/polaris_kck.db' }
 * )
 * ```
 */
export class ConnectionError extends StoreError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', context)
    this.name = 'ConnectionError'
    Object.setPrototypeOf(this, ConnectionError.prototype)
  }
}

/**
 * Error thrown when a transaction cannot be opened, committed or rolled back.
 */
export class TransactionError extends StoreError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRANSACTION_ERROR', context)
    this.name = 'TransactionError'
    Object.setPrototypeOf(this, TransactionError.prototype)
  }
}

/**
 * Error thrown when a write would break a unique constraint.
 *
 * @example
 * ```typescript
 * throw new DuplicateKeyError(
 *   'eventTeachers',
 *   'eventId+teacherId',
 *   'evt-1|tch-9'
 * )
 * ```
 */
export class DuplicateKeyError extends StoreError {
  readonly collection: string
  readonly key: string

  constructor(collection: string, key: string, value: string) {
    super(
      `Duplicate ${key} '${value}' in ${collection}`,
      'DUPLICATE_KEY',
      { collection, key, value }
    )
    this.name = 'DuplicateKeyError'
    this.collection = collection
    this.key = key
    Object.setPrototypeOf(this, DuplicateKeyError.prototype)
  }
}

/**
 * Error thrown when a record is not found.
 */
export class NotFoundError extends StoreError {
  constructor(collection: string, id: string) {
    super(`Record '${id}' not found in ${collection}`, 'NOT_FOUND_ERROR', {
      collection,
      id,
    })
    this.name = 'NotFoundError'
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}
