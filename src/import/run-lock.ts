/**
 * Single-flight lock for import runs
 * @module import/run-lock
 */

import { ImportInProgressError } from './import-error.js'

/**
 * Keeps two batches of the same entity type from running against one store
 * at the same time. Locks are held in process; schedulers running several
 * processes must enforce their own single-flight discipline.
 */
export class ImportRunLock {
  private readonly held = new Map<string, string>()

  /**
   * @returns a release function; calling it more than once is a no-op
   * @throws {ImportInProgressError} when the key is already held
   */
  acquire(location: string, entityType: string, batchId: string): () => void {
    const key = `${location}#${entityType}`
    if (this.held.has(key)) {
      throw new ImportInProgressError(entityType, location)
    }
    this.held.set(key, batchId)
    return () => {
      if (this.held.get(key) === batchId) this.held.delete(key)
    }
  }

  isHeld(location: string, entityType: string): boolean {
    return this.held.has(`${location}#${entityType}`)
  }
}

/** Lock shared by every batch processor in the process */
export const sharedRunLock = new ImportRunLock()
