/**
 * Delta sync watermarks
 * @module import/delta-sync
 */

import type { CanonicalStore } from '../store/types.js'
import type { RowSource } from './types.js'

export interface DeltaWatermarkOptions {
  /** Minutes subtracted from the last run's start, for clock drift and late writes */
  bufferMinutes: number
}

/**
 * Source for one change window; `since` is null for a full read
 */
export type DeltaSource = (since: Date | null) => RowSource

/**
 * Start of the change window for the next run of an import: the start of
 * its last completed run that read every row, less the buffer. Failed and
 * early-terminated runs never move it. Null when there is no such run.
 *
 * @example
 * ```typescript
 * const since = await deltaWatermark(store, 'salesforce-volunteers', { bufferMinutes: 60 })
 * ```
 */
export async function deltaWatermark(
  store: CanonicalStore,
  importName: string,
  options: DeltaWatermarkOptions
): Promise<Date | null> {
  const runs = await store.importBatches.findMany(
    (batch) =>
      batch.importName === importName && batch.status === 'completed' && !batch.terminatedEarly
  )

  let latest: number | null = null
  for (const run of runs) {
    const started = Date.parse(run.startedAt)
    if (latest === null || started > latest) latest = started
  }
  return latest === null ? null : new Date(latest - options.bufferMinutes * 60_000)
}
