/**
 * Sources over rows that are already decoded
 * @module import/sources/array-source
 */

import type { RowSource, SourceRow, SourceTable } from '../types.js'

/**
 * Wraps decoded rows (an API payload, Sheets values). Columns are the union
 * of the rows' keys in first-seen order, unless given explicitly.
 */
export function arraySource(
  rows: readonly SourceRow[],
  options: { description?: string; columns?: readonly string[] } = {}
): RowSource {
  return {
    description: options.description ?? 'rows',
    read: async (): Promise<SourceTable> => {
      const columns = options.columns ? [...options.columns] : collectColumns(rows)
      return { columns, rows: rows.map((row) => ({ ...row })) }
    },
  }
}

/**
 * Wraps a loader that fetches rows on demand (e.g. a CRM query). Anything
 * the loader throws marks the batch's source as unavailable.
 */
export function lazySource(
  description: string,
  load: () => Promise<readonly SourceRow[]>
): RowSource {
  return {
    description,
    read: async () => {
      const rows = await load()
      return { columns: collectColumns(rows), rows: [...rows] }
    },
  }
}

function collectColumns(rows: readonly SourceRow[]): string[] {
  const columns = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key)
  }
  return [...columns]
}
