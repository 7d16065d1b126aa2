/**
 * Sources over CRM queries
 * @module import/sources/salesforce-source
 */

import type { DeltaSource } from '../delta-sync.js'
import type { SourceRow } from '../types.js'
import { lazySource } from './array-source.js'

/**
 * SOQL datetime literal (UTC, whole seconds)
 */
export function soqlDateTime(value: Date): string {
  return `${value.toISOString().slice(0, 19)}Z`
}

/**
 * Adds `field > since` to a SOQL query ahead of any ORDER BY or LIMIT
 * clause. The query is returned as is when `since` is null.
 *
 * @example
 * ```typescript
 * withDeltaFilter("SELECT Id FROM Account WHERE Type = 'School' ORDER BY Name", since)
 * // "SELECT Id FROM Account WHERE Type = 'School' AND LastModifiedDate > 2025-09-01T11:00:00Z ORDER BY Name"
 * ```
 */
export function withDeltaFilter(
  soql: string,
  since: Date | null,
  field = 'LastModifiedDate'
): string {
  if (!since) return soql

  const condition = `${field} > ${soqlDateTime(since)}`
  const tail = /\s+(ORDER\s+BY|LIMIT)\b/i.exec(soql)
  const head = tail ? soql.slice(0, tail.index) : soql
  const rest = tail ? soql.slice(tail.index) : ''
  const keyword = /\bWHERE\b/i.test(head) ? 'AND' : 'WHERE'
  return `${head} ${keyword} ${condition}${rest}`
}

/**
 * Delta source over a SOQL query. `query` runs the filtered query against
 * the CRM and returns its records flattened to rows; anything it throws
 * marks the source unavailable.
 */
export function salesforceDeltaSource(
  soql: string,
  query: (soql: string) => Promise<readonly SourceRow[]>,
  field = 'LastModifiedDate'
): DeltaSource {
  return (since) => {
    const filtered = withDeltaFilter(soql, since, field)
    return lazySource(filtered, () => query(filtered))
  }
}
