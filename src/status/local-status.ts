/**
 * Local-volunteer status from address data
 * @module status/local-status
 */

import { DEFAULT_LOCALITY, type LocalityConfig } from '../config/config.js'
import type { Address, LocalStatus } from '../types/entities.js'

function zipStatus(zipCode: string, locality: LocalityConfig): LocalStatus {
  const prefix = zipCode.trim().slice(0, 3)
  if (locality.metroZipPrefixes.includes(prefix)) return 'local'
  if (locality.regionalZipPrefixes.includes(prefix)) return 'partial'
  return 'non_local'
}

/**
 * Classifies a volunteer by ZIP prefix.
 *
 * The primary address decides when there is one; a primary address without
 * a ZIP counts as `partial`. Otherwise the first home address with a ZIP
 * decides. With nothing to go on the status is `unknown`, never `non_local`.
 *
 * @example
 * ```typescript
 * deriveLocalStatus([{ zipCode: '64111', type: 'home', primary: true }]) // 'local'
 * deriveLocalStatus([])                                                   // 'unknown'
 * ```
 */
export function deriveLocalStatus(
  addresses: readonly Address[],
  locality: LocalityConfig = DEFAULT_LOCALITY
): LocalStatus {
  const primary = addresses.find((address) => address.primary)
  if (primary) {
    return primary.zipCode?.trim() ? zipStatus(primary.zipCode, locality) : 'partial'
  }

  const home = addresses.find((address) => address.type === 'home' && address.zipCode?.trim())
  if (home?.zipCode) {
    return zipStatus(home.zipCode, locality)
  }
  return 'unknown'
}
