/**
 * Salesforce picklist values mapped to canonical enums
 * @module importers/salesforce/value-maps
 */

import type { EventFormat, EventStatus, ParticipationStatus } from '../../types/entities.js'

const EVENT_STATUS = new Map<string, EventStatus>([
  ['teacher no-show', 'No Show'],
  ['teacher cancelation', 'Cancelled'],
  ['successfully completed', 'Completed'],
  ['completed', 'Completed'],
  ['confirmed', 'Confirmed'],
  ['cancelled', 'Cancelled'],
  ['canceled', 'Cancelled'],
  ['published', 'Published'],
  ['requested', 'Requested'],
  ['draft', 'Draft'],
  ['technical difficulties', 'No Show'],
  ['local professional no-show', 'No Show'],
  ['pathful professional no-show', 'No Show'],
  ['pathful professional cancellation', 'Cancelled'],
  ['local professional cancellation', 'Cancelled'],
  ['teacher requested', 'Requested'],
  ['industry chat', 'Confirmed'],
])

/**
 * Session status picklist → event status. Blank is `Requested`; unknown
 * values return null so the caller can fall back and warn.
 */
export function mapEventStatus(value: string | undefined): EventStatus | null {
  if (!value) return 'Requested'
  return EVENT_STATUS.get(value.trim().toLowerCase()) ?? null
}

export function mapEventFormat(value: string | undefined): EventFormat {
  return value?.trim().toLowerCase() === 'virtual' ? 'virtual' : 'in_person'
}

const PARTICIPATION_STATUS = new Map<string, ParticipationStatus>([
  ['attended', 'Attended'],
  ['completed', 'Attended'],
  ['successfully completed', 'Attended'],
  ['no-show', 'NoShow'],
  ['no show', 'NoShow'],
  ['teacher no-show', 'NoShow'],
  ['cancelled', 'Canceled'],
  ['canceled', 'Canceled'],
  ['scheduled', 'SignedUp'],
  ['confirmed', 'SignedUp'],
  ['registered', 'SignedUp'],
  ['signed up', 'SignedUp'],
])

export function mapParticipationStatus(value: string): ParticipationStatus | null {
  return PARTICIPATION_STATUS.get(value.trim().toLowerCase()) ?? null
}

/**
 * Checkbox values arrive as `true`/`false` strings (or `1`/`0` from reports)
 */
export function parseCheckbox(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false
  return undefined
}

/**
 * Multi-select picklist (`a;b;c`) → trimmed, de-duplicated values
 */
export function splitMultiSelect(value: string | undefined): string[] {
  if (!value) return []
  return [...new Set(value.split(';').map((part) => part.trim()).filter(Boolean))]
}
