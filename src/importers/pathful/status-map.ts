/**
 * Pathful attendance statuses and event status progression
 * @module importers/pathful/status-map
 */

import type { EventStatus, ParticipationStatus } from '../../types/entities.js'

const ATTENDANCE_STATUS = new Map<string, ParticipationStatus>([
  ['registered', 'SignedUp'],
  ['upcoming', 'SignedUp'],
  ['attended', 'Attended'],
  ['completed', 'Attended'],
  ['absent', 'NoShow'],
  ['no-show', 'NoShow'],
  ['noshow', 'NoShow'],
  ['canceled', 'Canceled'],
  ['cancelled', 'Canceled'],
])

/**
 * Maps an export status to a participation status, or null when unknown
 *
 * @example
 * ```typescript
 * mapAttendanceStatus('Upcoming')  // 'SignedUp'
 * mapAttendanceStatus('No Show')   // 'NoShow'
 * mapAttendanceStatus('pending')   // null
 * ```
 */
export function mapAttendanceStatus(value: string): ParticipationStatus | null {
  const key = value.trim().toLowerCase().replace(/[\s_]+/g, '-')
  return ATTENDANCE_STATUS.get(key) ?? null
}

const PROGRESSION: readonly EventStatus[] = [
  'Draft',
  'Requested',
  'Confirmed',
  'Published',
  'Completed',
]

const TERMINAL: readonly EventStatus[] = ['Cancelled', 'No Show']

/**
 * Event status after an import. Statuses only move forward along
 * Draft → Requested → Confirmed → Published → Completed; Cancelled and No
 * Show are always accepted and never left.
 */
export function advanceEventStatus(current: EventStatus, incoming: EventStatus): EventStatus {
  if (TERMINAL.includes(incoming)) return incoming
  if (TERMINAL.includes(current)) return current
  return PROGRESSION.indexOf(incoming) > PROGRESSION.indexOf(current) ? incoming : current
}

/**
 * Event status implied by the attendance of its teachers
 */
export function eventStatusFromAttendance(
  statuses: readonly ParticipationStatus[]
): EventStatus | null {
  if (statuses.includes('Attended')) return 'Completed'
  if (statuses.includes('SignedUp')) return 'Confirmed'
  return null
}
