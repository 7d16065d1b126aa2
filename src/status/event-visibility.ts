/**
 * Public-page visibility of events
 * @module status/event-visibility
 */

import type { CanonicalEvent } from '../types/entities.js'

/**
 * End of the event: its end date, else start plus duration, else its start
 */
export function eventEnd(event: Pick<CanonicalEvent, 'startDate' | 'endDate' | 'durationMinutes'>): number {
  if (event.endDate) return Date.parse(event.endDate)
  const start = Date.parse(event.startDate)
  return start + (event.durationMinutes ?? 0) * 60000
}

/**
 * An event is shown publicly only while the publishing toggle is on, it is
 * not cancelled and it has not ended.
 */
export function isPubliclyVisible(event: CanonicalEvent, now: Date): boolean {
  if (!event.publicVisibility || event.status === 'Cancelled') return false
  const end = eventEnd(event)
  return Number.isFinite(end) && end > now.getTime()
}
