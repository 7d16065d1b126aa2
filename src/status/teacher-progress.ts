/**
 * Teacher progress status derivation
 * @module status/teacher-progress
 */

import type { EventTeacher, TeacherProgressStatus } from '../types/entities.js'
import { inWindow, type ReportingWindow } from './academic-year.js'

/**
 * A teacher's session together with the start date of its event
 */
export interface SessionOccurrence {
  session: Pick<EventTeacher, 'status' | 'attendanceConfirmedAt'>
  /** ISO start of the event the session belongs to */
  eventStart: string
}

export interface TeacherProgressSummary {
  status: TeacherProgressStatus
  /** Confirmed attendances with the event inside the window */
  completed: number
  /** Signed-up or attended sessions whose event is still ahead */
  planned: number
  target: number
  /** Sessions still needed to reach the target */
  needed: number
  /** Completed as a share of target, 0-100 */
  progressPercent: number
  window: string
}

/**
 * Derives progress for one teacher. Achieved is checked first, so a teacher
 * who has met the target with further signups ahead is Achieved.
 *
 * @example
 * ```typescript
 * deriveTeacherProgress(
 *   [
 *     { session: { status: 'Attended', attendanceConfirmedAt: '2025-10-01T15:00:00.000Z' }, eventStart: '2025-10-01T15:00:00.000Z' },
 *     { session: { status: 'SignedUp', attendanceConfirmedAt: null }, eventStart: '2026-02-01T15:00:00.000Z' },
 *   ],
 *   1,
 *   academicYearWindow('2025-2026'),
 *   new Date('2025-11-01T00:00:00Z')
 * ).status // 'Achieved'
 * ```
 */
export function deriveTeacherProgress(
  occurrences: readonly SessionOccurrence[],
  target: number,
  window: ReportingWindow,
  now: Date
): TeacherProgressSummary {
  const completed = occurrences.filter(
    ({ session, eventStart }) =>
      session.attendanceConfirmedAt !== null && inWindow(eventStart, window)
  ).length

  const planned = occurrences.filter(
    ({ session, eventStart }) =>
      (session.status === 'SignedUp' || session.status === 'Attended') &&
      Date.parse(eventStart) > now.getTime()
  ).length

  let status: TeacherProgressStatus
  if (completed >= target) {
    status = 'Achieved'
  } else if (planned >= 1) {
    status = 'In Progress'
  } else {
    status = 'Not Started'
  }

  return {
    status,
    completed,
    planned,
    target,
    needed: Math.max(0, target - completed),
    progressPercent: target > 0 ? Math.min(100, Math.round((completed / target) * 100)) : 100,
    window: window.label,
  }
}
