/**
 * Pathful virtual-session export import
 * @module importers/pathful/pathful-import
 */

import { normalizeEmail } from '../../core/normalizers/email.js'
import { parseFullName } from '../../core/normalizers/name.js'
import { parseSourceDateTime } from '../../core/normalizers/date.js'
import type { SourceRowView } from '../../import/columns.js'
import { RowInvalidError, RowUnmatchedError } from '../../import/import-error.js'
import type { ColumnSpec, ImportDefinition, RowContext, RowResult } from '../../import/types.js'
import type { ChangeSummary, IncomingFields, MergeOutcome } from '../../merge/types.js'
import type {
  CanonicalEvent,
  EventParticipation,
  EventTeacher,
  ParticipationStatus,
  Teacher,
  TeacherProgress,
} from '../../types/entities.js'
import {
  cacheKeys,
  mergeAndSave,
  newEntity,
  optionalCount,
  optionalEmail,
  requireDateTime,
  requireEmail,
  resolveUnique,
  rowKind,
  type SavedMerge,
} from '../shared.js'
import {
  advanceEventStatus,
  eventStatusFromAttendance,
  mapAttendanceStatus,
} from './status-map.js'

export const PATHFUL_COLUMNS: readonly ColumnSpec[] = [
  { key: 'sessionId', aliases: ['Session ID', 'SessionId', 'session_id'], required: true },
  { key: 'eventId', aliases: ['Event ID', 'EventId', 'event_id'], required: true },
  {
    key: 'teacherEmail',
    aliases: ['Teacher Email', 'Educator Email', 'teacher_email', 'Email'],
    required: true,
  },
  {
    key: 'sessionStart',
    aliases: ['Session Start', 'Date', 'Session Date', 'Start Time', 'session_start'],
    required: true,
  },
  { key: 'status', aliases: ['Status', 'Attendance Status', 'Session Status'], required: true },
  { key: 'teacherName', aliases: ['Teacher Name', 'Educator Name', 'Educator'] },
  { key: 'presenterEmail', aliases: ['Presenter Email', 'Presenter'] },
  { key: 'title', aliases: ['Title', 'Session Title', 'Session Name'] },
  { key: 'duration', aliases: ['Duration', 'Duration (min)', 'Duration Minutes'] },
  { key: 'school', aliases: ['School', 'School Name'] },
  { key: 'careerCluster', aliases: ['Career Cluster'] },
  { key: 'partner', aliases: ['Partner', 'Partner Name'] },
]

export interface PathfulImportOptions {
  /** Rows whose partner column differs (case-insensitively) are skipped */
  partnerFilter?: string
}

interface PathfulPrepared {
  /** Roster entries by email; teachers not listed here are never created */
  rosterByEmail: Map<string, TeacherProgress>
}

/**
 * `eventId|teacherEmail|sessionStart`, used when a row has no session id
 */
export function sessionCompositeKey(eventId: string, email: string, startIso: string): string {
  return `${eventId}|${email}|${startIso}`
}

function dedupeKey(row: SourceRowView): string | null {
  const sessionId = row.get('sessionId')
  if (sessionId) return `session:${sessionId}`
  const eventId = row.get('eventId')
  const email = normalizeEmail(row.get('teacherEmail'))
  const start = parseSourceDateTime(row.get('sessionStart'))
  if (!eventId || !email || !start) return null
  return `composite:${sessionCompositeKey(eventId, email, start.toISOString())}`
}

/**
 * Teacher for the row. Unknown teachers are created only when they appear
 * on an imported roster.
 */
async function resolveTeacher(
  row: SourceRowView,
  email: string,
  context: RowContext<PathfulPrepared>
): Promise<SavedMerge<Teacher>> {
  const teachers = context.store.teachers
  const resolved = await resolveUnique(context.resolver, teachers, 'teacher', {
    emails: [email],
  })
  const { attemptedKeys } = resolved

  // A roster entry may already be linked to a teacher filed under another email
  const roster = context.prepared.rosterByEmail.get(email)
  const entity =
    resolved.entity ?? (roster?.teacherId ? await teachers.findById(roster.teacherId) : null)
  if (!entity && !roster) {
    throw new RowUnmatchedError(
      `Teacher ${email} is not on an imported roster`,
      'teacher',
      attemptedKeys
    )
  }

  const name = parseFullName(row.get('teacherName') ?? roster?.name)
  const incoming: IncomingFields<Teacher> = {
    contact: {
      firstName: name.firstName || undefined,
      lastName: name.lastName || undefined,
    },
  }
  if (!entity) {
    incoming.kind = 'teacher'
    incoming.contact = { ...incoming.contact, emails: [email] }
    incoming.schoolName = roster?.building || row.get('school')
  }

  const saved = await mergeAndSave(context, teachers, {
    entityType: 'teacher',
    source: 'pathful',
    existing: entity,
    incoming,
    create: newEntity.teacher,
  })

  if (saved.outcome === 'created') {
    const unlinked = await context.store.teacherProgress.findMany(
      (progress) => progress.email === email && progress.teacherId === null
    )
    for (const progress of unlinked) {
      await context.store.teacherProgress.update(progress.id, {
        teacherId: saved.entity.id,
        teacherMatchConfidence: 'exact',
        updatedAt: saved.entity.updatedAt,
      })
      context.affect(cacheKeys.teacherProgress(progress.id))
    }
  }
  return saved
}

/**
 * Pathful session import: one row per (session, teacher).
 *
 * Each row resolves the teacher (roster pre-registration required), the
 * virtual event by Pathful event id, and the teacher's session by session id
 * or composite key. Event counts and status are recomputed from every
 * stored session of the event, so re-running a file leaves them unchanged.
 *
 * @example
 * ```typescript
 * const batch = await processor.run(
 *   store,
 *   pathfulSessionImport({ partnerFilter: 'PREP-KC' }),
 *   csvFileSource('sessions.csv')
 * )
 * ```
 */
export function pathfulSessionImport(
  options: PathfulImportOptions = {}
): ImportDefinition<PathfulPrepared> {
  const partner = options.partnerFilter?.trim().toLowerCase()

  return {
    name: 'pathful-sessions',
    entityType: 'eventTeacher',
    source: 'pathful',
    columns: PATHFUL_COLUMNS,
    dedupe: { key: dedupeKey, keep: 'keep-last' },

    async prepare(context) {
      const rosterByEmail = new Map<string, TeacherProgress>()
      for (const progress of await context.store.teacherProgress.findMany()) {
        if (!rosterByEmail.has(progress.email)) rosterByEmail.set(progress.email, progress)
      }
      return { rosterByEmail }
    },

    async processRow(row, context): Promise<RowResult> {
      if (partner && row.get('partner')?.toLowerCase() !== partner) {
        return { kind: 'skipped' }
      }

      const rawStatus = row.require('status')
      const status = mapAttendanceStatus(rawStatus)
      if (!status) {
        throw new RowInvalidError(`Unknown attendance status: ${rawStatus}`, 'status', rawStatus)
      }
      const sessionStart = requireDateTime(row, 'sessionStart')
      const email = requireEmail(row, 'teacherEmail')
      const eventExternalId = row.require('eventId')
      const sessionId = row.get('sessionId')
      const duration = optionalCount(row, 'duration')
      const presenterEmail = optionalEmail(row, 'presenterEmail')
      const compositeKey = sessionCompositeKey(eventExternalId, email, sessionStart)

      const teacher = await resolveTeacher(row, email, context)

      const events = context.store.events
      const { entity: event } = await resolveUnique(context.resolver, events, 'event', {
        externalId: { source: 'pathful', id: eventExternalId },
      })

      const { entity: session } = await resolveUnique(
        context.resolver,
        context.store.eventTeachers,
        'eventTeacher',
        {
          externalId: sessionId ? { source: 'pathful', id: sessionId } : undefined,
          compositeKey,
        },
        { compositeKeyOf: (record) => record.compositeKey }
      )
      const existingSession =
        session ??
        (event
          ? await context.store.eventTeachers.findOne({
              eventId: event.id,
              teacherId: teacher.entity.id,
            })
          : null)

      const siblings = event
        ? await context.store.eventTeachers.findMany(
            (record) => record.eventId === event.id && record.id !== existingSession?.id
          )
        : []
      const statuses: ParticipationStatus[] = [...siblings.map((s) => s.status), status]
      const starts = [...siblings.map((s) => s.sessionStart), sessionStart].sort()
      const implied = eventStatusFromAttendance(statuses)
      const current = event?.status ?? 'Confirmed'

      const eventIncoming: IncomingFields<CanonicalEvent> = {
        title: row.get('title') ?? (event ? undefined : `Virtual session ${eventExternalId}`),
        startDate: starts[0],
        durationMinutes: duration,
        schoolName: row.get('school'),
        careerCluster: row.get('careerCluster'),
        status: implied ? advanceEventStatus(current, implied) : current,
        registeredCount: statuses.filter((s) => s === 'SignedUp' || s === 'Attended').length,
        attendedCount: statuses.filter((s) => s === 'Attended').length,
        format: event ? undefined : 'virtual',
      }
      const savedEvent = await mergeAndSave(context, events, {
        entityType: 'event',
        source: 'pathful',
        existing: event,
        incoming: eventIncoming,
        externalId: eventExternalId,
        create: newEntity.event,
      })

      const sessionIncoming: IncomingFields<EventTeacher> = {
        eventId: savedEvent.entity.id,
        teacherId: teacher.entity.id,
        status,
        attendanceConfirmedAt: status === 'Attended' ? sessionStart : null,
        sessionStart,
        compositeKey,
      }
      const savedSession = await mergeAndSave(context, context.store.eventTeachers, {
        entityType: 'eventTeacher',
        source: 'pathful',
        existing: existingSession,
        incoming: sessionIncoming,
        externalId: sessionId,
        create: newEntity.eventTeacher,
      })

      const secondary: Array<{ outcome: MergeOutcome; summary: ChangeSummary }> = [
        teacher,
        savedEvent,
      ]
      if (presenterEmail) {
        const presenter = await recordPresenter(
          presenterEmail,
          savedEvent.entity,
          duration,
          context
        )
        if (presenter) secondary.push(presenter)
      }

      context.affect(cacheKeys.teacher(teacher.entity.id))
      context.affect(cacheKeys.event(savedEvent.entity.id))

      return {
        kind: rowKind(savedSession.outcome, secondary.map((saved) => saved.outcome)),
        changes: [savedSession.summary, ...secondary.map((saved) => saved.summary)],
      }
    },
  }
}

/**
 * Records the presenting volunteer. Staff-edited participant tags are kept
 * on later imports; an unknown presenter only produces a warning.
 */
async function recordPresenter(
  email: string,
  event: CanonicalEvent,
  duration: number | undefined,
  context: RowContext<PathfulPrepared>
): Promise<SavedMerge<EventParticipation> | null> {
  const resolution = await context.resolver.resolve(context.store.volunteers, { emails: [email] })
  if (resolution.status !== 'matched') {
    context.warn(
      resolution.status === 'ambiguous'
        ? `Presenter ${email} matches several volunteers; participation not recorded`
        : `Presenter ${email} not found; participation not recorded`,
      context.rowNumber
    )
    return null
  }

  const volunteer = resolution.entity
  const participations = context.store.eventParticipations
  const existing = await participations.findOne({ eventId: event.id, volunteerId: volunteer.id })
  const attended = event.status === 'Completed'

  const saved = await mergeAndSave(context, participations, {
    entityType: 'eventParticipation',
    source: 'pathful',
    existing,
    incoming: {
      eventId: event.id,
      volunteerId: volunteer.id,
      participantType: 'Presenter',
      status: attended ? 'Attended' : 'SignedUp',
      deliveryHours:
        attended && duration !== undefined ? Math.round((duration / 60) * 100) / 100 : null,
      origin: 'pathful',
    },
    create: newEntity.eventParticipation,
  })
  context.affect(cacheKeys.volunteer(volunteer.id))
  return saved
}
