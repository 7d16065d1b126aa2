/**
 * Salesforce Session_Participant__c → volunteer and student participations
 * @module importers/salesforce/participations
 */

import type { SourceRowView } from '../../import/columns.js'
import { RowInvalidError } from '../../import/import-error.js'
import type { ColumnSpec, ImportDefinition, RowContext } from '../../import/types.js'
import type { Repository } from '../../store/types.js'
import type {
  CanonicalEntity,
  CanonicalEvent,
  ParticipantType,
  ParticipationStatus,
  SourceSystem,
} from '../../types/entities.js'
import { cacheKeys, mergeAndSave, newEntity, resolveUnique, rowKind } from '../shared.js'
import { mapParticipationStatus } from './value-maps.js'

const VOLUNTEER_PARTICIPATION_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Contact__c', aliases: [], required: true },
  { key: 'Session__c', aliases: [], required: true },
  { key: 'Status__c', aliases: [], required: true },
  { key: 'Delivery_Hours__c', aliases: [] },
  { key: 'Participant_Type__c', aliases: [] },
]

const STUDENT_PARTICIPATION_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Contact__c', aliases: [], required: true },
  { key: 'Session__c', aliases: [], required: true },
  { key: 'Status__c', aliases: [], required: true },
  { key: 'Delivery_Hours__c', aliases: [] },
]

function requireStatus(row: SourceRowView): ParticipationStatus {
  const raw = row.require('Status__c')
  const status = mapParticipationStatus(raw)
  if (!status) {
    throw new RowInvalidError(`Unknown participation status: ${raw}`, 'Status__c', raw)
  }
  return status
}

function deliveryHours(row: SourceRowView): number | null {
  const hours = row.getNumber('Delivery_Hours__c')
  if (hours === undefined) return null
  if (hours < 0) {
    throw new RowInvalidError(
      `'Delivery_Hours__c' must not be negative: ${hours}`,
      'Delivery_Hours__c',
      String(hours)
    )
  }
  return hours
}

function participantType(value: string | undefined): ParticipantType {
  return value?.trim().toLowerCase() === 'presenter' ? 'Presenter' : 'Volunteer'
}

/**
 * Entity a foreign-key column points at. A reference the store has never
 * imported makes the row invalid: the parent import has to run first.
 */
async function requireReference<T extends CanonicalEntity>(
  row: SourceRowView,
  column: string,
  repository: Repository<T>,
  label: string
): Promise<T> {
  const id = row.require(column)
  const found = await repository.findByExternalId('salesforce', id)
  if (!found) {
    throw new RowInvalidError(`Unknown ${label} ${id} in '${column}'`, column, id)
  }
  return found
}

async function requireEvent(
  row: SourceRowView,
  context: RowContext<null>
): Promise<CanonicalEvent> {
  return requireReference(row, 'Session__c', context.store.events, 'session')
}

/**
 * Volunteer participations. Rows are matched by participation id, then by
 * the (event, volunteer) pair so that a participation first recorded by
 * another system is linked rather than duplicated.
 */
export function salesforceVolunteerParticipationImport(): ImportDefinition<null> {
  const source: SourceSystem = 'salesforce'
  return {
    name: 'salesforce-volunteer-participations',
    entityType: 'eventParticipation',
    source,
    columns: VOLUNTEER_PARTICIPATION_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    prepare: async () => null,

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const status = requireStatus(row)
      const hours = deliveryHours(row)
      const volunteer = await requireReference(
        row,
        'Contact__c',
        context.store.volunteers,
        'volunteer'
      )
      const event = await requireEvent(row, context)

      const participations = context.store.eventParticipations
      const { entity: linked } = await resolveUnique(
        context.resolver,
        participations,
        'eventParticipation',
        { externalId: { source, id: salesforceId } }
      )
      const existing =
        linked ??
        (await participations.findOne({ eventId: event.id, volunteerId: volunteer.id }))

      const saved = await mergeAndSave(context, participations, {
        entityType: 'eventParticipation',
        source,
        existing,
        incoming: {
          eventId: event.id,
          volunteerId: volunteer.id,
          participantType: participantType(row.get('Participant_Type__c')),
          status,
          deliveryHours: hours,
          origin: existing ? undefined : source,
        },
        externalId: salesforceId,
        create: newEntity.eventParticipation,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.volunteer(volunteer.id))
        context.affect(cacheKeys.event(event.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}

/**
 * Student participations, matched by participation id, then by the
 * (event, student) pair.
 */
export function salesforceStudentParticipationImport(): ImportDefinition<null> {
  return {
    name: 'salesforce-student-participations',
    entityType: 'eventStudent',
    source: 'salesforce',
    columns: STUDENT_PARTICIPATION_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    prepare: async () => null,

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const status = requireStatus(row)
      const hours = deliveryHours(row)
      const student = await requireReference(row, 'Contact__c', context.store.students, 'student')
      const event = await requireEvent(row, context)

      const attendance = context.store.eventStudents
      const { entity: linked } = await resolveUnique(
        context.resolver,
        attendance,
        'eventStudent',
        { externalId: { source: 'salesforce', id: salesforceId } }
      )
      const existing =
        linked ?? (await attendance.findOne({ eventId: event.id, studentId: student.id }))

      const saved = await mergeAndSave(context, attendance, {
        entityType: 'eventStudent',
        source: 'salesforce',
        existing,
        incoming: { eventId: event.id, studentId: student.id, status, deliveryHours: hours },
        externalId: salesforceId,
        create: newEntity.eventStudent,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.event(event.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
