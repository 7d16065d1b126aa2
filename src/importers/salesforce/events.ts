/**
 * Salesforce Session → Event import
 * @module importers/salesforce/events
 */

import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { CanonicalEvent } from '../../types/entities.js'
import {
  cacheKeys,
  mergeAndSave,
  newEntity,
  optionalCount,
  optionalDateTime,
  requireDateTime,
  resolveUnique,
  rowKind,
} from '../shared.js'
import { mapEventFormat, mapEventStatus, parseCheckbox, splitMultiSelect } from './value-maps.js'

const EVENT_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Name', aliases: [], required: true },
  { key: 'Start_Date_and_Time__c', aliases: [], required: true },
  { key: 'End_Date_and_Time__c', aliases: [] },
  { key: 'Session_Status__c', aliases: [] },
  { key: 'Format__c', aliases: [] },
  { key: 'Location_Information__c', aliases: [] },
  { key: 'School__c', aliases: [] },
  { key: 'Cancellation_Reason__c', aliases: [] },
  { key: 'Career_Cluster__c', aliases: [] },
  { key: 'Total_Requested_Volunteer_Jobs__c', aliases: [] },
  { key: 'Registered_Student_Count__c', aliases: [] },
  { key: 'Attended_Student_Count__c', aliases: [] },
  { key: 'Display_on_Website__c', aliases: [] },
  { key: 'District__c', aliases: [] },
]

interface EventLookups {
  /** School name by Salesforce id */
  schools: Map<string, string>
  /** District id by Salesforce id or lowercase name */
  districts: Map<string, string>
}

/**
 * Event import for in-person and virtual sessions recorded in the CRM.
 *
 * The CRM owns in-person core fields. Visibility and district links are
 * taken from the row only when the event is created; after that they belong
 * to the publishing system and CRM values are preserved, not applied.
 */
export function salesforceEventImport(): ImportDefinition<EventLookups> {
  return {
    name: 'salesforce-events',
    entityType: 'event',
    source: 'salesforce',
    columns: EVENT_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    async prepare(context) {
      const schools = new Map<string, string>()
      for (const school of await context.store.schools.findMany()) {
        const id = school.externalIds.salesforce
        if (id) schools.set(id, school.name)
      }
      const districts = new Map<string, string>()
      for (const district of await context.store.districts.findMany()) {
        const id = district.externalIds.salesforce
        if (id) districts.set(id, district.id)
        districts.set(district.name.toLowerCase(), district.id)
      }
      return { schools, districts }
    },

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const startDate = requireDateTime(row, 'Start_Date_and_Time__c')
      const endDate = optionalDateTime(row, 'End_Date_and_Time__c')

      const rawStatus = row.get('Session_Status__c')
      let status = mapEventStatus(rawStatus)
      if (!status) {
        context.warn(`Unknown session status '${rawStatus}'; recorded as Requested`, context.rowNumber)
        status = 'Requested'
      }

      const events = context.store.events
      const { entity } = await resolveUnique(context.resolver, events, 'event', {
        externalId: { source: 'salesforce', id: salesforceId },
      })

      const schoolId = row.get('School__c')
      const incoming: IncomingFields<CanonicalEvent> = {
        title: row.require('Name'),
        startDate,
        endDate,
        durationMinutes: endDate
          ? Math.max(0, Math.round((Date.parse(endDate) - Date.parse(startDate)) / 60000))
          : undefined,
        location: row.get('Location_Information__c'),
        schoolName: schoolId ? context.prepared.schools.get(schoolId) : undefined,
        status,
        cancellationReason: row.get('Cancellation_Reason__c'),
        careerCluster: row.get('Career_Cluster__c'),
        volunteersNeeded: optionalCount(row, 'Total_Requested_Volunteer_Jobs__c'),
        registeredCount: optionalCount(row, 'Registered_Student_Count__c'),
        attendedCount: optionalCount(row, 'Attended_Student_Count__c'),
        publicVisibility: parseCheckbox(row.get('Display_on_Website__c')),
      }
      if (row.hasColumn('District__c')) {
        incoming.districtIds = splitMultiSelect(row.get('District__c'))
          .map((value) => context.prepared.districts.get(value) ?? context.prepared.districts.get(value.toLowerCase()))
          .filter((id): id is string => id !== undefined)
      }
      if (!entity) {
        incoming.format = mapEventFormat(row.get('Format__c'))
      }

      const saved = await mergeAndSave(context, events, {
        entityType: 'event',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.event,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.event(saved.entity.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
