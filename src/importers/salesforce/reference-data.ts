/**
 * Salesforce Account (district and school record types) → District, School
 * @module importers/salesforce/reference-data
 */

import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { District, School } from '../../types/entities.js'
import { mergeAndSave, newEntity, resolveUnique, rowKind } from '../shared.js'

const DISTRICT_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Name', aliases: [], required: true },
  { key: 'School_Code_External_ID__c', aliases: [] },
]

const SCHOOL_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'Name', aliases: [], required: true },
  { key: 'ParentId', aliases: [] },
  { key: 'School_Code_External_ID__c', aliases: [] },
]

export function salesforceDistrictImport(): ImportDefinition<null> {
  return {
    name: 'salesforce-districts',
    entityType: 'district',
    source: 'salesforce',
    columns: DISTRICT_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    prepare: async () => null,

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const { entity } = await resolveUnique(
        context.resolver,
        context.store.districts,
        'district',
        { externalId: { source: 'salesforce', id: salesforceId } }
      )

      const incoming: IncomingFields<District> = {
        name: row.require('Name'),
        code: row.get('School_Code_External_ID__c'),
      }
      const saved = await mergeAndSave(context, context.store.districts, {
        entityType: 'district',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.district,
      })
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}

/**
 * School import. Run after the district import: a school whose parent
 * account is not a known district is saved without a district.
 */
export function salesforceSchoolImport(): ImportDefinition<Map<string, string>> {
  return {
    name: 'salesforce-schools',
    entityType: 'school',
    source: 'salesforce',
    columns: SCHOOL_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    async prepare(context) {
      const districts = new Map<string, string>()
      for (const district of await context.store.districts.findMany()) {
        const id = district.externalIds.salesforce
        if (id) districts.set(id, district.id)
      }
      return districts
    },

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const schools = context.store.schools
      const { entity } = await resolveUnique(context.resolver, schools, 'school', {
        externalId: { source: 'salesforce', id: salesforceId },
      })

      const incoming: IncomingFields<School> = {
        name: row.require('Name'),
        code: row.get('School_Code_External_ID__c'),
      }
      const parentId = row.get('ParentId')
      if (parentId) {
        const districtId = context.prepared.get(parentId)
        if (districtId) {
          incoming.districtId = districtId
        } else {
          context.warn(`Unknown district ${parentId}; school not linked`, context.rowNumber)
        }
      }

      const saved = await mergeAndSave(context, schools, {
        entityType: 'school',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.school,
      })
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
