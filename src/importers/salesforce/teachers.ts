/**
 * Salesforce Contact (teacher record type) → Teacher import
 * @module importers/salesforce/teachers
 */

import { normalizeEmail } from '../../core/normalizers/email.js'
import { normalizePhones } from '../../core/normalizers/phone.js'
import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { School, Teacher } from '../../types/entities.js'
import { cacheKeys, mergeAndSave, newEntity, resolveUnique, rowKind } from '../shared.js'

const TEACHER_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'FirstName', aliases: [], required: true },
  { key: 'LastName', aliases: [], required: true },
  { key: 'Email', aliases: [] },
  { key: 'Phone', aliases: [] },
  { key: 'Gender__c', aliases: [] },
  { key: 'npsp__Primary_Affiliation__c', aliases: [] },
]

/** Schools by Salesforce id */
export type SchoolsBySalesforceId = Map<string, School>

/**
 * Teacher import. Contacts are matched by Salesforce id, then by email, so
 * a teacher first seen on a district roster gains the CRM link. Names and
 * emails stay with the roster; the CRM fills them when blank and owns phone
 * numbers and the school link.
 */
export function salesforceTeacherImport(): ImportDefinition<SchoolsBySalesforceId> {
  return {
    name: 'salesforce-teachers',
    entityType: 'teacher',
    source: 'salesforce',
    columns: TEACHER_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    async prepare(context) {
      const schools: SchoolsBySalesforceId = new Map()
      for (const school of await context.store.schools.findMany()) {
        const id = school.externalIds.salesforce
        if (id) schools.set(id, school)
      }
      return schools
    },

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const rawEmail = row.get('Email')
      const email = rawEmail ? normalizeEmail(rawEmail) : null
      if (rawEmail && !email) {
        context.warn(`Ignored malformed Email: ${rawEmail}`, context.rowNumber)
      }

      const teachers = context.store.teachers
      const { entity } = await resolveUnique(context.resolver, teachers, 'teacher', {
        externalId: { source: 'salesforce', id: salesforceId },
        emails: email ? [email] : [],
      })

      const phones = normalizePhones([row.get('Phone')])
      const incoming: IncomingFields<Teacher> = {
        contact: {
          firstName: row.require('FirstName'),
          lastName: row.require('LastName'),
          emails: email ? [email] : undefined,
          phones: phones.length > 0 ? phones : undefined,
          gender: row.get('Gender__c')?.toLowerCase().replace(/\s+/g, '_'),
        },
      }
      if (!entity) incoming.kind = 'teacher'
      const schoolRef = row.get('npsp__Primary_Affiliation__c')
      if (schoolRef) {
        const school = context.prepared.get(schoolRef)
        if (school) {
          incoming.schoolId = school.id
          incoming.schoolName = school.name
        } else {
          context.warn(`Unknown school ${schoolRef}; teacher not linked`, context.rowNumber)
        }
      }

      const saved = await mergeAndSave(context, teachers, {
        entityType: 'teacher',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.teacher,
      })
      if (saved.outcome !== 'unchanged') {
        context.affect(cacheKeys.teacher(saved.entity.id))
      }
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
