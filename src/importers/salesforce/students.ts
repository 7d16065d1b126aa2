/**
 * Salesforce Contact (student record type) → Student import
 * @module importers/salesforce/students
 */

import type { ColumnSpec, ImportDefinition } from '../../import/types.js'
import type { IncomingFields } from '../../merge/types.js'
import type { Student } from '../../types/entities.js'
import { mergeAndSave, newEntity, optionalEmail, resolveUnique, rowKind } from '../shared.js'

const STUDENT_COLUMNS: readonly ColumnSpec[] = [
  { key: 'Id', aliases: [], required: true },
  { key: 'FirstName', aliases: [] },
  { key: 'LastName', aliases: [], required: true },
  { key: 'Email', aliases: [] },
  { key: 'School__c', aliases: [] },
  { key: 'Current_Grade__c', aliases: [] },
  { key: 'Class__c', aliases: [] },
]

/**
 * Students are matched by Salesforce id only; student emails are often
 * shared class accounts and are not used as an identity key.
 */
export function salesforceStudentImport(): ImportDefinition<Map<string, string>> {
  return {
    name: 'salesforce-students',
    entityType: 'student',
    source: 'salesforce',
    columns: STUDENT_COLUMNS,
    dedupe: { key: (row) => row.get('Id') ?? null, keep: 'keep-last' },

    async prepare(context) {
      const schools = new Map<string, string>()
      for (const school of await context.store.schools.findMany()) {
        const id = school.externalIds.salesforce
        if (id) schools.set(id, school.id)
      }
      return schools
    },

    async processRow(row, context) {
      const salesforceId = row.require('Id')
      const email = optionalEmail(row, 'Email')
      const students = context.store.students
      const { entity } = await resolveUnique(context.resolver, students, 'student', {
        externalId: { source: 'salesforce', id: salesforceId },
      })

      const incoming: IncomingFields<Student> = {
        contact: {
          firstName: row.get('FirstName') ?? '',
          lastName: row.require('LastName'),
          emails: email ? [email] : undefined,
        },
        gradeLevel: row.get('Current_Grade__c'),
        className: row.get('Class__c'),
      }
      const schoolRef = row.get('School__c')
      if (schoolRef) {
        const schoolId = context.prepared.get(schoolRef)
        if (schoolId) {
          incoming.schoolId = schoolId
        } else {
          context.warn(`Unknown school ${schoolRef}; student not linked`, context.rowNumber)
        }
      }

      const saved = await mergeAndSave(context, students, {
        entityType: 'student',
        source: 'salesforce',
        existing: entity,
        incoming,
        externalId: salesforceId,
        create: newEntity.student,
      })
      return { kind: rowKind(saved.outcome), changes: [saved.summary] }
    },
  }
}
