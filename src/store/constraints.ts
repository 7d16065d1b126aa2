/**
 * Unique keys enforced by every store implementation
 * @module store/constraints
 */

import { getPath } from '../utils/paths.js'
import type { CollectionName } from './types.js'

export interface UniqueKey {
  /** Reported in {@link DuplicateKeyError} */
  name: string
  fields: readonly string[]
}

/**
 * Natural keys per collection. External ids are unique per (collection,
 * source) for every collection and are not listed here.
 */
export const UNIQUE_KEYS: Partial<Record<CollectionName, readonly UniqueKey[]>> = {
  eventParticipations: [
    { name: 'eventId+volunteerId', fields: ['eventId', 'volunteerId'] },
  ],
  eventTeachers: [{ name: 'eventId+teacherId', fields: ['eventId', 'teacherId'] }],
  eventStudents: [{ name: 'eventId+studentId', fields: ['eventId', 'studentId'] }],
  teacherProgress: [
    {
      name: 'email+academicYear+districtName',
      fields: ['email', 'academicYear', 'districtName'],
    },
  ],
  tenants: [{ name: 'slug', fields: ['slug'] }],
  users: [{ name: 'username', fields: ['username'] }],
}

/**
 * Computes the key value for a record, or null when any part is missing
 */
export function uniqueKeyValue(record: object, key: UniqueKey): string | null {
  const parts: string[] = []
  for (const field of key.fields) {
    const value = getPath(record, field)
    if (value === null || value === undefined || value === '') {
      return null
    }
    parts.push(String(value))
  }
  return parts.join('|')
}
