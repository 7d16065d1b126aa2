/**
 * Shared builders for store, clock and source-row fixtures
 */

import { ImportBatchProcessor } from '../../src/import/batch-processor.js'
import { ImportRunLock } from '../../src/import/run-lock.js'
import type { BatchCompletionHook, SourceRow } from '../../src/import/types.js'
import { newEntity } from '../../src/importers/shared.js'
import type { CanonicalStore } from '../../src/store/types.js'
import type {
  CanonicalEvent,
  District,
  EventTeacher,
  ParticipationStatus,
  Teacher,
  TeacherProgress,
  Volunteer,
} from '../../src/types/entities.js'
import { createSilentLogger } from '../../src/utils/logger.js'

export const DISTRICT = 'Hickman Mills'
export const YEAR = '2025-2026'
export const BUILDING = 'Banneker Elementary'

export interface TestClock {
  now: () => Date
  set(iso: string): void
}

/**
 * Clock that only moves when told to
 */
export function testClock(iso: string): TestClock {
  let current = new Date(iso)
  return {
    now: () => new Date(current.getTime()),
    set: (next) => {
      current = new Date(next)
    },
  }
}

/**
 * Ids `prefix-1`, `prefix-2`, ...
 */
export function sequentialIds(prefix: string): () => string {
  let next = 0
  return () => `${prefix}-${++next}`
}

export function testProcessor(
  clock: TestClock,
  onComplete: BatchCompletionHook[] = []
): ImportBatchProcessor {
  return new ImportBatchProcessor({
    now: clock.now,
    lock: new ImportRunLock(),
    logger: createSilentLogger(),
    onComplete,
  })
}

const BASE_TIME = '2025-08-01T00:00:00.000Z'

function base(id: string) {
  return { id, createdAt: BASE_TIME, updatedAt: BASE_TIME, externalIds: {} }
}

export async function seedTeacher(
  store: CanonicalStore,
  id: string,
  fields: { firstName: string; lastName: string; emails: string[]; schoolName?: string }
): Promise<Teacher> {
  const teacher = newEntity.teacher(base(id))
  teacher.contact.firstName = fields.firstName
  teacher.contact.lastName = fields.lastName
  teacher.contact.emails = fields.emails
  teacher.schoolName = fields.schoolName
  return store.teachers.insert(teacher)
}

export async function seedVolunteer(
  store: CanonicalStore,
  id: string,
  fields: { firstName: string; lastName: string; emails: string[]; salesforceId?: string }
): Promise<Volunteer> {
  const volunteer = newEntity.volunteer(base(id))
  volunteer.contact.firstName = fields.firstName
  volunteer.contact.lastName = fields.lastName
  volunteer.contact.emails = fields.emails
  if (fields.salesforceId) volunteer.externalIds.salesforce = fields.salesforceId
  return store.volunteers.insert(volunteer)
}

export async function seedDistrict(
  store: CanonicalStore,
  id: string,
  name: string,
  salesforceId?: string
): Promise<District> {
  return store.districts.insert({
    ...base(id),
    externalIds: salesforceId ? { salesforce: salesforceId } : {},
    name,
  })
}

export async function seedEvent(
  store: CanonicalStore,
  id: string,
  fields: Partial<CanonicalEvent>
): Promise<CanonicalEvent> {
  return store.events.insert({ ...newEntity.event(base(id)), ...fields })
}

export async function seedProgress(
  store: CanonicalStore,
  id: string,
  fields: Partial<TeacherProgress>
): Promise<TeacherProgress> {
  return store.teacherProgress.insert({
    ...newEntity.teacherProgress(base(id)),
    academicYear: YEAR,
    districtName: DISTRICT,
    building: BUILDING,
    ...fields,
  })
}

export async function seedSession(
  store: CanonicalStore,
  id: string,
  fields: { eventId: string; teacherId: string; status: ParticipationStatus; start: string }
): Promise<EventTeacher> {
  return store.eventTeachers.insert({
    ...newEntity.eventTeacher(base(id)),
    eventId: fields.eventId,
    teacherId: fields.teacherId,
    status: fields.status,
    attendanceConfirmedAt: fields.status === 'Attended' ? fields.start : null,
    sessionStart: fields.start,
    compositeKey: `${fields.eventId}|${fields.teacherId}`,
  })
}

/**
 * Roster sheet row as exported from the district's Google Sheet
 */
export function rosterRow(
  name: string,
  email: string,
  extra: Partial<Record<'Building' | 'Grade' | 'Target Sessions', string>> = {}
): SourceRow {
  return { Building: BUILDING, Name: name, Email: email, ...extra }
}

export type PathfulHeader =
  | 'Session ID'
  | 'Event ID'
  | 'Teacher Email'
  | 'Teacher Name'
  | 'Session Start'
  | 'Status'
  | 'Title'
  | 'Duration'
  | 'Partner'
  | 'Presenter Email'

/**
 * Pathful export row; every column is given so that headers stay stable
 */
export function pathfulRow(fields: Partial<Record<PathfulHeader, string>>): SourceRow {
  return {
    'Session ID': '',
    'Event ID': '',
    'Teacher Email': '',
    'Teacher Name': '',
    'Session Start': '',
    Status: '',
    Title: '',
    Duration: '',
    ...fields,
  }
}

export const ROSTER_TEACHERS: ReadonlyArray<{ name: string; email: string }> = [
  { name: 'Ada Lovelace', email: 'ada.lovelace@hmschools.test' },
  { name: 'Grace Hopper', email: 'grace.hopper@hmschools.test' },
  { name: 'Katherine Johnson', email: 'katherine.johnson@hmschools.test' },
  { name: 'Alan Turing', email: 'alan.turing@hmschools.test' },
  { name: 'Mae Jemison', email: 'mae.jemison@hmschools.test' },
  { name: 'Carl Sagan', email: 'carl.sagan@hmschools.test' },
  { name: 'Rosalind Franklin', email: 'rosalind.franklin@hmschools.test' },
  { name: 'Edwin Hubble', email: 'edwin.hubble@hmschools.test' },
  { name: 'Marie Curie', email: 'marie.curie@hmschools.test' },
  { name: 'Nikola Tesla', email: 'nikola.tesla@hmschools.test' },
]
