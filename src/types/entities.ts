/**
 * Canonical entity shapes held by the store
 * @module types/entities
 */

/**
 * External systems that feed the canonical store. `polaris` is the store
 * itself (staff edits made inside the application).
 */
export type SourceSystem =
  | 'salesforce'
  | 'voluntech'
  | 'pathful'
  | 'roster'
  | 'polaris'

export const SOURCE_SYSTEMS: readonly SourceSystem[] = [
  'salesforce',
  'voluntech',
  'pathful',
  'roster',
  'polaris',
]

/**
 * At most one external identifier per source system
 */
export type ExternalIds = Partial<Record<SourceSystem, string>>

/**
 * Fields every stored row carries. Timestamps are ISO-8601 strings so rows
 * survive a JSON round trip unchanged.
 */
export interface StoredRecord {
  id: string
  createdAt: string
  updatedAt: string
  externalIds?: ExternalIds
}

/**
 * A canonical entity always has an external id map, even when empty.
 */
export interface CanonicalEntity extends StoredRecord {
  externalIds: ExternalIds
}

/**
 * The mutable, importable part of an entity
 */
export type EntityData<T extends StoredRecord> = Omit<
  T,
  'id' | 'createdAt' | 'updatedAt' | 'externalIds'
>

// ==================== CONTACTS ====================

export type AddressType = 'home' | 'work' | 'other'

export interface Address {
  street?: string
  city?: string
  state?: string
  zipCode?: string
  type: AddressType
  primary: boolean
}

/**
 * Shape shared by volunteers, teachers and students
 */
export interface ContactCore {
  firstName: string
  lastName: string
  middleName?: string
  /** Normalized (trimmed, lowercase) addresses, primary first */
  emails: string[]
  /** E.164 where the number could be parsed */
  phones: string[]
  addresses: Address[]
  gender?: string
  birthdate?: string
}

export type LocalStatus = 'local' | 'partial' | 'non_local' | 'unknown'

export interface Volunteer extends CanonicalEntity {
  kind: 'volunteer'
  contact: ContactCore
  title?: string
  organizationName?: string
  organizationIds: string[]
  skills: string[]
  localStatus: LocalStatus
  lastVolunteerDate?: string
}

export interface Teacher extends CanonicalEntity {
  kind: 'teacher'
  contact: ContactCore
  schoolId: string | null
  schoolName?: string
  active: boolean
}

export interface Student extends CanonicalEntity {
  kind: 'student'
  contact: ContactCore
  schoolId: string | null
  gradeLevel?: string
  className?: string
}

export type Contact = Volunteer | Teacher | Student

// ==================== EVENTS ====================

export type EventFormat = 'in_person' | 'virtual'

export type EventStatus =
  | 'Draft'
  | 'Requested'
  | 'Confirmed'
  | 'Published'
  | 'Completed'
  | 'Cancelled'
  | 'No Show'

export interface CanonicalEvent extends CanonicalEntity {
  title: string
  startDate: string
  endDate?: string
  durationMinutes?: number
  location?: string
  schoolName?: string
  format: EventFormat
  status: EventStatus
  /** Public-page toggle managed by the publishing system */
  publicVisibility: boolean
  /** District links managed by the publishing system */
  districtIds: string[]
  presenterVolunteerId?: string | null
  cancellationReason?: string | null
  careerCluster?: string
  volunteersNeeded?: number
  registeredCount: number
  attendedCount: number
}

export type ParticipationStatus = 'SignedUp' | 'Attended' | 'NoShow' | 'Canceled'

export type ParticipantType = 'Volunteer' | 'Presenter'

export interface EventParticipation extends CanonicalEntity {
  eventId: string
  volunteerId: string
  participantType: ParticipantType
  status: ParticipationStatus
  deliveryHours: number | null
  origin: SourceSystem
}

export interface EventTeacher extends CanonicalEntity {
  eventId: string
  teacherId: string
  status: ParticipationStatus
  /** Set only once attendance is confirmed by the virtual platform */
  attendanceConfirmedAt: string | null
  sessionStart: string
  /** `eventId|teacherEmail|sessionStart` for rows without a session id */
  compositeKey: string
}

export interface EventStudent extends CanonicalEntity {
  eventId: string
  studentId: string
  status: ParticipationStatus
  deliveryHours: number | null
}

// ==================== ORGANIZATIONS & REFERENCE DATA ====================

export interface Organization extends CanonicalEntity {
  name: string
  type?: string
  description?: string
  address?: Address
}

export interface District extends CanonicalEntity {
  name: string
  code?: string
}

export interface School extends CanonicalEntity {
  name: string
  districtId: string | null
  code?: string
  level?: string
}

export interface Skill extends CanonicalEntity {
  name: string
}

export interface CareerType extends CanonicalEntity {
  name: string
}

// ==================== TEACHER PROGRESS ====================

export type MatchConfidence = 'exact' | 'low'

export interface TeacherProgress extends CanonicalEntity {
  /** `YYYY-YYYY`, e.g. `2025-2026` */
  academicYear: string
  districtName: string
  email: string
  name: string
  building: string
  grade?: string
  targetSessions: number
  teacherId: string | null
  teacherMatchConfidence: MatchConfidence | null
  isActive: boolean
  removedAt: string | null
}

export type TeacherProgressStatus = 'Achieved' | 'In Progress' | 'Not Started'

export type SemesterName = 'Fall' | 'Spring'

export interface TeacherProgressArchive extends StoredRecord {
  teacherProgressId: string
  academicYear: string
  semester: SemesterName
  /** e.g. `Fall 2025` */
  semesterLabel: string
  status: TeacherProgressStatus
  completed: number
  planned: number
  target: number
  archivedAt: string
}

// ==================== TENANCY ====================

export interface TenantFeatures {
  events: boolean
  volunteers: boolean
  recruitment: boolean
  publishingVisibility: boolean
}

export interface Tenant extends StoredRecord {
  slug: string
  name: string
  /** Physical store location (file path, or a memory handle name) */
  storeLocation: string
  active: boolean
  features: TenantFeatures
  provisionedAt: string
  deactivatedAt: string | null
  /** Reference rows copied at provisioning, per collection */
  referenceCounts: Record<string, number>
}

export type UserRole = 'admin' | 'staff' | 'viewer'

export interface User extends StoredRecord {
  username: string
  email: string
  role: UserRole
  /** Null for users of the main store */
  tenantId: string | null
}
