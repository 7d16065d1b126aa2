/**
 * Building blocks shared by the source importers
 * @module importers/shared
 */

import { normalizeEmail } from '../core/normalizers/email.js'
import { parseSourceDateTime } from '../core/normalizers/date.js'
import type { IdentityResolver } from '../identity/identity-resolver.js'
import type { RowKeys, IdentityStrategy } from '../identity/types.js'
import { AmbiguousMatchError, RowInvalidError } from '../import/import-error.js'
import type { SourceRowView } from '../import/columns.js'
import type { BatchContext, RowResultKind } from '../import/types.js'
import type { ChangeSummary, MergeOutcome, MergeRequest, MergeResult } from '../merge/types.js'
import type { Repository } from '../store/types.js'
import type {
  Address,
  AddressType,
  CanonicalEntity,
  CanonicalEvent,
  ContactCore,
  District,
  EventParticipation,
  EventStudent,
  EventTeacher,
  MatchConfidence,
  Organization,
  School,
  Student,
  Teacher,
  TeacherProgress,
  Volunteer,
} from '../types/entities.js'

// ==================== ENTITY DEFAULTS ====================

export function blankContact(): ContactCore {
  return { firstName: '', lastName: '', emails: [], phones: [], addresses: [] }
}

/**
 * Builders for new entities. Every required field gets a default that the
 * row's incoming fields then replace.
 */
export const newEntity = {
  volunteer: (base: CanonicalEntity): Volunteer => ({
    ...base,
    kind: 'volunteer',
    contact: blankContact(),
    organizationIds: [],
    skills: [],
    localStatus: 'unknown',
  }),
  teacher: (base: CanonicalEntity): Teacher => ({
    ...base,
    kind: 'teacher',
    contact: blankContact(),
    schoolId: null,
    active: true,
  }),
  student: (base: CanonicalEntity): Student => ({
    ...base,
    kind: 'student',
    contact: blankContact(),
    schoolId: null,
  }),
  event: (base: CanonicalEntity): CanonicalEvent => ({
    ...base,
    title: '',
    startDate: '',
    format: 'in_person',
    status: 'Draft',
    publicVisibility: false,
    districtIds: [],
    registeredCount: 0,
    attendedCount: 0,
  }),
  organization: (base: CanonicalEntity): Organization => ({ ...base, name: '' }),
  district: (base: CanonicalEntity): District => ({ ...base, name: '' }),
  school: (base: CanonicalEntity): School => ({ ...base, name: '', districtId: null }),
  eventParticipation: (base: CanonicalEntity): EventParticipation => ({
    ...base,
    eventId: '',
    volunteerId: '',
    participantType: 'Volunteer',
    status: 'SignedUp',
    deliveryHours: null,
    origin: 'polaris',
  }),
  eventTeacher: (base: CanonicalEntity): EventTeacher => ({
    ...base,
    eventId: '',
    teacherId: '',
    status: 'SignedUp',
    attendanceConfirmedAt: null,
    sessionStart: '',
    compositeKey: '',
  }),
  eventStudent: (base: CanonicalEntity): EventStudent => ({
    ...base,
    eventId: '',
    studentId: '',
    status: 'SignedUp',
    deliveryHours: null,
  }),
  teacherProgress: (base: CanonicalEntity): TeacherProgress => ({
    ...base,
    academicYear: '',
    districtName: '',
    email: '',
    name: '',
    building: '',
    targetSessions: 1,
    teacherId: null,
    teacherMatchConfidence: null,
    isActive: true,
    removedAt: null,
  }),
}

/**
 * Address from optional parts, or null when every part is blank. Blank
 * parts are left out so the value survives a JSON round trip unchanged.
 */
export function buildAddress(
  parts: Pick<Address, 'street' | 'city' | 'state' | 'zipCode'>,
  type: AddressType,
  primary: boolean
): Address | null {
  const address: Address = { type, primary }
  if (parts.street) address.street = parts.street
  if (parts.city) address.city = parts.city
  if (parts.state) address.state = parts.state
  if (parts.zipCode) address.zipCode = parts.zipCode
  return Object.keys(address).length > 2 ? address : null
}

// ==================== CELL PARSING ====================

/**
 * @throws {RowInvalidError} when the cell is blank or not a date
 */
export function requireDateTime(row: SourceRowView, key: string): string {
  const raw = row.require(key)
  const parsed = parseSourceDateTime(raw)
  if (!parsed) {
    throw new RowInvalidError(`Malformed date in '${key}': ${raw}`, key, raw)
  }
  return parsed.toISOString()
}

export function optionalDateTime(row: SourceRowView, key: string): string | undefined {
  return row.get(key) === undefined ? undefined : requireDateTime(row, key)
}

/**
 * Normalized email from a required cell
 *
 * @throws {RowInvalidError} when the cell is blank or not an address
 */
export function requireEmail(row: SourceRowView, key: string): string {
  const raw = row.require(key)
  const email = normalizeEmail(raw)
  if (!email) {
    throw new RowInvalidError(`Invalid email in '${key}': ${raw}`, key, raw)
  }
  return email
}

export function optionalEmail(row: SourceRowView, key: string): string | undefined {
  return row.get(key) === undefined ? undefined : requireEmail(row, key)
}

/**
 * Non-negative number from an optional cell
 */
export function optionalCount(row: SourceRowView, key: string): number | undefined {
  const value = row.getNumber(key)
  if (value !== undefined && value < 0) {
    throw new RowInvalidError(`'${key}' must not be negative: ${value}`, key, String(value))
  }
  return value
}

// ==================== RESOLUTION & MERGE ====================

export interface ResolvedEntity<T> {
  entity: T | null
  confidence: MatchConfidence | null
  attemptedKeys: string[]
}

/**
 * Resolves a row to at most one entity
 *
 * @throws {AmbiguousMatchError} when more than one entity matches
 */
export async function resolveUnique<T extends CanonicalEntity>(
  resolver: IdentityResolver,
  repository: Repository<T>,
  entityType: string,
  rowKeys: RowKeys,
  strategy: IdentityStrategy<T> = {}
): Promise<ResolvedEntity<T>> {
  const resolution = await resolver.resolve(repository, rowKeys, strategy)
  switch (resolution.status) {
    case 'matched':
      return {
        entity: resolution.entity,
        confidence: resolution.confidence,
        attemptedKeys: resolution.attemptedKeys,
      }
    case 'ambiguous':
      throw new AmbiguousMatchError(
        entityType,
        resolution.candidates.map((candidate) => candidate.id),
        resolution.attemptedKeys
      )
    case 'no-match':
      return { entity: null, confidence: null, attemptedKeys: resolution.attemptedKeys }
  }
}

export interface SavedMerge<T extends CanonicalEntity> extends MergeResult<T> {
  summary: ChangeSummary
}

/**
 * Merges a row into its entity and writes the result when anything changed
 */
export async function mergeAndSave<T extends CanonicalEntity>(
  context: BatchContext,
  repository: Repository<T>,
  request: MergeRequest<T>
): Promise<SavedMerge<T>> {
  const result = context.merge.merge(request)
  if (result.outcome === 'created') {
    await repository.insert(result.entity)
  } else if (result.outcome === 'updated') {
    await repository.upsert(result.entity)
  }
  return { ...result, summary: context.merge.summarize(request, result) }
}

/**
 * Row outcome from the row's primary merge and any secondary merges: created
 * when the primary entity is new, updated when anything else changed.
 */
export function rowKind(
  primary: MergeOutcome,
  secondary: readonly MergeOutcome[] = []
): RowResultKind {
  if (primary === 'created') return 'created'
  if (primary === 'updated' || secondary.some((outcome) => outcome !== 'unchanged')) {
    return 'updated'
  }
  return 'skipped'
}

/**
 * Cache keys for derived values that depend on an entity
 */
export const cacheKeys = {
  teacher: (id: string) => `teacher:${id}`,
  event: (id: string) => `event:${id}`,
  volunteer: (id: string) => `volunteer:${id}`,
  teacherProgress: (id: string) => `teacher-progress:${id}`,
}
