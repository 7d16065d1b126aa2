/**
 * Canonical store interfaces
 * @module store/types
 */

import type {
  CareerType,
  CanonicalEvent,
  District,
  EventParticipation,
  EventStudent,
  EventTeacher,
  Organization,
  School,
  Skill,
  SourceSystem,
  Student,
  Teacher,
  TeacherProgress,
  TeacherProgressArchive,
  Tenant,
  User,
  Volunteer,
} from '../types/entities.js'
import type { ImportBatch } from '../import/types.js'
import type { ReviewItem } from '../queue/types.js'

/**
 * Every collection the store holds, and the row type stored in it
 */
export interface CollectionMap {
  volunteers: Volunteer
  teachers: Teacher
  students: Student
  events: CanonicalEvent
  organizations: Organization
  districts: District
  schools: School
  skills: Skill
  careerTypes: CareerType
  eventParticipations: EventParticipation
  eventTeachers: EventTeacher
  eventStudents: EventStudent
  teacherProgress: TeacherProgress
  teacherProgressArchives: TeacherProgressArchive
  importBatches: ImportBatch
  reviewItems: ReviewItem
  tenants: Tenant
  users: User
}

export type CollectionName = keyof CollectionMap

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'volunteers',
  'teachers',
  'students',
  'events',
  'organizations',
  'districts',
  'schools',
  'skills',
  'careerTypes',
  'eventParticipations',
  'eventTeachers',
  'eventStudents',
  'teacherProgress',
  'teacherProgressArchives',
  'importBatches',
  'reviewItems',
  'tenants',
  'users',
]

/**
 * Reference collections copied into a tenant store when it is provisioned
 */
export const REFERENCE_COLLECTIONS = [
  'districts',
  'schools',
  'skills',
  'careerTypes',
] as const satisfies readonly CollectionName[]

export type ReferenceCollection = (typeof REFERENCE_COLLECTIONS)[number]

/**
 * Shallow equality filter on top-level fields
 */
export type Filter<T> = { [K in keyof T]?: T[K] }

/**
 * Arbitrary predicate, for lookups a shallow filter cannot express
 */
export type Predicate<T> = (record: T) => boolean

export type Query<T> = Filter<T> | Predicate<T>

/**
 * Options for list queries
 */
export interface FindOptions {
  /** Maximum number of records to return */
  limit?: number
  /** Number of records to skip */
  offset?: number
}

/**
 * Typed access to one collection
 *
 * Records are returned as copies; mutating a returned record never changes
 * the store until it is written back with {@link Repository.update} or
 * {@link Repository.upsert}.
 */
export interface Repository<T extends { id: string }> {
  readonly collection: CollectionName

  findById(id: string): Promise<T | null>

  /**
   * Records matching the query, in insertion order
   */
  findMany(query?: Query<T>, options?: FindOptions): Promise<T[]>

  findOne(query: Query<T>): Promise<T | null>

  findByExternalId(source: SourceSystem, externalId: string): Promise<T | null>

  /**
   * Contact records whose `contact.emails` contain the normalized address.
   * Always empty for collections without contact data.
   */
  findByEmail(normalizedEmail: string): Promise<T[]>

  /**
   * @throws {DuplicateKeyError} when the id or a unique key is taken
   */
  insert(record: T): Promise<T>

  /**
   * @throws {NotFoundError} when no record has the id
   */
  update(id: string, patch: Partial<T>): Promise<T>

  /** Insert, or replace the record with the same id */
  upsert(record: T): Promise<T>

  /** @returns whether a record was removed */
  delete(id: string): Promise<boolean>

  count(query?: Query<T>): Promise<number>
}

export type StoreRepositories = {
  readonly [K in CollectionName]: Repository<CollectionMap[K]>
}

/**
 * The canonical data store: one repository per collection plus transactions
 */
export interface CanonicalStore extends StoreRepositories {
  /** Human-readable location (file path or `memory:<name>`) */
  readonly location: string

  repository<K extends CollectionName>(name: K): Repository<CollectionMap[K]>

  /**
   * Runs `fn` atomically. Writes made through `tx` are rolled back when `fn`
   * throws. Calling `tx.transaction` nests a savepoint. Top-level
   * transactions on one store run one at a time.
   */
  transaction<R>(fn: (tx: CanonicalStore) => Promise<R>): Promise<R>

  close(): Promise<void>
}

/**
 * Storage primitive a {@link DocumentStore} is built on. Implementations hold
 * JSON-compatible rows keyed by (collection, id).
 */
export interface DocumentBackend {
  readonly location: string
  get<K extends CollectionName>(collection: K, id: string): CollectionMap[K] | null
  list<K extends CollectionName>(collection: K): CollectionMap[K][]
  put<K extends CollectionName>(collection: K, record: CollectionMap[K]): void
  remove(collection: CollectionName, id: string): boolean
  /** depth 0 opens a transaction, deeper levels open savepoints */
  begin(depth: number): void
  commit(depth: number): void
  rollback(depth: number): void
  close(): void
}
