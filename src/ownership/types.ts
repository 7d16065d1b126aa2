/**
 * Field ownership type definitions
 * @module ownership/types
 */

import type { SourceSystem } from '../types/entities.js'

/**
 * Entity types that have an ownership entry
 */
export type EntityType =
  | 'volunteer'
  | 'teacher'
  | 'student'
  | 'event'
  | 'organization'
  | 'district'
  | 'school'
  | 'skill'
  | 'careerType'
  | 'eventParticipation'
  | 'eventTeacher'
  | 'eventStudent'
  | 'teacherProgress'

export const ENTITY_TYPES: readonly EntityType[] = [
  'volunteer',
  'teacher',
  'student',
  'event',
  'organization',
  'district',
  'school',
  'skill',
  'careerType',
  'eventParticipation',
  'eventTeacher',
  'eventStudent',
  'teacherProgress',
]

/**
 * Owner that depends on another field of the stored record, e.g. event core
 * fields owned by the CRM for in-person events and by the virtual platform
 * for virtual ones.
 */
export interface ConditionalOwner {
  /** Dot path read from the stored record */
  byField: string
  /** Owner per stored value of `byField` */
  cases: Partial<Record<string, SourceSystem>>
  /** Owner when the value has no case */
  fallback: SourceSystem
}

export type OwnerSpec = SourceSystem | ConditionalOwner

export interface FieldRule {
  owner: OwnerSpec
  /**
   * Non-owning sources allowed to write the field while the stored value is
   * empty (null, undefined, empty string or empty array)
   */
  fillIfEmpty?: SourceSystem[]
  /** Free-form audit note */
  note?: string
}

export interface EntityOwnership {
  /** Owner of every field without its own rule */
  defaultOwner: SourceSystem
  /**
   * Rules keyed by dot path. A rule on `contact` covers `contact.firstName`
   * unless a more specific key exists.
   */
  fields: Record<string, FieldRule>
}

export type OwnershipTable = Record<EntityType, EntityOwnership>

/**
 * What the merge engine should do with one incoming field
 * - overwrite: the source owns the field
 * - fill: the source may write only if the stored value is empty
 * - preserve: leave the stored value alone
 */
export type OwnershipAction = 'overwrite' | 'fill' | 'preserve'

export interface OwnershipDecision {
  action: OwnershipAction
  /** Resolved owner for this record */
  owner: SourceSystem
  /** Rule key that decided, or `*` for the entity default */
  rule: string
}
