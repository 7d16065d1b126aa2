/**
 * Merge engine type definitions
 * @module merge/types
 */

import type { EntityType, OwnershipAction } from '../ownership/types.js'
import type {
  CanonicalEntity,
  EntityData,
  SourceSystem,
  StoredRecord,
} from '../types/entities.js'

/**
 * Partial of a record where nested objects are partial too. Arrays are
 * replaced whole, never merged element by element.
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K]
}

/**
 * Fields of an incoming row, in canonical shape
 */
export type IncomingFields<T extends StoredRecord> = DeepPartial<EntityData<T>>

/**
 * Request to merge one incoming row into a canonical entity
 */
export interface MergeRequest<T extends CanonicalEntity> {
  entityType: EntityType

  /** System the row comes from */
  source: SourceSystem

  /** Matched entity, or null to create one */
  existing: T | null

  /** Fields present on the row. Undefined values count as absent. */
  incoming: IncomingFields<T>

  /** The row's identifier in `source`, linked to the entity when set */
  externalId?: string

  /**
   * Builds a new entity with defaults for every required field. Incoming
   * fields are applied on top of it.
   */
  create: (base: CanonicalEntity) => T
}

/**
 * How a field came to be written
 * - create: populated on a new entity
 * - overwrite: the source owns the field
 * - fill: the source filled an empty field it does not own
 * - link: an external id was linked
 */
export type ChangeKind = 'create' | OwnershipAction | 'link'

export interface FieldChange {
  field: string
  from: unknown
  to: unknown
  kind: Exclude<ChangeKind, 'preserve'>
}

/**
 * Incoming value that was not written because another system owns the field
 */
export interface PreservedField {
  field: string
  owner: SourceSystem
  current: unknown
  incoming: unknown
}

export type MergeOutcome = 'created' | 'updated' | 'unchanged'

export interface MergeResult<T extends CanonicalEntity> {
  entity: T
  outcome: MergeOutcome
  changes: FieldChange[]
  preserved: PreservedField[]
}

/**
 * One-line audit summary of a merge, kept at batch level
 */
export interface ChangeSummary {
  entityType: EntityType
  entityId: string
  outcome: MergeOutcome
  changedFields: string[]
  preservedFields: string[]
}
