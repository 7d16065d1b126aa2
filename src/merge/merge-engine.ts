/**
 * Applies incoming rows to canonical entities under field ownership rules
 * @module merge/merge-engine
 */

import { isDeepStrictEqual } from 'node:util'
import { v4 as uuidv4 } from 'uuid'
import { FieldOwnershipRegistry, isEmptyValue } from '../ownership/field-ownership-registry.js'
import type { CanonicalEntity, ExternalIds } from '../types/entities.js'
import { getPath, leafPaths, setPath } from '../utils/paths.js'
import { ExternalIdConflictError } from './merge-error.js'
import type {
  ChangeSummary,
  FieldChange,
  MergeRequest,
  MergeResult,
  PreservedField,
} from './types.js'

export interface MergeEngineOptions {
  registry?: FieldOwnershipRegistry
  /** Clock used for timestamps */
  now?: () => Date
  /** Id generator for new entities */
  generateId?: () => string
}

/**
 * Merges incoming source rows into canonical entities.
 *
 * New entities take every incoming field. Existing entities take a field only
 * when the registry says the source owns it (or may fill it while empty);
 * all other incoming values are reported as preserved. The engine is pure:
 * it returns the merged entity and leaves persistence to the caller.
 *
 * @example
 * ```typescript
 * const engine = new MergeEngine()
 * const { entity, outcome } = engine.merge({
 *   entityType: 'event',
 *   source: 'salesforce',
 *   existing: storedEvent,
 *   incoming: { title: 'Career Day', publicVisibility: false },
 *   externalId: 'a0B5f000001',
 *   create: (base) => newEvent(base),
 * })
 * ```
 */
export class MergeEngine {
  readonly registry: FieldOwnershipRegistry
  private readonly now: () => Date
  private readonly generateId: () => string

  constructor(options: MergeEngineOptions = {}) {
    this.registry = options.registry ?? FieldOwnershipRegistry.fromDefaultTable()
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? uuidv4
  }

  merge<T extends CanonicalEntity>(request: MergeRequest<T>): MergeResult<T> {
    return request.existing
      ? this.update(request, request.existing)
      : this.create(request)
  }

  /**
   * Flattens a result into the single per-row audit summary
   */
  summarize<T extends CanonicalEntity>(
    request: Pick<MergeRequest<T>, 'entityType'>,
    result: MergeResult<T>
  ): ChangeSummary {
    return {
      entityType: request.entityType,
      entityId: result.entity.id,
      outcome: result.outcome,
      changedFields: result.changes.map((change) => change.field),
      preservedFields: result.preserved.map((field) => field.field),
    }
  }

  private create<T extends CanonicalEntity>(request: MergeRequest<T>): MergeResult<T> {
    const timestamp = this.now().toISOString()
    const externalIds: ExternalIds = {}
    if (request.externalId) {
      externalIds[request.source] = request.externalId
    }

    const entity = request.create({
      id: this.generateId(),
      createdAt: timestamp,
      updatedAt: timestamp,
      externalIds,
    })

    const changes: FieldChange[] = []
    for (const [field, value] of leafPaths(request.incoming)) {
      changes.push({ field, from: getPath(entity, field), to: value, kind: 'create' })
      setPath(entity, field, structuredClone(value))
    }

    return { entity, outcome: 'created', changes, preserved: [] }
  }

  private update<T extends CanonicalEntity>(
    request: MergeRequest<T>,
    existing: T
  ): MergeResult<T> {
    const entity = structuredClone(existing)
    const changes: FieldChange[] = []
    const preserved: PreservedField[] = []

    if (request.externalId) {
      const linked = entity.externalIds[request.source]
      if (linked && linked !== request.externalId) {
        throw new ExternalIdConflictError(
          entity.id,
          request.source,
          linked,
          request.externalId
        )
      }
      if (!linked) {
        entity.externalIds[request.source] = request.externalId
        changes.push({
          field: `externalIds.${request.source}`,
          from: undefined,
          to: request.externalId,
          kind: 'link',
        })
      }
    }

    for (const [field, value] of leafPaths(request.incoming)) {
      const current = getPath(entity, field)
      if (isDeepStrictEqual(current, value)) continue

      const decision = this.registry.decide(
        request.entityType,
        field,
        request.source,
        existing
      )

      if (
        decision.action === 'overwrite' ||
        (decision.action === 'fill' && isEmptyValue(current))
      ) {
        setPath(entity, field, structuredClone(value))
        changes.push({ field, from: current, to: value, kind: decision.action })
      } else {
        preserved.push({ field, owner: decision.owner, current, incoming: value })
      }
    }

    if (changes.length === 0) {
      return { entity: existing, outcome: 'unchanged', changes, preserved }
    }

    entity.updatedAt = this.now().toISOString()
    return { entity, outcome: 'updated', changes, preserved }
  }
}
