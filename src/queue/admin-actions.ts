/**
 * Explicit administrative actions that change identity links
 * @module queue/admin-actions
 */

import type { EntityChangeHook } from '../import/types.js'
import { cacheKeys } from '../importers/shared.js'
import type { CanonicalStore, CollectionName } from '../store/types.js'
import { NotFoundError } from '../store/store-error.js'
import type { ExternalIds, SourceSystem, TeacherProgress } from '../types/entities.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import { requireNonEmptyString } from '../utils/errors.js'
import { ReviewQueue } from './review-queue.js'

export interface AdminActionOptions {
  now?: () => Date
  logger?: Logger
  /** Called after the change commits, with the cache keys it affected */
  onChange?: EntityChangeHook
}

/** Cache key of an entity, for collections that feed derived status */
const ENTITY_KEYS: Partial<Record<CollectionName, (id: string) => string>> = {
  teachers: cacheKeys.teacher,
  volunteers: cacheKeys.volunteer,
  events: cacheKeys.event,
  teacherProgress: cacheKeys.teacherProgress,
}

export interface RelinkRequest<K extends CollectionName> {
  collection: K
  /** Entity that should carry the external id */
  entityId: string
  source: SourceSystem
  externalId: string
  /** Administrator performing the relink */
  actor: string
  /** Review item to resolve in the same transaction */
  reviewItemId?: string
}

export interface LinkTeacherProgressRequest {
  progressId: string
  teacherId: string
  actor: string
  reviewItemId?: string
}

export interface RelinkResult {
  /** Entity the id was taken from, if it was linked elsewhere */
  previousEntityId: string | null
}

/**
 * Moves an external id to another entity. This is the only path that
 * reassigns an external id once linked; imports never do.
 *
 * @throws {NotFoundError} when the target entity does not exist
 */
export async function relinkExternalId<K extends CollectionName>(
  store: CanonicalStore,
  request: RelinkRequest<K>,
  options: AdminActionOptions = {}
): Promise<RelinkResult> {
  requireNonEmptyString(request.externalId, 'externalId')
  requireNonEmptyString(request.actor, 'actor')
  const now = options.now ?? (() => new Date())
  const logger = options.logger ?? createSilentLogger()

  const result = await store.transaction(async (tx) => {
    const repository = tx.repository(request.collection)
    const timestamp = now().toISOString()

    const target = await repository.findById(request.entityId)
    if (!target) {
      throw new NotFoundError(request.collection, request.entityId)
    }

    const holder = await repository.findByExternalId(request.source, request.externalId)
    if (holder && holder.id !== target.id) {
      const remaining: ExternalIds = { ...holder.externalIds }
      delete remaining[request.source]
      await repository.upsert({ ...holder, externalIds: remaining, updatedAt: timestamp })
    }

    const linked: ExternalIds = { ...target.externalIds }
    linked[request.source] = request.externalId
    await repository.upsert({ ...target, externalIds: linked, updatedAt: timestamp })

    if (request.reviewItemId) {
      await new ReviewQueue(tx.reviewItems, { now }).resolve(
        request.reviewItemId,
        target.id,
        request.actor,
        `Relinked ${request.source} id ${request.externalId}`
      )
    }

    const previousEntityId = holder && holder.id !== target.id ? holder.id : null
    logger.info('External id relinked', {
      collection: request.collection,
      source: request.source,
      externalId: request.externalId,
      entityId: target.id,
      previousEntityId,
      actor: request.actor,
    })
    return { previousEntityId, entityId: target.id }
  })

  const entityKey = ENTITY_KEYS[request.collection]
  if (entityKey && options.onChange) {
    const ids = [result.entityId]
    if (result.previousEntityId) ids.push(result.previousEntityId)
    await options.onChange(store, ids.map(entityKey))
  }
  return { previousEntityId: result.previousEntityId }
}

/**
 * Links a roster row to a teacher chosen by an administrator. The link is
 * recorded as exact and survives later roster imports.
 */
export async function linkTeacherProgress(
  store: CanonicalStore,
  request: LinkTeacherProgressRequest,
  options: AdminActionOptions = {}
): Promise<TeacherProgress> {
  requireNonEmptyString(request.actor, 'actor')
  const now = options.now ?? (() => new Date())
  const logger = options.logger ?? createSilentLogger()

  const { progress, previousTeacherId } = await store.transaction(async (tx) => {
    const teacher = await tx.teachers.findById(request.teacherId)
    if (!teacher) {
      throw new NotFoundError('teachers', request.teacherId)
    }
    const current = await tx.teacherProgress.findById(request.progressId)
    if (!current) {
      throw new NotFoundError('teacherProgress', request.progressId)
    }
    const updated = await tx.teacherProgress.update(current.id, {
      teacherId: teacher.id,
      teacherMatchConfidence: 'exact',
      updatedAt: now().toISOString(),
    })
    if (request.reviewItemId) {
      await new ReviewQueue(tx.reviewItems, { now }).resolve(
        request.reviewItemId,
        teacher.id,
        request.actor
      )
    }
    return { progress: updated, previousTeacherId: current.teacherId }
  })

  logger.info('Roster entry linked', {
    progressId: progress.id,
    teacherId: progress.teacherId,
    previousTeacherId,
    actor: request.actor,
  })
  if (options.onChange) {
    const keys = [cacheKeys.teacherProgress(progress.id)]
    if (progress.teacherId) keys.push(cacheKeys.teacher(progress.teacherId))
    if (previousTeacherId && previousTeacherId !== progress.teacherId) {
      keys.push(cacheKeys.teacher(previousTeacherId))
    }
    await options.onChange(store, keys)
  }
  return progress
}
