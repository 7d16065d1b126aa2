/**
 * Manual review queue for rows the engine will not resolve on its own
 * @module queue/review-queue
 */

import { v4 as uuidv4 } from 'uuid'
import type { Repository } from '../store/types.js'
import { SOURCE_SYSTEMS } from '../types/entities.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import {
  InvalidStatusTransitionError,
  QueueItemNotFoundError,
  QueueValidationError,
} from './queue-error.js'
import type {
  AddReviewItemRequest,
  ListReviewOptions,
  ReviewItem,
  ReviewQueueStats,
  ReviewReason,
  ReviewStatus,
} from './types.js'

const REVIEW_REASONS: readonly ReviewReason[] = ['unmatched', 'ambiguous', 'roster-removal']

export interface ReviewQueueOptions {
  now?: () => Date
  generateId?: () => string
  logger?: Logger
}

/**
 * Validate a review item request before it is persisted
 */
function validateRequest(request: AddReviewItemRequest): void {
  if (!REVIEW_REASONS.includes(request.reason)) {
    throw new QueueValidationError('reason', `unknown reason '${request.reason}'`)
  }
  if (!request.entityType.trim()) {
    throw new QueueValidationError('entityType', 'must not be empty')
  }
  if (!SOURCE_SYSTEMS.includes(request.source)) {
    throw new QueueValidationError('source', `unknown source '${request.source}'`)
  }
  if (request.rowNumber !== undefined && request.rowNumber !== null && request.rowNumber < 1) {
    throw new QueueValidationError('rowNumber', 'must be 1 or greater', {
      rowNumber: request.rowNumber,
    })
  }
}

/**
 * ReviewQueue over the store's `reviewItems` collection.
 *
 * Items move `pending → resolved | dismissed` exactly once. Resolving only
 * records the administrator's decision; applying it to canonical data is
 * done by the admin actions in `queue/admin-actions`.
 */
export class ReviewQueue {
  private readonly now: () => Date
  private readonly generateId: () => string
  private readonly logger: Logger

  constructor(
    private readonly items: Repository<ReviewItem>,
    options: ReviewQueueOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
    this.generateId = options.generateId ?? uuidv4
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Add a new item to the review queue
   */
  async add(request: AddReviewItemRequest): Promise<ReviewItem> {
    validateRequest(request)

    const timestamp = this.now().toISOString()
    const item: ReviewItem = {
      id: this.generateId(),
      createdAt: timestamp,
      updatedAt: timestamp,
      status: 'pending',
      reason: request.reason,
      entityType: request.entityType,
      source: request.source,
      batchId: request.batchId ?? null,
      rowNumber: request.rowNumber ?? null,
      row: request.row,
      message: request.message,
      attemptedKeys: request.attemptedKeys ?? [],
      candidateIds: request.candidateIds ?? [],
      resolvedEntityId: null,
      decidedBy: null,
      decidedAt: null,
      notes: null,
    }

    const saved = await this.items.insert(item)
    this.logger.debug('Review item queued', {
      id: saved.id,
      reason: saved.reason,
      batchId: saved.batchId,
      rowNumber: saved.rowNumber,
    })
    return saved
  }

  /**
   * Get a single review item by ID
   */
  async get(id: string): Promise<ReviewItem | null> {
    return this.items.findById(id)
  }

  /**
   * List review items, oldest first
   */
  async list(options: ListReviewOptions = {}): Promise<ReviewItem[]> {
    const statuses =
      options.status === undefined
        ? null
        : Array.isArray(options.status)
          ? options.status
          : [options.status]

    const matches = await this.items.findMany(
      (item) =>
        (statuses === null || statuses.includes(item.status)) &&
        (options.reason === undefined || item.reason === options.reason) &&
        (options.batchId === undefined || item.batchId === options.batchId)
    )
    matches.sort((a, b) => a.createdAt.localeCompare(b.createdAt))

    const offset = options.offset ?? 0
    return options.limit === undefined
      ? matches.slice(offset)
      : matches.slice(offset, offset + options.limit)
  }

  /**
   * Record that an administrator linked the item to a canonical entity
   */
  async resolve(
    id: string,
    entityId: string,
    decidedBy: string,
    notes?: string
  ): Promise<ReviewItem> {
    if (!entityId.trim()) {
      throw new QueueValidationError('entityId', 'must not be empty')
    }
    return this.decide(id, 'resolved', decidedBy, { resolvedEntityId: entityId, notes })
  }

  /**
   * Close the item without linking it
   */
  async dismiss(id: string, decidedBy: string, notes?: string): Promise<ReviewItem> {
    return this.decide(id, 'dismissed', decidedBy, { notes })
  }

  /**
   * Get queue statistics
   */
  async stats(): Promise<ReviewQueueStats> {
    const all = await this.items.findMany()
    const stats: ReviewQueueStats = {
      total: all.length,
      byStatus: { pending: 0, resolved: 0, dismissed: 0 },
      byReason: { unmatched: 0, ambiguous: 0, 'roster-removal': 0 },
    }
    for (const item of all) {
      stats.byStatus[item.status]++
      stats.byReason[item.reason]++
    }
    return stats
  }

  private async decide(
    id: string,
    status: Exclude<ReviewStatus, 'pending'>,
    decidedBy: string,
    details: { resolvedEntityId?: string; notes?: string }
  ): Promise<ReviewItem> {
    const item = await this.items.findById(id)
    if (!item) {
      throw new QueueItemNotFoundError(id)
    }
    if (item.status !== 'pending') {
      throw new InvalidStatusTransitionError(item.status, status)
    }
    if (!decidedBy.trim()) {
      throw new QueueValidationError('decidedBy', 'must not be empty')
    }

    const timestamp = this.now().toISOString()
    const updated = await this.items.update(id, {
      status,
      resolvedEntityId: details.resolvedEntityId ?? null,
      decidedBy,
      decidedAt: timestamp,
      updatedAt: timestamp,
      notes: details.notes ?? null,
    })
    this.logger.info(`Review item ${status}`, { id, decidedBy })
    return updated
  }
}
