/**
 * Review queue type definitions
 * @module queue/types
 */

import type { SourceSystem, StoredRecord } from '../types/entities.js'

/**
 * Review item status lifecycle
 * - pending: Awaiting staff attention
 * - resolved: Linked to a canonical entity by an administrator
 * - dismissed: Judged not worth linking (bad source data, test rows)
 */
export type ReviewStatus = 'pending' | 'resolved' | 'dismissed'

/**
 * Why a row ended up in the queue
 * - unmatched: No candidate and auto-create was not permitted
 * - ambiguous: More than one existing entity matched
 * - roster-removal: Teacher dropped from a roster under the flag-only policy
 */
export type ReviewReason = 'unmatched' | 'ambiguous' | 'roster-removal'

/**
 * A source row waiting for a manual decision
 */
export interface ReviewItem extends StoredRecord {
  status: ReviewStatus

  reason: ReviewReason

  /** Entity type the row was meant to resolve to (`teacher`, `event`, ...) */
  entityType: string

  source: SourceSystem

  /** Batch that produced the item, if any */
  batchId: string | null

  /** 1-based data row number within the batch */
  rowNumber: number | null

  /** Raw source row, as read */
  row: Record<string, string>

  message: string

  /** Keys the resolver tried (`email:a@b.org`, `external:pathful:123`) */
  attemptedKeys: string[]

  /** Entity ids that matched, for ambiguous items */
  candidateIds: string[]

  /** Entity chosen when resolved */
  resolvedEntityId: string | null

  decidedBy: string | null

  decidedAt: string | null

  notes: string | null
}

/**
 * Request to add a new item to the queue
 */
export interface AddReviewItemRequest {
  reason: ReviewReason
  entityType: string
  source: SourceSystem
  batchId?: string | null
  rowNumber?: number | null
  row: Record<string, string>
  message: string
  attemptedKeys?: string[]
  candidateIds?: string[]
}

/**
 * Options for listing review items
 */
export interface ListReviewOptions {
  /** Filter by status (single or multiple) */
  status?: ReviewStatus | ReviewStatus[]

  reason?: ReviewReason

  batchId?: string

  /** Maximum number of items to return */
  limit?: number

  /** Number of items to skip */
  offset?: number
}

/**
 * Queue statistics
 */
export interface ReviewQueueStats {
  total: number
  byStatus: Record<ReviewStatus, number>
  byReason: Record<ReviewReason, number>
}
