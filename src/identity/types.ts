/**
 * Identity resolution type definitions
 * @module identity/types
 */

import type { MatchConfidence, SourceSystem, StoredRecord } from '../types/entities.js'

/**
 * How a stored record exposes its match keys. Only the rules a strategy
 * provides are tried.
 */
export interface IdentityStrategy<T extends StoredRecord> {
  /**
   * Normalized emails of a stored record. When omitted, `contact.emails` is
   * searched through the repository.
   */
  emailsOf?: (record: T) => readonly string[]
  /** Composite natural key of a stored record, or null if it has none */
  compositeKeyOf?: (record: T) => string | null
  /** Display name compared by fuzzy matching */
  nameOf?: (record: T) => string
  /** Scope fuzzy matching is limited to (school or building) */
  scopeOf?: (record: T) => string | null
}

/**
 * Keys taken from one source row
 */
export interface RowKeys {
  externalId?: { source: SourceSystem; id: string }
  /** Raw emails; normalized before lookup. Empty values are ignored. */
  emails?: readonly unknown[]
  compositeKey?: string | null
  /** Roster reconciliation only */
  fuzzyName?: { name: string; scope: string | null }
}

export type MatchRule = 'external-id' | 'email' | 'composite-key' | 'fuzzy-name'

export type Resolution<T> =
  | {
      status: 'matched'
      entity: T
      matchedBy: MatchRule
      /** `low` for fuzzy matches, which downstream code must not treat as certain */
      confidence: MatchConfidence
      /** Similarity for fuzzy matches */
      score?: number
      attemptedKeys: string[]
    }
  | {
      status: 'ambiguous'
      candidates: T[]
      matchedBy: MatchRule
      attemptedKeys: string[]
    }
  | {
      status: 'no-match'
      attemptedKeys: string[]
    }
