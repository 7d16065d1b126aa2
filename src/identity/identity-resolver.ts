/**
 * Resolves source rows to canonical entities
 * @module identity/identity-resolver
 */

import { tokenSortRatio, type SimilarityFunction } from '../core/comparators.js'
import { normalizeEmails } from '../core/normalizers/email.js'
import { nameMatchKey } from '../core/normalizers/name.js'
import type { Repository } from '../store/types.js'
import type { StoredRecord } from '../types/entities.js'
import { requireInRange } from '../utils/errors.js'
import { createSilentLogger, type Logger } from '../utils/logger.js'
import type { RowKeys, IdentityStrategy, MatchRule, Resolution } from './types.js'

export interface IdentityResolverOptions {
  /** Similarity used for fuzzy names (default: token-sort ratio) */
  similarity?: SimilarityFunction
  /** Minimum fuzzy similarity, 0-1 (default: 0.85) */
  fuzzyThreshold?: number
  logger?: Logger
}

function uniqueById<T extends { id: string }>(records: T[]): T[] {
  const seen = new Set<string>()
  return records.filter((record) => {
    if (seen.has(record.id)) return false
    seen.add(record.id)
    return true
  })
}

/**
 * Finds the canonical entity a source row refers to.
 *
 * Rules are tried in order and the first one that finds anything decides:
 * 1. external id already linked in the row's source system
 * 2. any normalized email
 * 3. exact composite natural key
 * 4. fuzzy name within the same scope (low confidence)
 *
 * More than one candidate at step 2 or 3, or a tie for the best fuzzy
 * score, is reported as ambiguous and never resolved to either candidate.
 *
 * @example
 * ```typescript
 * const resolver = new IdentityResolver()
 * const result = await resolver.resolve(store.teachers, {
 *   emails: ['Jane.Doe@school.org'],
 * })
 * if (result.status === 'matched') console.log(result.entity.id)
 * ```
 */
export class IdentityResolver {
  private readonly similarity: SimilarityFunction
  private readonly fuzzyThreshold: number
  private readonly logger: Logger

  constructor(options: IdentityResolverOptions = {}) {
    this.similarity = options.similarity ?? tokenSortRatio
    this.fuzzyThreshold = requireInRange(
      options.fuzzyThreshold ?? 0.85,
      0,
      1,
      'fuzzyThreshold'
    )
    this.logger = options.logger ?? createSilentLogger()
  }

  async resolve<T extends StoredRecord>(
    repository: Repository<T>,
    rowKeys: RowKeys,
    strategy: IdentityStrategy<T> = {}
  ): Promise<Resolution<T>> {
    const attemptedKeys: string[] = []

    if (rowKeys.externalId) {
      const { source, id } = rowKeys.externalId
      attemptedKeys.push(`external:${source}:${id}`)
      const linked = await repository.findByExternalId(source, id)
      if (linked) {
        return {
          status: 'matched',
          entity: linked,
          matchedBy: 'external-id',
          confidence: 'exact',
          attemptedKeys,
        }
      }
    }

    const emails = normalizeEmails(rowKeys.emails ?? [])
    if (emails.length > 0) {
      attemptedKeys.push(...emails.map((email) => `email:${email}`))
      const candidates = await this.findByEmails(repository, emails, strategy)
      const decided = this.decide(candidates, 'email', attemptedKeys)
      if (decided) return decided
    }

    const { compositeKeyOf } = strategy
    if (rowKeys.compositeKey && compositeKeyOf) {
      const key = rowKeys.compositeKey
      attemptedKeys.push(`composite:${key}`)
      const candidates = await repository.findMany(
        (record) => compositeKeyOf(record) === key
      )
      const decided = this.decide(candidates, 'composite-key', attemptedKeys)
      if (decided) return decided
    }

    const { nameOf } = strategy
    if (rowKeys.fuzzyName && nameOf) {
      attemptedKeys.push(`name:${nameMatchKey(rowKeys.fuzzyName.name)}`)
      const fuzzy = await this.fuzzyMatch(
        repository,
        rowKeys.fuzzyName,
        { nameOf, scopeOf: strategy.scopeOf },
        attemptedKeys
      )
      if (fuzzy) return fuzzy
    }

    return { status: 'no-match', attemptedKeys }
  }

  private async findByEmails<T extends StoredRecord>(
    repository: Repository<T>,
    emails: string[],
    strategy: IdentityStrategy<T>
  ): Promise<T[]> {
    const { emailsOf } = strategy
    if (emailsOf) {
      return repository.findMany((record) =>
        emailsOf(record).some((email) => emails.includes(email))
      )
    }
    const found: T[] = []
    for (const email of emails) {
      found.push(...(await repository.findByEmail(email)))
    }
    return uniqueById(found)
  }

  private decide<T extends StoredRecord>(
    candidates: T[],
    matchedBy: MatchRule,
    attemptedKeys: string[]
  ): Resolution<T> | null {
    if (candidates.length === 0) return null
    if (candidates.length > 1) {
      this.logger.warn(`Ambiguous ${matchedBy} match`, {
        candidateIds: candidates.map((candidate) => candidate.id),
        attemptedKeys,
      })
      return { status: 'ambiguous', candidates, matchedBy, attemptedKeys }
    }
    return {
      status: 'matched',
      entity: candidates[0],
      matchedBy,
      confidence: 'exact',
      attemptedKeys,
    }
  }

  private async fuzzyMatch<T extends StoredRecord>(
    repository: Repository<T>,
    target: { name: string; scope: string | null },
    { nameOf, scopeOf }: Pick<IdentityStrategy<T>, 'scopeOf'> & { nameOf: (record: T) => string },
    attemptedKeys: string[]
  ): Promise<Resolution<T> | null> {
    const scope = nameMatchKey(target.scope)
    const pool = await repository.findMany((record) =>
      scopeOf ? nameMatchKey(scopeOf(record)) === scope : true
    )

    let best: T[] = []
    let bestScore = 0
    for (const record of pool) {
      const score = this.similarity(target.name, nameOf(record))
      if (score < this.fuzzyThreshold) continue
      if (score > bestScore) {
        best = [record]
        bestScore = score
      } else if (score === bestScore) {
        best.push(record)
      }
    }

    if (best.length === 0) return null
    if (best.length > 1) {
      return { status: 'ambiguous', candidates: best, matchedBy: 'fuzzy-name', attemptedKeys }
    }
    return {
      status: 'matched',
      entity: best[0],
      matchedBy: 'fuzzy-name',
      confidence: 'low',
      score: bestScore,
      attemptedKeys,
    }
  }
}
