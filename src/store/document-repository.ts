/**
 * Repository implementation shared by every document backend
 * @module store/document-repository
 */

import { isDeepStrictEqual } from 'node:util'
import type { SourceSystem } from '../types/entities.js'
import { getPath } from '../utils/paths.js'
import { UNIQUE_KEYS, uniqueKeyValue } from './constraints.js'
import { DuplicateKeyError, NotFoundError } from './store-error.js'
import type {
  CollectionMap,
  CollectionName,
  DocumentBackend,
  FindOptions,
  Predicate,
  Query,
  Repository,
} from './types.js'

function isPredicate<T>(query: Query<T>): query is Predicate<T> {
  return typeof query === 'function'
}

/**
 * Tests a record against a shallow filter or predicate. Filter keys may be
 * dot paths (`contact.lastName`).
 */
export function matchesQuery<T extends object>(record: T, query?: Query<T>): boolean {
  if (query === undefined) return true
  if (isPredicate(query)) return query(record)

  for (const [key, expected] of Object.entries(query)) {
    if (expected === undefined) continue
    if (!isDeepStrictEqual(getPath(record, key), expected)) {
      return false
    }
  }
  return true
}

export class DocumentRepository<K extends CollectionName>
  implements Repository<CollectionMap[K]>
{
  constructor(
    readonly collection: K,
    private readonly backend: DocumentBackend
  ) {}

  async findById(id: string): Promise<CollectionMap[K] | null> {
    return this.backend.get(this.collection, id)
  }

  async findMany(
    query?: Query<CollectionMap[K]>,
    options: FindOptions = {}
  ): Promise<CollectionMap[K][]> {
    const matches = this.backend
      .list(this.collection)
      .filter((record) => matchesQuery(record, query))
    const offset = options.offset ?? 0
    return options.limit === undefined
      ? matches.slice(offset)
      : matches.slice(offset, offset + options.limit)
  }

  async findOne(query: Query<CollectionMap[K]>): Promise<CollectionMap[K] | null> {
    const [first] = await this.findMany(query, { limit: 1 })
    return first ?? null
  }

  async findByExternalId(
    source: SourceSystem,
    externalId: string
  ): Promise<CollectionMap[K] | null> {
    return this.findOne(
      (record) => getPath(record, `externalIds.${source}`) === externalId
    )
  }

  async findByEmail(normalizedEmail: string): Promise<CollectionMap[K][]> {
    return this.findMany((record) => {
      const emails = getPath(record, 'contact.emails')
      return Array.isArray(emails) && emails.includes(normalizedEmail)
    })
  }

  async insert(record: CollectionMap[K]): Promise<CollectionMap[K]> {
    if (this.backend.get(this.collection, record.id)) {
      throw new DuplicateKeyError(this.collection, 'id', record.id)
    }
    this.assertUnique(record)
    this.backend.put(this.collection, record)
    return structuredClone(record)
  }

  async update(
    id: string,
    patch: Partial<CollectionMap[K]>
  ): Promise<CollectionMap[K]> {
    const existing = this.backend.get(this.collection, id)
    if (!existing) {
      throw new NotFoundError(this.collection, id)
    }
    const updated = { ...existing, ...patch, id }
    this.assertUnique(updated)
    this.backend.put(this.collection, updated)
    return structuredClone(updated)
  }

  async upsert(record: CollectionMap[K]): Promise<CollectionMap[K]> {
    this.assertUnique(record)
    this.backend.put(this.collection, record)
    return structuredClone(record)
  }

  async delete(id: string): Promise<boolean> {
    return this.backend.remove(this.collection, id)
  }

  async count(query?: Query<CollectionMap[K]>): Promise<number> {
    return (await this.findMany(query)).length
  }

  /**
   * @throws {DuplicateKeyError} when another record holds one of the
   * record's external ids or natural keys
   */
  private assertUnique(record: CollectionMap[K]): void {
    const others = this.backend
      .list(this.collection)
      .filter((other) => other.id !== record.id)
    if (others.length === 0) return

    for (const [source, value] of Object.entries(record.externalIds ?? {})) {
      if (!value) continue
      const path = `externalIds.${source}`
      if (others.some((other) => getPath(other, path) === value)) {
        throw new DuplicateKeyError(this.collection, path, value)
      }
    }

    for (const key of UNIQUE_KEYS[this.collection] ?? []) {
      const value = uniqueKeyValue(record, key)
      if (value === null) continue
      if (others.some((other) => uniqueKeyValue(other, key) === value)) {
        throw new DuplicateKeyError(this.collection, key.name, value)
      }
    }
  }
}
