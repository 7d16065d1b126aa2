/**
 * In-process store backend
 * @module store/memory-store
 */

import { TransactionError } from './store-error.js'
import { createDocumentStore } from './document-store.js'
import type {
  CanonicalStore,
  CollectionMap,
  CollectionName,
  DocumentBackend,
} from './types.js'

type CollectionData = { [K in CollectionName]: Map<string, CollectionMap[K]> }

function emptyData(): CollectionData {
  return {
    volunteers: new Map(),
    teachers: new Map(),
    students: new Map(),
    events: new Map(),
    organizations: new Map(),
    districts: new Map(),
    schools: new Map(),
    skills: new Map(),
    careerTypes: new Map(),
    eventParticipations: new Map(),
    eventTeachers: new Map(),
    eventStudents: new Map(),
    teacherProgress: new Map(),
    teacherProgressArchives: new Map(),
    importBatches: new Map(),
    reviewItems: new Map(),
    tenants: new Map(),
    users: new Map(),
  }
}

/**
 * Holds every collection in Maps. Reads and writes copy records, and
 * transactions roll back by restoring a snapshot taken at `begin`.
 */
export class MemoryBackend implements DocumentBackend {
  readonly location: string
  private data: CollectionData = emptyData()
  private readonly snapshots: CollectionData[] = []

  constructor(name = 'main') {
    this.location = `memory:${name}`
  }

  get<K extends CollectionName>(collection: K, id: string): CollectionMap[K] | null {
    const record = this.data[collection].get(id)
    return record ? structuredClone(record) : null
  }

  list<K extends CollectionName>(collection: K): CollectionMap[K][] {
    return Array.from(this.data[collection].values(), (record) =>
      structuredClone(record)
    )
  }

  put<K extends CollectionName>(collection: K, record: CollectionMap[K]): void {
    this.data[collection].set(record.id, structuredClone(record))
  }

  remove(collection: CollectionName, id: string): boolean {
    return this.data[collection].delete(id)
  }

  begin(depth: number): void {
    if (depth !== this.snapshots.length) {
      throw new TransactionError(
        `Cannot open transaction level ${depth} while ${this.snapshots.length} are open`,
        { location: this.location }
      )
    }
    this.snapshots.push(structuredClone(this.data))
  }

  commit(depth: number): void {
    this.expectTop(depth)
    this.snapshots.pop()
  }

  rollback(depth: number): void {
    this.expectTop(depth)
    const snapshot = this.snapshots.pop()
    if (snapshot) {
      this.data = snapshot
    }
  }

  close(): void {
    this.data = emptyData()
    this.snapshots.length = 0
  }

  private expectTop(depth: number): void {
    if (depth !== this.snapshots.length - 1) {
      throw new TransactionError(
        `Transaction level ${depth} is not the innermost open level`,
        { location: this.location, open: this.snapshots.length }
      )
    }
  }
}

/**
 * Creates an empty in-memory canonical store
 */
export function createMemoryStore(name = 'main'): CanonicalStore {
  return createDocumentStore(new MemoryBackend(name))
}
