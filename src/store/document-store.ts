/**
 * Builds a {@link CanonicalStore} on top of a {@link DocumentBackend}
 * @module store/document-store
 */

import { DocumentRepository } from './document-repository.js'
import { TransactionError } from './store-error.js'
import type {
  CanonicalStore,
  CollectionName,
  DocumentBackend,
  StoreRepositories,
} from './types.js'

function buildRepositories(backend: DocumentBackend): StoreRepositories {
  return {
    volunteers: new DocumentRepository('volunteers', backend),
    teachers: new DocumentRepository('teachers', backend),
    students: new DocumentRepository('students', backend),
    events: new DocumentRepository('events', backend),
    organizations: new DocumentRepository('organizations', backend),
    districts: new DocumentRepository('districts', backend),
    schools: new DocumentRepository('schools', backend),
    skills: new DocumentRepository('skills', backend),
    careerTypes: new DocumentRepository('careerTypes', backend),
    eventParticipations: new DocumentRepository('eventParticipations', backend),
    eventTeachers: new DocumentRepository('eventTeachers', backend),
    eventStudents: new DocumentRepository('eventStudents', backend),
    teacherProgress: new DocumentRepository('teacherProgress', backend),
    teacherProgressArchives: new DocumentRepository('teacherProgressArchives', backend),
    importBatches: new DocumentRepository('importBatches', backend),
    reviewItems: new DocumentRepository('reviewItems', backend),
    tenants: new DocumentRepository('tenants', backend),
    users: new DocumentRepository('users', backend),
  }
}

/**
 * Creates a canonical store over the given backend.
 *
 * Top-level transactions are queued and run one at a time. Writes made
 * outside a transaction while another one is open are not isolated from its
 * rollback, so callers that need atomicity should always go through
 * `transaction`.
 *
 * @example
 * ```typescript
 * const store = createDocumentStore(new MemoryBackend('main'))
 * await store.transaction(async (tx) => {
 *   await tx.teachers.insert(teacher)
 * })
 * ```
 */
export function createDocumentStore(backend: DocumentBackend): CanonicalStore {
  const repositories = buildRepositories(backend)
  let queue: Promise<unknown> = Promise.resolve()
  let closed = false

  async function runScoped<R>(
    fn: (tx: CanonicalStore) => Promise<R>,
    depth: number
  ): Promise<R> {
    if (closed) {
      throw new TransactionError(`Store ${backend.location} is closed`)
    }
    backend.begin(depth)
    let result: R
    try {
      result = await fn(scope(depth))
    } catch (error) {
      backend.rollback(depth)
      throw error
    }
    backend.commit(depth)
    return result
  }

  function scope(depth: number): CanonicalStore {
    return {
      ...repositories,
      location: backend.location,
      repository<K extends CollectionName>(name: K): StoreRepositories[K] {
        return repositories[name]
      },
      transaction<R>(fn: (tx: CanonicalStore) => Promise<R>): Promise<R> {
        return runScoped(fn, depth + 1)
      },
      async close(): Promise<void> {
        throw new TransactionError('Cannot close a store from inside a transaction', {
          location: backend.location,
        })
      },
    }
  }

  return {
    ...repositories,
    location: backend.location,
    repository<K extends CollectionName>(name: K): StoreRepositories[K] {
      return repositories[name]
    },
    transaction<R>(fn: (tx: CanonicalStore) => Promise<R>): Promise<R> {
      const run = () => runScoped(fn, 0)
      const result = queue.then(run, run)
      queue = result.then(
        () => undefined,
        () => undefined
      )
      return result
    },
    async close(): Promise<void> {
      if (closed) return
      await queue
      closed = true
      backend.close()
    },
  }
}
