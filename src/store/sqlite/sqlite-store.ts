/**
 * SQLite store backend (drizzle-orm over better-sqlite3)
 * @module store/sqlite/sqlite-store
 */

import { readFileSync } from 'node:fs'
import Database from 'better-sqlite3'
import { and, eq, sql } from 'drizzle-orm'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { errorMessage } from '../../utils/errors.js'
import { createDocumentStore } from '../document-store.js'
import { ConnectionError, TransactionError } from '../store-error.js'
import type {
  CanonicalStore,
  CollectionMap,
  CollectionName,
  DocumentBackend,
} from '../types.js'
import { records } from './schema.js'

const SCHEMA_SQL_URL = new URL('./schema.sql', import.meta.url)

/**
 * Reads the DDL that every store (main and tenant) is created with
 */
export function loadSchemaSql(): string {
  return readFileSync(SCHEMA_SQL_URL, 'utf8')
}

function decode<K extends CollectionName>(data: string): CollectionMap[K] {
  return JSON.parse(data)
}

function openDatabase(filename: string): Database.Database {
  try {
    const sqlite = new Database(filename)
    sqlite.pragma('journal_mode = WAL')
    sqlite.exec(loadSchemaSql())
    return sqlite
  } catch (error) {
    throw new ConnectionError(`Failed to open SQLite store: ${errorMessage(error)}`, {
      location: filename,
    })
  }
}

export class SqliteBackend implements DocumentBackend {
  readonly location: string
  private readonly sqlite: Database.Database
  private readonly db: BetterSQLite3Database

  /**
   * Opens (creating if needed) the database file and applies the schema.
   *
   * @param filename - File path, or `:memory:`
   */
  constructor(filename: string) {
    this.location = filename
    this.sqlite = openDatabase(filename)
    this.db = drizzle(this.sqlite)
  }

  get<K extends CollectionName>(collection: K, id: string): CollectionMap[K] | null {
    const row = this.db
      .select({ data: records.data })
      .from(records)
      .where(and(eq(records.collection, collection), eq(records.id, id)))
      .get()
    return row ? decode<K>(row.data) : null
  }

  list<K extends CollectionName>(collection: K): CollectionMap[K][] {
    return this.db
      .select({ data: records.data })
      .from(records)
      .where(eq(records.collection, collection))
      .orderBy(sql`rowid`)
      .all()
      .map((row) => decode<K>(row.data))
  }

  put<K extends CollectionName>(collection: K, record: CollectionMap[K]): void {
    const data = JSON.stringify(record)
    this.db
      .insert(records)
      .values({ collection, id: record.id, data, updatedAt: record.updatedAt })
      .onConflictDoUpdate({
        target: [records.collection, records.id],
        set: { data, updatedAt: record.updatedAt },
      })
      .run()
  }

  remove(collection: CollectionName, id: string): boolean {
    const result = this.db
      .delete(records)
      .where(and(eq(records.collection, collection), eq(records.id, id)))
      .run()
    return result.changes > 0
  }

  begin(depth: number): void {
    this.execTransactional(depth === 0 ? 'BEGIN' : `SAVEPOINT sp_${depth}`, depth)
  }

  commit(depth: number): void {
    this.execTransactional(depth === 0 ? 'COMMIT' : `RELEASE sp_${depth}`, depth)
  }

  rollback(depth: number): void {
    this.execTransactional(
      depth === 0 ? 'ROLLBACK' : `ROLLBACK TO sp_${depth}; RELEASE sp_${depth}`,
      depth
    )
  }

  close(): void {
    this.sqlite.close()
  }

  private execTransactional(statement: string, depth: number): void {
    try {
      this.sqlite.exec(statement)
    } catch (error) {
      throw new TransactionError(`'${statement}' failed: ${errorMessage(error)}`, {
        location: this.location,
        depth,
      })
    }
  }
}

/**
 * Opens a SQLite-backed canonical store
 *
 * @example
 * ```typescript
 * const store = openSqliteStore('./data/polaris.db')
 * const teachers = await store.teachers.count()
 * ```
 */
export function openSqliteStore(filename: string): CanonicalStore {
  return createDocumentStore(new SqliteBackend(filename))
}
