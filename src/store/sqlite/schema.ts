import { primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * Document table holding every collection. Mirrors `schema.sql`, which is
 * what actually creates it.
 */
export const records = sqliteTable(
  'records',
  {
    collection: text('collection').notNull(),
    id: text('id').notNull(),
    data: text('data').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.collection, table.id] }),
  })
)
