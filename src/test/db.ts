import { PGlite } from '@electric-sql/pglite'
import { drizzle } from 'drizzle-orm/pglite'
import { getTableName, is, sql } from 'drizzle-orm'
import { PgTable } from 'drizzle-orm/pg-core'
import { generateDrizzleJson, generateMigration } from 'drizzle-kit/api'
import * as schema from '../db/schema'
import type { Executor } from '../db'

const TABLES = Object.values<unknown>(schema)
  .filter((value): value is PgTable => is(value, PgTable))
  .map(table => getTableName(table))

/**
 * In-process Postgres standing in for src/db in tests:
 *
 *   vi.mock('../../../db', async () => {
 *     const { createTestDb } = await import('../../../test/db')
 *     return createTestDb()
 *   })
 */
export async function createTestDb() {
  const client = new PGlite()

  // The same DDL drizzle-kit would generate for an empty database
  const statements = await generateMigration(generateDrizzleJson({}), generateDrizzleJson(schema))
  for (const statement of statements) await client.exec(statement)

  return { db: drizzle(client, { schema }), schema }
}

export async function resetTestDb(db: Executor): Promise<void> {
  await db.execute(sql.raw(`TRUNCATE ${TABLES.join(', ')} CASCADE`))
}
