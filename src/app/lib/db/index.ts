import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import * as schema from '@/app/lib/db/schema';

export type Schema = typeof schema;

/**
 * Anything queries can run against: the root database handle or an open transaction.
 */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, Schema>;

/**
 * Creates a PostgreSQL pool and the Drizzle instance bound to it.
 */
export function createDatabase(connectionString: string) {
  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });
  return { db, pool };
}

export type Database = ReturnType<typeof createDatabase>['db'];
