import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { pool } from './core/db';
import * as schema from '../shared/schema';

export type Database = NodePgDatabase<typeof schema>;

// Either the root database or an open transaction
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export const db: Database = drizzle(pool, { schema });
