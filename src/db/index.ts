import { Pool, neonConfig } from '@neondatabase/serverless';
import { drizzle, type NeonQueryResultHKT } from 'drizzle-orm/neon-serverless';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import ws from 'ws';
import * as schema from './schema';
import { config } from '../lib/config';

if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is missing in environment variables');
}

// Interactive transactions need the pooled WebSocket driver, not the HTTP one
neonConfig.webSocketConstructor = ws;

const pool = new Pool({ connectionString: config.databaseUrl });

export const db = drizzle(pool, { schema });

/** The database itself or an open transaction */
export type Executor = PgDatabase<NeonQueryResultHKT, typeof schema>;

// Re-export for convenience
export * as schema from './schema';
