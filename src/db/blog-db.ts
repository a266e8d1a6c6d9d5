import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import debug from 'debug';
import * as blogSchema from './blog-schema';

const log = debug('blog:db');

/**
 * Any drizzle Postgres database carrying the blog schema. Production runs on
 * node-postgres, tests on PGlite.
 */
export type BlogDatabase = PgDatabase<PgQueryResultHKT, typeof blogSchema>;

export function createBlogPool(connectionString: string): Pool {
  // Hosted providers (Neon etc.) only accept TLS connections
  const requiresSsl = connectionString.includes('sslmode=require') || connectionString.includes('neon.tech');

  const pool = new Pool({
    connectionString,
    ssl: requiresSsl ? { rejectUnauthorized: false } : false,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    console.error('Unexpected error on idle blog database client', err);
  });

  pool.on('connect', () => {
    log('new client connected to the blog pool');
  });

  pool.on('remove', () => {
    log('client removed from the blog pool');
  });

  return pool;
}

export function createBlogDb(pool: Pool): BlogDatabase {
  return drizzle(pool, { schema: blogSchema });
}

export * from './blog-schema';
