import { drizzle } from "drizzle-orm/postgres-js";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import postgres from "postgres";

import * as schema from "./schema/index.js";

/**
 * Any drizzle Postgres database (or transaction) over this schema. The
 * gateway only depends on this, so it runs on postgres.js in production and
 * on PGlite in tests.
 */
export type Db = PgDatabase<PgQueryResultHKT, typeof schema>;

export type Schema = typeof schema;

export function createDatabase(opts: { url: string; poolSize: number }) {
  // A single Postgres.js client per process. Postgres.js manages pooling internally.
  const sql = postgres(opts.url, {
    max: opts.poolSize,
    connect_timeout: 5,
  });
  const db = drizzle(sql, { schema });
  return { sql, db };
}

export { schema };
