import { drizzle } from "drizzle-orm/postgres-js";
import type { PostgresJsQueryResultHKT } from "drizzle-orm/postgres-js";
import type { PgDatabase } from "drizzle-orm/pg-core";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_WORKER_POOL = { max: 10 };

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_WORKER_POOL.max,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

/** Either the client or an open transaction; repositories accept both. */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
