import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";

export interface PoolOptions {
  max?: number;
  idle_timeout?: number;
  connect_timeout?: number;
  max_lifetime?: number;
  prepare?: boolean;
}

export function createDb(databaseUrl: string, pool: PoolOptions = {}) {
  const sql = postgres(databaseUrl, pool);
  return drizzle(sql, { schema });
}

export type Database = ReturnType<typeof createDb>;
