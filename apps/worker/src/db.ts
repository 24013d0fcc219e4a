import { createDb, type Database } from "@missive/db";
import { config } from "@missive/config";
import { log } from "./logger.js";

/**
 * PostgreSQL through postgres-js. Dispatch writes one row per call and
 * webhooks one conditional update per event, so a modest pool suffices.
 */
export function connectDatabase(): Database {
  return createDb(config.DATABASE_URL, {
    max: config.NODE_ENV === "production" ? 20 : 10,
    idle_timeout: 30,           // Close idle connections after 30 seconds
    connect_timeout: 10,        // Seconds
    max_lifetime: 60 * 30,      // 30 minutes
    prepare: false,             // Works behind transaction-mode poolers
  });
}

export async function pingDatabase(db: Database): Promise<boolean> {
  try {
    await db.$client`select 1`;
    return true;
  } catch (error) {
    log.db.error({ error }, "database health check failed");
    return false;
  }
}

export async function closeDatabase(db: Database): Promise<void> {
  await db.$client.end({ timeout: 5 });
  log.db.info({}, "database connections closed");
}
