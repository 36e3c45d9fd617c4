import pg from "pg";
import type { Pool } from "pg";
import type { AppConfig } from "./config.js";

export function createPool(config: Pick<AppConfig, "databaseUrl" | "databasePoolMax">): Pool {
  return new pg.Pool({
    // пусто — pg возьмёт PGHOST/PGUSER/... из окружения
    connectionString: config.databaseUrl || undefined,
    max: config.databasePoolMax,
    idleTimeoutMillis: 30_000,
  });
}
