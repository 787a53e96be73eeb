import pkg from "pg";
import type { Pool as PgPool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "@shared/schema";
import { loadConfig, requireSetting } from "./config";

const { Pool } = pkg;

export type Database = NodePgDatabase<typeof schema>;

let pool: PgPool | null = null;
let db: Database | null = null;

export function getPool(): PgPool {
  if (!pool) {
    const connectionString = requireSetting(loadConfig().databaseUrl, "DATABASE_URL");
    pool = new Pool({ connectionString, max: 5 });
  }
  return pool;
}

export function getDb(): Database {
  if (!db) {
    db = drizzle(getPool(), { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}
