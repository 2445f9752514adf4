import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export * from "./schema.js";

export interface DbOptions {
  /** Max pooled connections */
  max?: number;
}

export function createDb(databaseUrl: string, options: DbOptions = {}) {
  const sql = postgres(databaseUrl, {
    max: options.max ?? 10,
    idle_timeout: 30,           // Close idle connections after 30 seconds
    connect_timeout: 10,        // Connection timeout in seconds
    prepare: false,
  });
  return { db: drizzle(sql, { schema }), sql };
}

export type Database = ReturnType<typeof createDb>["db"];
