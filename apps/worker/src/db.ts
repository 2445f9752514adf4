import { createDb } from "@invoice-dispatch/db";
import { config } from "./config.js";

/**
 * Database connection
 *
 * Only the orchestrator reads from PostgreSQL (one pending-work query per
 * run), so a small pool is enough.
 */
const { db, sql } = createDb(config.DATABASE_URL, { max: 5 });

export { db, sql };

export async function closeDb(): Promise<void> {
  await sql.end({ timeout: 5 });
}
