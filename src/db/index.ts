import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { env } from "../config/env.ts";
import * as schema from "./schema/index.ts";

export type Database = NodePgDatabase<typeof schema>;

/** pg Pool; no connection is opened until the first query */
export const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
});

/** Drizzle ORM database instance */
export const db: Database = drizzle(pool, { schema });
