/**
 * Create tables if they don't exist.
 * Run with: npm run db:init
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { pool } from "./index.ts";
import { errorMessage } from "../lib/errors.ts";

const schemaPath = fileURLToPath(new URL("./schema.sql", import.meta.url));

async function main(): Promise<void> {
  const ddl = readFileSync(schemaPath, "utf8");
  await pool.query(ddl);
  console.log("[DB] Schema is up to date");
}

try {
  await main();
} catch (err) {
  console.error(`[DB] Migration failed: ${errorMessage(err)}`);
  process.exitCode = 1;
} finally {
  await pool.end();
}
