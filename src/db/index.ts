import fs from "fs/promises";
import path from "path";
import { Pool } from "pg";

export function createPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

const SCHEMA_PATH = path.resolve(process.cwd(), "src", "db", "schema.sql");

/**
 * Apply src/db/schema.sql. Every statement is idempotent.
 */
export async function ensureSchema(pool: Pool, schemaPath = SCHEMA_PATH) {
  const sql = await fs.readFile(schemaPath, "utf8");
  await pool.query(sql);
}
