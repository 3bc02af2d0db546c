import { readFile } from "node:fs/promises";
import { Pool } from "pg";

export function createPool(connectionString: string) {
  return new Pool({ connectionString });
}

export async function migrate(pool: Pool) {
  const sql = await readFile(new URL("./schema.sql", import.meta.url), "utf8");
  await pool.query(sql);
}

/** Postgres unique_violation */
export function isUniqueViolation(err: unknown) {
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}
