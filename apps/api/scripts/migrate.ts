import { loadConfig } from "../src/config";
import { createPool, migrate } from "../src/db/pg";

const config = loadConfig();
const pool = createPool(config.databaseUrl);

try {
  await migrate(pool);
  console.log("Schema applied.");
} catch (e) {
  console.error(e);
  process.exitCode = 1;
} finally {
  await pool.end();
}
