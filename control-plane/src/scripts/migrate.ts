import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Pool } from "pg";
import { config } from "../config.js";
import { createPool, withTransaction } from "../db.js";

const defaultMigrationsDir = fileURLToPath(new URL("../../migrations", import.meta.url));

async function appliedVersions(pool: Pool): Promise<Set<string>> {
  await pool.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );
  const result = await pool.query<{ version: string }>("SELECT version FROM schema_migrations");
  return new Set(result.rows.map((row) => row.version));
}

/** Applies every pending `.sql` file in name order, one transaction per file. */
async function migrate(pool: Pool, migrationsDir: string): Promise<string[]> {
  const files = (await fs.readdir(migrationsDir))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));
  const applied = await appliedVersions(pool);

  const pending = files.filter((file) => !applied.has(file));
  for (const file of pending) {
    const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (version) VALUES ($1)", [file]);
    });
    console.log(`applied migration ${file}`);
  }
  return pending;
}

async function main(): Promise<void> {
  const pool = createPool(config.databaseUrl);
  try {
    const applied = await migrate(pool, process.argv[2] ?? defaultMigrationsDir);
    if (applied.length === 0) {
      console.log("schema is up to date");
    }
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
