import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { Pool } from "pg";

import { closeDatabasePool, getDatabasePool } from "@/database/connection";
import { logger } from "@/utils/logger";

type MigrationPool = Pick<Pool, "query" | "connect">;

const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

export async function listMigrationFiles(directory = MIGRATIONS_DIR): Promise<string[]> {
  const entries = await readdir(directory);
  return entries.filter((entry) => entry.endsWith(".sql")).sort();
}

async function appliedMigrations(pool: MigrationPool): Promise<Set<string>> {
  const exists = await pool.query<{ present: boolean }>(
    "SELECT to_regclass('public.schema_migrations') IS NOT NULL AS present",
  );

  if (!exists.rows[0]?.present) {
    return new Set();
  }

  const result = await pool.query<{ name: string }>("SELECT name FROM schema_migrations");
  return new Set(result.rows.map((row) => row.name));
}

/** Applies pending SQL files in name order, each inside its own transaction. */
export async function runMigrations(pool: MigrationPool, directory = MIGRATIONS_DIR): Promise<string[]> {
  const files = await listMigrationFiles(directory);
  const applied = await appliedMigrations(pool);
  const executed: string[] = [];

  for (const file of files) {
    if (applied.has(file)) {
      continue;
    }

    const sql = await readFile(path.join(directory, file), "utf8");
    const client = await pool.connect();

    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
      await client.query("COMMIT");
      logger.info("Migration applied", { file });
      executed.push(file);
    } catch (error) {
      await client.query("ROLLBACK");
      logger.error("Migration failed", { file, error });
      throw error;
    } finally {
      client.release();
    }
  }

  return executed;
}

async function main() {
  try {
    const executed = await runMigrations(getDatabasePool());
    logger.info("Migrations complete", { executed });
  } finally {
    await closeDatabasePool();
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    logger.error("Migration run aborted", { error });
    process.exit(1);
  });
}
