/**
 * Run all SQL migrations idempotently via the pg library.
 * No psql dependency required. Safe to run on every deploy.
 *
 * Usage: npm run build && npm run ensure-schema
 */
import "dotenv/config";
import pg from "pg";
import { existsSync, readdirSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { logger } from "../src/logger.js";
import { toErrorString } from "../src/errors.js";

const here = dirname(fileURLToPath(import.meta.url));
// Compiled into dist/scripts/, or run from scripts/ directly.
const MIGRATIONS_DIR =
  [join(here, "..", "migrations"), join(here, "..", "..", "migrations")].find((d) => existsSync(d)) ??
  join(process.cwd(), "migrations");

export async function runMigrations(pool: pg.Pool, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
  for (const file of files) {
    await pool.query(readFileSync(join(dir, file), "utf-8"));
    logger.info("migration applied", { file });
  }
  return files;
}

async function main(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) throw new Error("DATABASE_URL not set");
  const pool = new pg.Pool({ connectionString: url, max: 1 });
  try {
    const files = await runMigrations(pool);
    logger.info("schema ready", { migrations: files.length });
  } finally {
    await pool.end();
  }
}

main().catch((e: unknown) => {
  logger.error("schema migration failed", { error: toErrorString(e) });
  process.exit(1);
});
