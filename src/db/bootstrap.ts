import { promises as fs } from "fs";
import type * as pg from "pg";
import { createMemoryPool, createPgPool } from "./connection.js";

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}

export interface DatabaseOptions {
  databaseUrl?: string;
  schemaPath: string;
  // Ignored for the in-memory database, which always starts empty.
  autoSchema: boolean;
}

/** Opens the configured Postgres, or pg-mem without a URL, and applies the schema when needed. */
export async function openDatabase(opts: DatabaseOptions): Promise<pg.Pool> {
  const url = opts.databaseUrl?.trim();
  const pool = url ? createPgPool(url) : createMemoryPool();
  if (!url || opts.autoSchema) {
    await applySqlFile(pool, opts.schemaPath);
  }
  return pool;
}
