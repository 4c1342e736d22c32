// src/db/index.ts
// Database adapter factory: opens the SQLite file named by config and
// applies the schema.

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { config } from "../config";
import { createLogger } from "../observability";
import { ensureSchema } from "./schema";
import { SqliteAdapter } from "./sqlite";

export type { DbAdapter, RunResult } from "./types";
export { SqliteAdapter } from "./sqlite";
export { SCHEMA_SQL, ensureSchema } from "./schema";

const log = createLogger("db");

const IN_MEMORY = ":memory:";

/** Open a database file (or ":memory:") without touching the schema */
export function createAdapter(dbPath: string = config.database.path): SqliteAdapter {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const rawDb = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    rawDb.pragma("journal_mode = WAL");
  }
  return new SqliteAdapter(rawDb);
}

/** Open and migrate */
export async function openDatabase(dbPath: string = config.database.path): Promise<SqliteAdapter> {
  const adapter = createAdapter(dbPath);
  await ensureSchema(adapter);
  log.info({ path: dbPath }, "Database ready");
  return adapter;
}
