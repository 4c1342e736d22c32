// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// Methods resolve immediately; better-sqlite3 itself is synchronous.

import Database from "better-sqlite3";
import { createLogger } from "../observability";
import type { DbAdapter, RunResult } from "./types";

const log = createLogger("db/sqlite");

export class SqliteAdapter implements DbAdapter {
  private _db: Database.Database;
  private depth = 0;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /** Underlying handle, for pragmas only */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const row = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() takes no async callbacks, so
    // BEGIN/COMMIT are issued by hand. Nested calls join the outer one.
    if (this.depth > 0) return fn(this);

    this._db.exec("BEGIN");
    this.depth++;
    try {
      const result = await fn(this);
      this._db.exec("COMMIT");
      return result;
    } catch (err) {
      try {
        this._db.exec("ROLLBACK");
      } catch (rollbackErr) {
        log.error({ err: rollbackErr }, "Rollback failed");
      }
      throw err;
    } finally {
      this.depth--;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
