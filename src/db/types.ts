// src/db/types.ts
// Database adapter interface: async API over the SQLite driver

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Async database interface used by every store.
 * SQL strings use '?' placeholders.
 */
export interface DbAdapter {
  /** First matching row, or undefined */
  queryOne<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;

  /** INSERT, UPDATE or DELETE */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /** Raw SQL without parameters (DDL). Statements separated by semicolons. */
  exec(sql: string): Promise<void>;

  /**
   * Run `fn` between BEGIN and COMMIT; ROLLBACK on error.
   * The callback receives the same adapter.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
