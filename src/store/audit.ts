// src/store/audit.ts
// Audit trail rows. Written by AuditLogger, read by GET /audit.
//
// Tables: audit_logs

import { nanoid } from "nanoid";
import type { DbAdapter } from "../db/types";
import { createLogger } from "../observability";
import { readRecord, parseJson } from "./json";
import { isPlainObject } from "../snapshot";

const log = createLogger("store/audit");

export const AUDIT_EVENTS = [
  "evaluation_completed",
  "criteria_created",
  "criteria_updated",
  "criteria_activated",
  "criteria_deactivated",
  "criteria_deleted",
  "rule_created",
  "rule_updated",
  "rule_deleted",
  "version_created",
] as const;

export type AuditEvent = (typeof AUDIT_EVENTS)[number];

export function isAuditEvent(value: string): value is AuditEvent {
  return AUDIT_EVENTS.some((e) => e === value);
}

/* ---------- Types ---------- */

export interface AuditEntry {
  id: string;
  event: string;
  auditableType: string;
  auditableId: string;
  oldValues: Record<string, unknown> | null;
  newValues: Record<string, unknown> | null;
  context: Record<string, unknown>;
  createdAt: string; // ISO string
}

interface AuditRow {
  id: string;
  event: string;
  auditable_type: string;
  auditable_id: string;
  old_values_json: string | null;
  new_values_json: string | null;
  context_json: string;
  created_at: number;
}

export interface InsertAuditInput {
  event: AuditEvent;
  auditableType: string;
  auditableId: string;
  oldValues?: Record<string, unknown> | null;
  newValues?: Record<string, unknown> | null;
  context?: Record<string, unknown>;
  /** Epoch ms; defaults to now */
  createdAt?: number;
}

export interface AuditQuery {
  event?: string;
  auditableType?: string;
  auditableId?: string;
  limit?: number;
}

function readValues(json: string | null): Record<string, unknown> | null {
  const value = parseJson(json);
  return isPlainObject(value) ? value : null;
}

function rowToEntry(row: AuditRow): AuditEntry {
  return {
    id: row.id,
    event: row.event,
    auditableType: row.auditable_type,
    auditableId: row.auditable_id,
    oldValues: readValues(row.old_values_json),
    newValues: readValues(row.new_values_json),
    context: readRecord(row.context_json),
    createdAt: new Date(row.created_at).toISOString(),
  };
}

/* ---------- Store ---------- */

export function createAuditStore(db: DbAdapter) {
  async function insert(input: InsertAuditInput): Promise<AuditEntry> {
    const id = nanoid(12);
    const createdAt = input.createdAt ?? Date.now();

    try {
      await db.run(
        `
        INSERT INTO audit_logs (
          id, event, auditable_type, auditable_id,
          old_values_json, new_values_json, context_json, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
        [
          id,
          input.event,
          input.auditableType,
          input.auditableId,
          input.oldValues ? JSON.stringify(input.oldValues) : null,
          input.newValues ? JSON.stringify(input.newValues) : null,
          JSON.stringify(input.context ?? {}),
          createdAt,
        ]
      );
    } catch (err) {
      log.error({ err, event: input.event }, "Failed to write audit entry");
      throw err;
    }

    return {
      id,
      event: input.event,
      auditableType: input.auditableType,
      auditableId: input.auditableId,
      oldValues: input.oldValues ?? null,
      newValues: input.newValues ?? null,
      context: input.context ?? {},
      createdAt: new Date(createdAt).toISOString(),
    };
  }

  /** Newest first */
  async function query(opts: AuditQuery = {}): Promise<AuditEntry[]> {
    let sql = `SELECT * FROM audit_logs WHERE 1 = 1`;
    const params: unknown[] = [];

    if (opts.event) {
      sql += ` AND event = ?`;
      params.push(opts.event);
    }
    if (opts.auditableType) {
      sql += ` AND auditable_type = ?`;
      params.push(opts.auditableType);
    }
    if (opts.auditableId) {
      sql += ` AND auditable_id = ?`;
      params.push(opts.auditableId);
    }

    sql += ` ORDER BY created_at DESC, rowid DESC LIMIT ?`;
    params.push(opts.limit ?? 100);

    const rows = await db.queryAll<AuditRow>(sql, params);
    return rows.map(rowToEntry);
  }

  /** Delete entries older than the given number of days; returns the count removed */
  async function cleanup(olderThanDays: number, now: number = Date.now()): Promise<number> {
    const cutoff = now - olderThanDays * 24 * 60 * 60 * 1000;
    try {
      const result = await db.run(`DELETE FROM audit_logs WHERE created_at < ?`, [cutoff]);
      log.info({ removed: result.changes, olderThanDays }, "Audit cleanup");
      return result.changes;
    } catch (err) {
      log.error({ err }, "Failed to clean up audit entries");
      throw err;
    }
  }

  /** Entry counts per event since the given epoch ms */
  async function countByEvent(since: number): Promise<Record<string, number>> {
    const rows = await db.queryAll<{ event: string; count: number }>(
      `SELECT event, COUNT(*) AS count FROM audit_logs WHERE created_at >= ? GROUP BY event ORDER BY event ASC`,
      [since]
    );
    const counts: Record<string, number> = {};
    for (const row of rows) counts[row.event] = row.count;
    return counts;
  }

  return { insert, query, cleanup, countByEvent };
}

export type AuditStore = ReturnType<typeof createAuditStore>;
