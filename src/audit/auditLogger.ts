// src/audit/auditLogger.ts
// Records audit events for criteria, rules, versions and evaluations.
//
// Callers pass explicit before/after values; only changed fields are kept.
// Context keys that look sensitive are redacted unless configured otherwise.

import { config, AUDIT_REDACTED_KEYS } from "../config";
import { createLogger } from "../observability";
import { isPlainObject } from "../snapshot";
import type { AuditEntry, AuditEvent, AuditQuery, AuditStore } from "../store/audit";

const log = createLogger("audit");

export const REDACTED = "[REDACTED]";

/* ---------- Types ---------- */

export interface AuditSubject {
  type: string;
  id: string;
}

export interface AuditRecordOptions {
  before?: Record<string, unknown> | null;
  after?: Record<string, unknown> | null;
  context?: Record<string, unknown>;
}

export interface AuditLoggerOptions {
  enabled?: boolean;
  /** Events to keep; empty keeps every event */
  events?: readonly string[];
  includeSensitiveData?: boolean;
  retentionDays?: number;
  clock?: () => number;
}

export interface AuditStats {
  totalEvents: number;
  eventBreakdown: Record<string, number>;
  periodDays: number;
  mostCommonEvent: string | null;
}

export interface ValueDiff {
  oldValues: Record<string, unknown> | null;
  newValues: Record<string, unknown> | null;
}

/* ---------- Helpers ---------- */

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Changed fields only when both sides are given; a side that is missing
 * (creation, deletion) is recorded as null and the other is kept whole.
 */
export function diffValues(
  before: Record<string, unknown> | null | undefined,
  after: Record<string, unknown> | null | undefined
): ValueDiff {
  if (!before || !after) {
    return { oldValues: before ?? null, newValues: after ?? null };
  }

  const oldValues: Record<string, unknown> = {};
  const newValues: Record<string, unknown> = {};
  const keys = new Set([...Object.keys(before), ...Object.keys(after)]);
  for (const key of keys) {
    if (!sameValue(before[key], after[key])) {
      oldValues[key] = before[key] ?? null;
      newValues[key] = after[key] ?? null;
    }
  }
  return { oldValues, newValues };
}

const REDACTED_KEYS = new Set<string>(AUDIT_REDACTED_KEYS);

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue);
  if (isPlainObject(value)) return redact(value);
  return value;
}

/** Copy with sensitive keys replaced, at any depth */
export function redact(context: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(value);
  }
  return out;
}

/* ---------- Logger ---------- */

export class AuditLogger {
  private readonly enabled: boolean;
  private readonly events: readonly string[];
  private readonly includeSensitiveData: boolean;
  private readonly retentionDays: number;
  private readonly clock: () => number;

  constructor(private readonly store: AuditStore, options: AuditLoggerOptions = {}) {
    this.enabled = options.enabled ?? config.audit.enabled;
    this.events = options.events ?? config.audit.events;
    this.includeSensitiveData = options.includeSensitiveData ?? config.audit.includeSensitiveData;
    this.retentionDays = options.retentionDays ?? config.audit.retentionDays;
    this.clock = options.clock ?? Date.now;
  }

  shouldLog(event: AuditEvent): boolean {
    if (!this.enabled) return false;
    return this.events.length === 0 || this.events.includes(event);
  }

  /**
   * Write one entry. Returns null when the event is filtered out, or when
   * an update changed nothing.
   */
  async record(event: AuditEvent, subject: AuditSubject, options: AuditRecordOptions = {}): Promise<AuditEntry | null> {
    if (!this.shouldLog(event)) return null;

    const { oldValues, newValues } = diffValues(options.before, options.after);
    if (options.before && options.after && oldValues && Object.keys(oldValues).length === 0) {
      log.debug({ event, subject }, "No changes to audit");
      return null;
    }

    const context = options.context ?? {};
    const entry = await this.store.insert({
      event,
      auditableType: subject.type,
      auditableId: subject.id,
      oldValues,
      newValues,
      context: this.includeSensitiveData ? context : redact(context),
      createdAt: this.clock(),
    });
    log.debug({ event, subject, auditId: entry.id }, "Audit entry written");
    return entry;
  }

  /** Entries for one subject, newest first */
  trail(subject: AuditSubject, limit = 50): Promise<AuditEntry[]> {
    return this.store.query({ auditableType: subject.type, auditableId: subject.id, limit });
  }

  query(query: AuditQuery): Promise<AuditEntry[]> {
    return this.store.query(query);
  }

  async stats(days = 30): Promise<AuditStats> {
    const since = this.clock() - days * 24 * 60 * 60 * 1000;
    const breakdown = await this.store.countByEvent(since);

    let total = 0;
    let mostCommon: string | null = null;
    for (const [event, count] of Object.entries(breakdown)) {
      total += count;
      if (mostCommon === null || count > breakdown[mostCommon]) mostCommon = event;
    }
    return { totalEvents: total, eventBreakdown: breakdown, periodDays: days, mostCommonEvent: mostCommon };
  }

  /** Remove entries past retention */
  cleanup(days = this.retentionDays): Promise<number> {
    return this.store.cleanup(days, this.clock());
  }
}
