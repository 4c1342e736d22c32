// src/db/schema.ts
// Base tables (idempotent). Applied once at startup and by store tests.

import type { DbAdapter } from "./types";

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

CREATE TABLE IF NOT EXISTS criteria(
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  slug TEXT NOT NULL UNIQUE,
  description TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  type TEXT,
  group_name TEXT,
  category TEXT,
  tags_json TEXT NOT NULL DEFAULT '[]',
  meta_json TEXT NOT NULL DEFAULT '{}',
  pass_threshold REAL,                 -- NULL: configured default
  scoring_method TEXT,                 -- NULL: configured default
  decision_thresholds_json TEXT NOT NULL DEFAULT '[]',
  group_combination_json TEXT,
  current_version INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_criteria_active ON criteria(is_active);

CREATE TABLE IF NOT EXISTS rule_groups(
  id TEXT PRIMARY KEY,
  criteria_id TEXT NOT NULL REFERENCES criteria(id) ON DELETE CASCADE,
  group_key TEXT NOT NULL,
  name TEXT NOT NULL,
  logic_type TEXT NOT NULL,            -- all | any | min | majority | boolean
  min_required INTEGER,
  boolean_expression TEXT,
  weight REAL NOT NULL DEFAULT 1,
  group_order INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  UNIQUE(criteria_id, group_key)
);

CREATE TABLE IF NOT EXISTS rules(
  id TEXT PRIMARY KEY,
  criteria_id TEXT NOT NULL REFERENCES criteria(id) ON DELETE CASCADE,
  group_id TEXT REFERENCES rule_groups(id) ON DELETE CASCADE,
  rule_key TEXT NOT NULL,
  field TEXT NOT NULL,
  operator TEXT NOT NULL,
  value_json TEXT NOT NULL DEFAULT 'null',
  weight REAL NOT NULL DEFAULT 1,
  rule_order INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  dependencies_json TEXT NOT NULL DEFAULT '[]',
  meta_json TEXT NOT NULL DEFAULT '{}',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  UNIQUE(criteria_id, rule_key)
);
CREATE INDEX IF NOT EXISTS idx_rules_criteria ON rules(criteria_id, rule_order);

CREATE TABLE IF NOT EXISTS criteria_versions(
  id TEXT PRIMARY KEY,
  criteria_id TEXT NOT NULL REFERENCES criteria(id) ON DELETE CASCADE,
  version INTEGER NOT NULL,
  description TEXT,
  definition_json TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  UNIQUE(criteria_id, version)
);

CREATE TABLE IF NOT EXISTS evaluations(
  id TEXT PRIMARY KEY,
  criteria_id TEXT NOT NULL REFERENCES criteria(id) ON DELETE CASCADE,
  criteria_version INTEGER,
  passed INTEGER NOT NULL,
  score REAL NOT NULL,
  decision TEXT NOT NULL,
  failed_rules_json TEXT NOT NULL DEFAULT '[]',
  rule_results_json TEXT NOT NULL DEFAULT '[]',
  context_json TEXT NOT NULL DEFAULT '{}',
  snapshot_hash TEXT NOT NULL,
  execution_time_ms REAL NOT NULL DEFAULT 0,
  evaluated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_evaluations_criteria ON evaluations(criteria_id, evaluated_at DESC);

CREATE TABLE IF NOT EXISTS audit_logs(
  id TEXT PRIMARY KEY,
  event TEXT NOT NULL,
  auditable_type TEXT NOT NULL,
  auditable_id TEXT NOT NULL,
  old_values_json TEXT,
  new_values_json TEXT,
  context_json TEXT NOT NULL DEFAULT '{}',
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_audit_subject ON audit_logs(auditable_type, auditable_id, created_at DESC);
CREATE INDEX IF NOT EXISTS idx_audit_event ON audit_logs(event, created_at DESC);
`;

export async function ensureSchema(db: DbAdapter): Promise<void> {
  await db.exec(SCHEMA_SQL);
}
