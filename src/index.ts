// src/index.ts
// Public API.

export * from "./engine";
export * from "./snapshot";
export * from "./extraction";
export * from "./criteria";
export * from "./workflow";
export * from "./errors";
export { EvaluationCache, type CacheStats, type EvaluationCacheOptions } from "./cache";
export {
  AuditLogger,
  REDACTED,
  diffValues,
  redact,
  type AuditLoggerOptions,
  type AuditRecordOptions,
  type AuditStats,
  type AuditSubject,
} from "./audit";
export { createAdapter, openDatabase, ensureSchema, SqliteAdapter, type DbAdapter } from "./db";
export {
  AUDIT_EVENTS,
  createStores,
  isAuditEvent,
  type AuditEntry,
  type AuditEvent,
  type Criteria,
  type EvaluationRecord,
  type EvaluationStats,
  type Stores,
  type StoredRule,
  type UpdateCriteriaInput,
  type UpdateRuleInput,
} from "./store";
export * from "./service";
export { buildServer, createContext, type AppContext, type ServerDeps } from "./server";
export { config, type AppConfig } from "./config";
