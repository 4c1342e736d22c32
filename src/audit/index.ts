// src/audit/index.ts

export {
  AuditLogger,
  REDACTED,
  diffValues,
  redact,
  type AuditLoggerOptions,
  type AuditRecordOptions,
  type AuditStats,
  type AuditSubject,
  type ValueDiff,
} from "./auditLogger";
