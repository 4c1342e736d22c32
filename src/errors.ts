// src/errors.ts
// Error taxonomy shared by the engine, extraction and service layers.
//
// ConfigurationError and ExtractionError are fatal to the operation that
// raised them. Per-rule failures never surface as errors; they are recorded
// on the rule trace instead.

/* ---------- Configuration ---------- */

export class ConfigurationError extends Error {
  /** Location of the offending definition, e.g. "rules[2].operator" */
  readonly path: string | null;

  constructor(message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(path ? `${message} (at ${path})` : message, options);
    this.name = "ConfigurationError";
    this.path = path;
  }
}

/* ---------- Extraction ---------- */

export class ExtractionError extends Error {
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to extract "${field}": ${message}`, options);
    this.name = "ExtractionError";
    this.field = field;
  }
}

export class SnapshotImmutableError extends Error {
  constructor(operation: "set" | "unset", key: string) {
    super(`Cannot ${operation} "${key}": snapshots are immutable`);
    this.name = "SnapshotImmutableError";
  }
}

/* ---------- Service ---------- */

export class CriteriaNotFoundError extends Error {
  readonly criteriaId: string;

  constructor(criteriaId: string) {
    super(`Criteria not found: ${criteriaId}`);
    this.name = "CriteriaNotFoundError";
    this.criteriaId = criteriaId;
  }
}

export interface InputViolation {
  path: string;
  message: string;
}

export class InputValidationError extends Error {
  readonly errors: InputViolation[];

  constructor(errors: InputViolation[]) {
    super(`Input validation failed: ${errors.map((e) => `${e.path}: ${e.message}`).join("; ")}`);
    this.name = "InputValidationError";
    this.errors = errors;
  }
}

export class WorkflowCallbackError extends Error {
  readonly callback: string;

  constructor(callback: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Workflow callback "${callback}" failed: ${reason}`, options);
    this.name = "WorkflowCallbackError";
    this.callback = callback;
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
