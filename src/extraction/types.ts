// src/extraction/types.ts
// Extraction pipeline: options, context and stage contract

import type { SnapshotObject } from "../snapshot";

/** Derived field computed from the source and everything extracted so far */
export type ComputedField<S extends object = Record<string, unknown>> = (
  source: S,
  data: Readonly<SnapshotObject>
) => unknown;

/** one: nested record; many: collection */
export type RelationKind = "one" | "many";

export interface ExtractorOptions<S extends object = Record<string, unknown>> {
  /** Stripped from the source and from every related record */
  sensitiveFields?: readonly string[];
  /** Built-in timestamp derivations (created_days_ago, ...) */
  includeTimestamps?: boolean;
  includeRelationships?: boolean;
  /**
   * Declared relations. A declared relation that is absent on the source
   * still yields its `_exists`/`_count` keys.
   */
  relations?: Record<string, RelationKind>;
  /** Treat undeclared object / array-of-object values as relations */
  detectRelations?: boolean;
  /** { original: renamed } */
  fieldMappings?: Record<string, string>;
  /** { relation: { original: renamed } } promoted to top level */
  relationshipMappings?: Record<string, Record<string, string>>;
  /** Closures run with the built-in computed fields, before relations */
  precomputedFields?: Record<string, ComputedField<S>>;
  /** Closures run last, after all mappings */
  computedFields?: Record<string, ComputedField<S>>;
  sourceType?: string;
  /** Source property identifying the record in snapshot metadata */
  keyField?: string;
  now?: () => Date;
}

export interface ResolvedExtractorOptions<S extends object> {
  sensitiveFields: ReadonlySet<string>;
  includeTimestamps: boolean;
  includeRelationships: boolean;
  relations: Record<string, RelationKind>;
  detectRelations: boolean;
  fieldMappings: Record<string, string>;
  relationshipMappings: Record<string, Record<string, string>>;
  precomputedFields: Record<string, ComputedField<S>>;
  computedFields: Record<string, ComputedField<S>>;
}

export interface ExtractionContext<S extends object> {
  readonly source: S;
  /** Accumulator; stages add and rename keys in place */
  data: SnapshotObject;
  /** Relations found on the source, keyed by name */
  relations: Map<string, { kind: RelationKind; value: unknown }>;
  readonly options: ResolvedExtractorOptions<S>;
  readonly now: Date;
}

/** A pipeline step; generic so one stage serves every source type */
export interface ExtractionStage {
  readonly name: string;
  run<S extends object>(ctx: ExtractionContext<S>): void;
}
