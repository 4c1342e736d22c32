// src/extraction/extractor.ts
// Turns a source object into an immutable Snapshot by running the stage list
// in order over a shared accumulator.
//
// Absent fields and relations never throw; a computed-field closure that
// throws surfaces as ExtractionError.

import { config } from "../config";
import { createLogger } from "../observability";
import { Snapshot, setField, type SnapshotObject } from "../snapshot";
import { DEFAULT_STAGES, readField } from "./stages";
import type {
  ExtractionContext,
  ExtractionStage,
  ExtractorOptions,
  ResolvedExtractorOptions,
} from "./types";

const log = createLogger("extraction/extractor");

export class Extractor<S extends object = Record<string, unknown>> {
  private readonly options: ExtractorOptions<S>;
  private readonly resolved: ResolvedExtractorOptions<S>;
  private readonly stages: readonly ExtractionStage[];

  constructor(options: ExtractorOptions<S> = {}, stages: readonly ExtractionStage[] = DEFAULT_STAGES) {
    this.options = options;
    this.stages = stages;
    this.resolved = {
      sensitiveFields: new Set(options.sensitiveFields ?? config.extraction.sensitiveFields),
      includeTimestamps: options.includeTimestamps ?? true,
      includeRelationships: options.includeRelationships ?? true,
      relations: { ...options.relations },
      detectRelations: options.detectRelations ?? true,
      fieldMappings: { ...options.fieldMappings },
      relationshipMappings: { ...options.relationshipMappings },
      precomputedFields: { ...options.precomputedFields },
      computedFields: { ...options.computedFields },
    };
  }

  /* ---------- Extraction ---------- */

  extract(source: S): Snapshot {
    const now = this.options.now?.() ?? new Date();
    const data = this.run(source, now);

    const keyField = this.options.keyField ?? "id";
    const key = readField(source, keyField);

    const snapshot = new Snapshot(data, {
      sourceType: this.options.sourceType ?? "object",
      sourceKey: typeof key === "string" || typeof key === "number" ? String(key) : null,
      capturedAt: now.toISOString(),
    });

    log.debug(
      { sourceType: snapshot.metadata().sourceType, fieldCount: snapshot.count() },
      "Snapshot extracted"
    );
    return snapshot;
  }

  /** Raw key-sorted data without the Snapshot wrapper */
  extractData(source: S): SnapshotObject {
    return this.run(source, this.options.now?.() ?? new Date());
  }

  /* ---------- Composition ---------- */

  /** New extractor with `stage` inserted after the named stage (or appended) */
  withStage(stage: ExtractionStage, position: { after?: string } = {}): Extractor<S> {
    const stages = [...this.stages];
    const index = position.after ? stages.findIndex((s) => s.name === position.after) : -1;
    if (position.after && index === -1) {
      throw new Error(`Unknown extraction stage: ${position.after}`);
    }
    stages.splice(index === -1 ? stages.length : index + 1, 0, stage);
    return new Extractor(this.options, stages);
  }

  /** New extractor with option overrides merged over the current ones */
  withOptions(overrides: ExtractorOptions<S>): Extractor<S> {
    return new Extractor({ ...this.options, ...overrides }, this.stages);
  }

  stageNames(): string[] {
    return this.stages.map((s) => s.name);
  }

  /* ---------- Internals ---------- */

  private run(source: S, now: Date): SnapshotObject {
    const ctx: ExtractionContext<S> = {
      source,
      data: {},
      relations: new Map(),
      options: this.resolved,
      now,
    };

    for (const stage of this.stages) {
      stage.run(ctx);
    }

    const sorted: SnapshotObject = {};
    for (const key of Object.keys(ctx.data).sort()) {
      setField(sorted, key, ctx.data[key]);
    }
    return sorted;
  }
}

/** One-off extraction with default stages */
export function extract<S extends object>(source: S, options: ExtractorOptions<S> = {}): Snapshot {
  return new Extractor<S>(options).extract(source);
}
