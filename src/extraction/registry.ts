// src/extraction/registry.ts
// Lookup of mappings by source type, with a plain extractor as fallback.

import type { Snapshot } from "../snapshot";
import { Extractor } from "./extractor";
import type { FieldInfo } from "./mappings";
import type { ExtractorOptions } from "./types";

/** The slice of a mapping the registry relies on */
export interface SourceMapping {
  readonly name: string;
  readonly sourceType: string;
  extract(source: object): Snapshot;
  availableFields(): FieldInfo[];
}

export class MappingRegistry {
  private readonly mappings = new Map<string, SourceMapping>();
  private readonly fallback: ExtractorOptions<object>;

  constructor(fallback: ExtractorOptions<object> = {}) {
    this.fallback = fallback;
  }

  register(mapping: SourceMapping): this {
    this.mappings.set(mapping.sourceType, mapping);
    return this;
  }

  has(sourceType: string): boolean {
    return this.mappings.has(sourceType);
  }

  get(sourceType: string): SourceMapping | null {
    return this.mappings.get(sourceType) ?? null;
  }

  sourceTypes(): string[] {
    return [...this.mappings.keys()].sort();
  }

  /** Mapped extraction for known types; fallback options otherwise */
  extractFor(sourceType: string, source: object): Snapshot {
    const mapping = this.mappings.get(sourceType);
    if (mapping) return mapping.extract(source);
    return new Extractor<object>({ ...this.fallback, sourceType }).extract(source);
  }

  availableFields(sourceType: string): FieldInfo[] {
    return this.mappings.get(sourceType)?.availableFields() ?? [];
  }

  clear(): void {
    this.mappings.clear();
  }
}
