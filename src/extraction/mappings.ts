// src/extraction/mappings.ts
// Reusable extraction profiles. A mapping bundles field renames, relation
// flattening and computed fields for one source type, and can pull another
// mapping's field table in under a prefix.

import type { FieldType } from "../engine/operators";
import type { Snapshot } from "../snapshot";
import { Extractor } from "./extractor";
import type { ComputedField, ExtractorOptions, RelationKind } from "./types";

/* ---------- Types ---------- */

export type FieldCategory = "attribute" | "relationship" | "computed";

export interface FieldInfo {
  field: string;
  original: string | null;
  type: FieldType;
  description: string;
  category: FieldCategory;
}

export interface IncludeMappingOptions {
  /** Defaults to the included mapping's prefix, then the relation name */
  prefix?: string;
  kind?: RelationKind;
}

/** What composition needs from an included mapping */
export interface IncludableMapping {
  readonly prefix: string | null;
  getFieldMappings(): Record<string, string>;
  fieldTypeOf(field: string): FieldType | undefined;
}

/* ---------- Base Mapping ---------- */

export abstract class BaseMapping<S extends object = Record<string, unknown>> implements IncludableMapping {
  abstract readonly name: string;
  abstract readonly sourceType: string;
  readonly description: string = "";
  /** Prefix applied when another mapping includes this one */
  readonly prefix: string | null = null;

  protected fieldMappings: Record<string, string> = {};
  protected relationshipMappings: Record<string, Record<string, string>> = {};
  protected computedFields: Record<string, ComputedField<S>> = {};
  protected relations: Record<string, RelationKind> = {};
  protected fieldTypes: Record<string, FieldType> = {};
  protected fieldDescriptions: Record<string, string> = {};

  getFieldMappings(): Record<string, string> {
    return { ...this.fieldMappings };
  }

  getRelationshipMappings(): Record<string, Record<string, string>> {
    const out: Record<string, Record<string, string>> = {};
    for (const [relation, table] of Object.entries(this.relationshipMappings)) {
      out[relation] = { ...table };
    }
    return out;
  }

  fieldTypeOf(field: string): FieldType | undefined {
    return this.fieldTypes[field];
  }

  getComputedFieldNames(): string[] {
    return Object.keys(this.computedFields);
  }

  /**
   * Reuse `mapping`'s field table for the nested `relation`: each of its
   * source fields is promoted to `${prefix}_${renamed}`.
   */
  protected includeMapping(
    relation: string,
    mapping: IncludableMapping,
    options: IncludeMappingOptions = {}
  ): void {
    const prefix = options.prefix ?? mapping.prefix ?? relation;
    const table: Record<string, string> = { ...this.relationshipMappings[relation] };

    for (const [original, renamed] of Object.entries(mapping.getFieldMappings())) {
      table[original] = `${prefix}_${renamed}`;
      const type = mapping.fieldTypeOf(renamed) ?? mapping.fieldTypeOf(original);
      if (type) this.fieldTypes[`${prefix}_${renamed}`] = type;
    }

    this.relationshipMappings[relation] = table;
    this.relations[relation] = options.kind ?? this.relations[relation] ?? "one";
  }

  /** Output fields this mapping guarantees, with descriptions for authoring UIs */
  availableFields(): FieldInfo[] {
    const fields: FieldInfo[] = [];

    for (const [original, mapped] of Object.entries(this.fieldMappings)) {
      fields.push(this.describe(mapped, original, "attribute"));
    }
    for (const table of Object.values(this.relationshipMappings)) {
      for (const [original, mapped] of Object.entries(table)) {
        fields.push(this.describe(mapped, original, "relationship"));
      }
    }
    for (const name of Object.keys(this.computedFields)) {
      fields.push(this.describe(name, null, "computed"));
    }

    return fields;
  }

  toExtractorOptions(): ExtractorOptions<S> {
    return {
      sourceType: this.sourceType,
      fieldMappings: this.getFieldMappings(),
      relationshipMappings: this.getRelationshipMappings(),
      computedFields: { ...this.computedFields },
      relations: { ...this.relations },
    };
  }

  createExtractor(overrides: ExtractorOptions<S> = {}): Extractor<S> {
    return new Extractor<S>({ ...this.toExtractorOptions(), ...overrides });
  }

  extract(source: S): Snapshot {
    return this.createExtractor().extract(source);
  }

  private describe(field: string, original: string | null, category: FieldCategory): FieldInfo {
    return {
      field,
      original,
      type: this.fieldTypes[field] ?? (original ? this.fieldTypes[original] : undefined) ?? "string",
      description: this.fieldDescriptions[field] ?? humanize(field),
      category,
    };
  }
}

function humanize(field: string): string {
  const words = field.replace(/[_.]+/g, " ").trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}
