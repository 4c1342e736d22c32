// src/extraction/stages.ts
// Ordered extraction stages. Each stage adds to (or renames keys in) the
// accumulating map held by the context; none of them touch the source.

import { ExtractionError, errorMessage } from "../errors";
import { toNumber } from "../engine/operators";
import {
  toSnapshotValue,
  type SnapshotObject,
  type SnapshotValue,
} from "../snapshot";
import { hasOwn, setField } from "../snapshot/values";
import { daysAgo, diffInDays, diffInMonths, diffInYears, parseDate } from "./dates";
import type { ComputedField, ExtractionContext, ExtractionStage, RelationKind } from "./types";

/* ---------- Helpers ---------- */

const COMMON_DATE_FIELDS: ReadonlySet<string> = new Set([
  "created_at",
  "updated_at",
  "deleted_at",
  "published_at",
  "expires_at",
  "date",
  "timestamp",
]);

export function readField(source: object, key: string): unknown {
  return Reflect.get(source, key);
}

/** Objects that can be read as a related record (plain objects and class instances) */
function isRecord(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function detectRelationKind(value: unknown): RelationKind | null {
  if (isRecord(value)) return "one";
  if (Array.isArray(value) && value.some(isRecord)) return "many";
  return null;
}

export function isDateField(field: string): boolean {
  return COMMON_DATE_FIELDS.has(field) || field.endsWith("_at") || field.endsWith("_date");
}

/** Copy a record's own fields as snapshot values, minus sensitive ones */
function recordToSnapshot(record: object, sensitive: ReadonlySet<string>): SnapshotObject {
  const out: SnapshotObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (sensitive.has(key)) continue;
    const converted = toSnapshotValue(value);
    if (converted !== undefined) setField(out, key, converted);
  }
  return out;
}

function runClosure<S extends object>(
  field: string,
  fn: ComputedField<S>,
  ctx: ExtractionContext<S>
): SnapshotValue {
  let value: unknown;
  try {
    value = fn(ctx.source, ctx.data);
  } catch (err) {
    throw new ExtractionError(field, errorMessage(err), { cause: err });
  }
  return toSnapshotValue(value) ?? null;
}

/* ---------- 1. Base attributes ---------- */

export const baseAttributesStage: ExtractionStage = {
  name: "base_attributes",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    const { options } = ctx;

    if (options.includeRelationships) {
      for (const [name, kind] of Object.entries(options.relations)) {
        ctx.relations.set(name, { kind, value: readField(ctx.source, name) });
      }
    }

    for (const [key, value] of Object.entries(ctx.source)) {
      if (options.sensitiveFields.has(key)) continue;
      if (ctx.relations.has(key)) continue;

      if (options.includeRelationships && options.detectRelations) {
        const kind = detectRelationKind(value);
        if (kind) {
          ctx.relations.set(key, { kind, value });
          continue;
        }
      }

      const converted = toSnapshotValue(value);
      if (converted !== undefined) setField(ctx.data, key, converted);
    }
  },
};

/* ---------- 2. Computed fields ---------- */

export const computedFieldsStage: ExtractionStage = {
  name: "computed_fields",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    const { source, data, now } = ctx;

    if (ctx.options.includeTimestamps) {
      const created = parseDate(readField(source, "created_at"));
      if (created) {
        const days = diffInDays(created, now);
        data.created_days_ago = days;
        data.created_months_ago = diffInMonths(created, now);
        data.created_years_ago = diffInYears(created, now);
        data.account_age_days = days;
      }

      const updated = parseDate(readField(source, "updated_at"));
      if (updated) {
        const days = diffInDays(updated, now);
        data.updated_days_ago = days;
        data.last_activity_days = days;
      }
    }

    if (Reflect.has(source, "email_verified_at")) {
      const verifiedAt = parseDate(readField(source, "email_verified_at"));
      data.email_verified = verifiedAt !== null;
      if (verifiedAt) {
        data.email_verified_days_ago = diffInDays(verifiedAt, now);
      }
    }

    for (const [field, fn] of Object.entries(ctx.options.precomputedFields)) {
      data[field] = runClosure(field, fn, ctx);
    }
  },
};

/* ---------- 3. Relationships ---------- */

// Folded rather than spread: collections can outgrow the argument limit
const maxOf = (values: readonly number[]): number => values.reduce((a, b) => (b > a ? b : a), -Infinity);
const minOf = (values: readonly number[]): number => values.reduce((a, b) => (b < a ? b : a), Infinity);

function summarizeCollection(
  name: string,
  items: object[],
  now: Date
): SnapshotObject {
  const summary: SnapshotObject = {};
  const first = items[0];

  for (const [field, sample] of Object.entries(first)) {
    if (isDateField(field)) {
      const dates = items
        .map((item) => parseDate(readField(item, field)))
        .filter((d): d is Date => d !== null);
      if (dates.length === 0) continue;

      const times = dates.map((d) => d.getTime());
      const latest = new Date(maxOf(times));
      const earliest = new Date(minOf(times));
      summary[`${name}_${field}_latest`] = latest.toISOString();
      summary[`${name}_${field}_earliest`] = earliest.toISOString();
      summary[`${name}_${field}_latest_days_ago`] = daysAgo(latest, now);
      continue;
    }

    if (toNumber(sample) === null) continue;

    const values = items
      .map((item) => toNumber(readField(item, field)))
      .filter((n): n is number => n !== null);
    if (values.length === 0) continue;

    const sum = values.reduce((acc, n) => acc + n, 0);
    summary[`${name}_${field}_sum`] = sum;
    summary[`${name}_${field}_avg`] = sum / values.length;
    summary[`${name}_${field}_max`] = maxOf(values);
    summary[`${name}_${field}_min`] = minOf(values);
  }

  return summary;
}

export const relationshipsStage: ExtractionStage = {
  name: "relationships",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    const { data, options } = ctx;

    for (const [name, { kind, value }] of ctx.relations) {
      if (kind === "one") {
        if (isRecord(value)) {
          setField(data, name, recordToSnapshot(value, options.sensitiveFields));
          data[`${name}_exists`] = true;
        } else {
          setField(data, name, null);
          data[`${name}_exists`] = false;
        }
        continue;
      }

      const list = Array.isArray(value) ? value : [];
      const records = list.filter(isRecord);
      data[`${name}_count`] = list.length;
      data[`${name}_exists`] = list.length > 0;
      if (records.length > 0) {
        Object.assign(data, summarizeCollection(name, records, ctx.now));
      }
    }
  },
};

/* ---------- 4. Field-mapping rename ---------- */

export const fieldMappingStage: ExtractionStage = {
  name: "field_mappings",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    const { data } = ctx;
    for (const [original, renamed] of Object.entries(ctx.options.fieldMappings)) {
      if (original === renamed || !hasOwn(data, original)) continue;
      data[renamed] = data[original];
      delete data[original];
    }
  },
};

/* ---------- 5. Relationship-mapping flatten ---------- */

export const relationshipMappingStage: ExtractionStage = {
  name: "relationship_mappings",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    const { data } = ctx;
    for (const [relation, mapping] of Object.entries(ctx.options.relationshipMappings)) {
      const nested = data[relation];
      if (nested === null || typeof nested !== "object" || Array.isArray(nested)) continue;

      for (const [original, mapped] of Object.entries(mapping)) {
        const value = nested[original];
        if (hasOwn(nested, original) && value !== undefined && value !== null) {
          data[mapped] = value;
        }
      }
    }
  },
};

/* ---------- 6. Custom computed fields ---------- */

export const customComputedStage: ExtractionStage = {
  name: "custom_computed",
  run<S extends object>(ctx: ExtractionContext<S>): void {
    for (const [field, fn] of Object.entries(ctx.options.computedFields)) {
      ctx.data[field] = runClosure(field, fn, ctx);
    }
  },
};

export const DEFAULT_STAGES: readonly ExtractionStage[] = [
  baseAttributesStage,
  computedFieldsStage,
  relationshipsStage,
  fieldMappingStage,
  relationshipMappingStage,
  customComputedStage,
];
