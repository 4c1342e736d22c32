// src/snapshot/snapshot.ts
// Immutable, dot-addressable view of a data source at extraction time.
//
// Every transformation returns a new Snapshot; the instance and its data are
// frozen. `set` and `unset` exist only to fail loudly.

import { createHash } from "crypto";
import { SnapshotImmutableError } from "../errors";
import {
  canonicalJson,
  cloneValue,
  deepFreeze,
  getValueAtPath,
  hasOwn,
  isPlainObject,
  setField,
  type SnapshotObject,
  type SnapshotValue,
} from "./values";

/* ---------- Types ---------- */

export interface SnapshotMetadata {
  sourceType: string;
  sourceKey: string | null;
  capturedAt: string; // ISO string
  fieldCount: number;
}

export type SnapshotMetadataInput = Partial<Omit<SnapshotMetadata, "fieldCount">>;

export interface SnapshotJson {
  data: SnapshotObject;
  metadata: SnapshotMetadata;
}

/* ---------- Snapshot ---------- */

export class Snapshot {
  private readonly data: Readonly<SnapshotObject>;
  private readonly meta: Readonly<SnapshotMetadata>;

  constructor(data: SnapshotObject = {}, metadata: SnapshotMetadataInput = {}) {
    const copy: SnapshotObject = {};
    for (const [key, value] of Object.entries(data)) {
      setField(copy, key, cloneValue(value));
    }
    this.data = deepFreeze(copy);
    this.meta = Object.freeze({
      sourceType: metadata.sourceType ?? "array",
      sourceKey: metadata.sourceKey ?? null,
      capturedAt: metadata.capturedAt ?? new Date().toISOString(),
      fieldCount: Object.keys(copy).length,
    });
    Object.freeze(this);
  }

  static empty(): Snapshot {
    return new Snapshot({});
  }

  /** Wrap a plain object, or pass an existing snapshot through */
  static from(input: Snapshot | SnapshotObject, metadata?: SnapshotMetadataInput): Snapshot {
    return input instanceof Snapshot ? input : new Snapshot(input, metadata);
  }

  /* ---------- Access ---------- */

  /** Literal key first, then dot path */
  get(key: string, fallback: SnapshotValue = null): SnapshotValue {
    const value = this.lookup(key);
    return value === undefined ? fallback : value;
  }

  has(key: string): boolean {
    return this.lookup(key) !== undefined;
  }

  all(): Readonly<SnapshotObject> {
    return this.data;
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  count(): number {
    return this.meta.fieldCount;
  }

  isEmpty(): boolean {
    return this.meta.fieldCount === 0;
  }

  metadata(): Readonly<SnapshotMetadata> {
    return this.meta;
  }

  /* ---------- Derivation ---------- */

  only(keys: readonly string[]): Snapshot {
    const out: SnapshotObject = {};
    for (const key of keys) {
      const value = this.lookup(key);
      if (value !== undefined) setField(out, key, value);
    }
    return this.derive(out);
  }

  except(keys: readonly string[]): Snapshot {
    const excluded = new Set(keys);
    return this.filter((_, key) => !excluded.has(key));
  }

  filter(predicate: (value: SnapshotValue, key: string) => boolean): Snapshot {
    const out: SnapshotObject = {};
    for (const [key, value] of Object.entries(this.data)) {
      if (predicate(value, key)) setField(out, key, value);
    }
    return this.derive(out);
  }

  transform(fn: (value: SnapshotValue, key: string) => SnapshotValue): Snapshot {
    const out: SnapshotObject = {};
    for (const [key, value] of Object.entries(this.data)) {
      setField(out, key, fn(value, key));
    }
    return this.derive(out);
  }

  merge(data: Snapshot | SnapshotObject): Snapshot {
    const incoming = data instanceof Snapshot ? data.all() : data;
    return this.derive({ ...this.data, ...incoming });
  }

  whereKeyMatches(pattern: RegExp | string): Snapshot {
    const re = typeof pattern === "string" ? new RegExp(pattern) : pattern;
    return this.filter((_, key) => re.test(key));
  }

  numericFields(): Snapshot {
    return this.filter((value) => typeof value === "number");
  }

  stringFields(): Snapshot {
    return this.filter((value) => typeof value === "string");
  }

  booleanFields(): Snapshot {
    return this.filter((value) => typeof value === "boolean");
  }

  /* ---------- Immutability ---------- */

  set(key: string, _value: SnapshotValue): never {
    throw new SnapshotImmutableError("set", key);
  }

  unset(key: string): never {
    throw new SnapshotImmutableError("unset", key);
  }

  /* ---------- Serialization ---------- */

  /** sha256 over the canonical JSON of the data (metadata excluded) */
  hash(): string {
    return createHash("sha256").update(canonicalJson(this.data), "utf8").digest("hex");
  }

  toJSON(): SnapshotJson {
    return { data: { ...this.data }, metadata: { ...this.meta } };
  }

  static fromJSON(json: unknown): Snapshot {
    const data: unknown = isPlainObject(json) ? json.data : undefined;
    if (!isPlainObject(json) || !isPlainObject(data)) {
      throw new TypeError("Snapshot JSON must be an object with a `data` object");
    }
    const rawMeta: unknown = json.metadata;
    const meta: Record<string, unknown> = isPlainObject(rawMeta) ? rawMeta : {};
    return new Snapshot(toSnapshotObject(data), {
      sourceType: typeof meta.sourceType === "string" ? meta.sourceType : undefined,
      sourceKey: typeof meta.sourceKey === "string" ? meta.sourceKey : null,
      capturedAt: typeof meta.capturedAt === "string" ? meta.capturedAt : undefined,
    });
  }

  /* ---------- Internals ---------- */

  private lookup(key: string): SnapshotValue | undefined {
    if (hasOwn(this.data, key)) return this.data[key];
    if (!key.includes(".")) return undefined;
    return getValueAtPath(this.data, key);
  }

  private derive(data: SnapshotObject): Snapshot {
    return new Snapshot(data, {
      sourceType: this.meta.sourceType,
      sourceKey: this.meta.sourceKey,
      capturedAt: this.meta.capturedAt,
    });
  }
}

/* ---------- Conversion ---------- */

/**
 * Coerce arbitrary JSON-ish input (request bodies, stored rows) into
 * snapshot values. Dates become ISO strings; functions, symbols and
 * undefined are dropped; non-finite numbers become null.
 */
export function toSnapshotValue(value: unknown): SnapshotValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return Number(value);
    case "object": {
      if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
      }
      if (Array.isArray(value)) {
        const items: SnapshotValue[] = [];
        for (const item of value) {
          const converted = toSnapshotValue(item);
          items.push(converted === undefined ? null : converted);
        }
        return items;
      }
      if (isPlainObject(value)) return toSnapshotObject(value);
      return undefined;
    }
    default:
      return undefined;
  }
}

export function toSnapshotObject(input: Record<string, unknown>): SnapshotObject {
  const out: SnapshotObject = {};
  for (const [key, value] of Object.entries(input)) {
    const converted = toSnapshotValue(value);
    if (converted !== undefined) setField(out, key, converted);
  }
  return out;
}
