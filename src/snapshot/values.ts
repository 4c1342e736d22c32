// src/snapshot/values.ts
// Value model for snapshot data plus dot-path resolution.

export type SnapshotScalar = string | number | boolean | null;

export type SnapshotValue = SnapshotScalar | SnapshotValue[] | SnapshotObject;

export interface SnapshotObject {
  [key: string]: SnapshotValue;
}

/** Plain object (not an array, Date or null) */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Own enumerable data property; a "__proto__" key is stored like any other */
export function setField(target: SnapshotObject, key: string, value: SnapshotValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Resolve "a.b.0.c" against nested objects and arrays.
 * Returns undefined when any segment is missing.
 */
export function getValueAtPath(obj: SnapshotObject, path: string): SnapshotValue | undefined {
  const parts = path.split(".");
  let current: SnapshotValue | undefined = obj;

  for (const part of parts) {
    if (current === undefined || current === null) return undefined;

    if (Array.isArray(current)) {
      const idx = Number(part);
      if (!Number.isInteger(idx) || idx < 0 || idx >= current.length) {
        return undefined;
      }
      current = current[idx];
      continue;
    }

    if (typeof current === "object") {
      if (!hasOwn(current, part)) return undefined;
      current = current[part];
      continue;
    }

    return undefined;
  }

  return current;
}

/** Recursively freeze arrays and objects in place */
export function deepFreeze<T extends SnapshotValue>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Deep copy of snapshot-shaped data */
export function cloneValue(value: SnapshotValue): SnapshotValue {
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value !== null && typeof value === "object") {
    const out: SnapshotObject = {};
    for (const [k, v] of Object.entries(value)) setField(out, k, cloneValue(v));
    return out;
  }
  return value;
}

/** JSON with object keys sorted at every depth */
export function canonicalJson(value: SnapshotValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}
