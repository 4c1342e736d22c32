// src/criteria/versions.ts
// Immutable criteria versions: numbering, rule diffs and evaluation against
// a stored definition.

import { evaluate, type CriteriaDefinition, type EvaluateOptions, type EvaluationResult, type RuleDefinition } from "../engine";
import type { Snapshot, SnapshotObject } from "../snapshot";

export interface CriteriaVersion {
  id: string;
  criteriaId: string;
  version: number;
  description: string | null;
  /** Definition as it stood when the version was cut */
  definition: CriteriaDefinition;
  createdAt: string;
}

/* ---------- Numbering ---------- */

export function nextVersionNumber(existing: readonly number[]): number {
  return existing.length === 0 ? 1 : Math.max(...existing) + 1;
}

/** Copy of the definition stamped with its version number */
export function snapshotDefinition(definition: CriteriaDefinition, version: number): CriteriaDefinition {
  const copy = structuredClone(definition);
  copy.version = version;
  return copy;
}

/* ---------- Lookup ---------- */

export function versionNumbers(versions: readonly CriteriaVersion[]): number[] {
  return versions.map((v) => v.version).sort((a, b) => a - b);
}

export function findVersion(versions: readonly CriteriaVersion[], version: number): CriteriaVersion | null {
  return versions.find((v) => v.version === version) ?? null;
}

export function hasVersion(versions: readonly CriteriaVersion[], version: number): boolean {
  return findVersion(versions, version) !== null;
}

export function latestVersion(versions: readonly CriteriaVersion[]): CriteriaVersion | null {
  let latest: CriteriaVersion | null = null;
  for (const v of versions) {
    if (!latest || v.version > latest.version) latest = v;
  }
  return latest;
}

/* ---------- Diff ---------- */

const COMPARED_FIELDS = ["field", "operator", "value", "weight", "isActive"] as const;

type ComparedField = (typeof COMPARED_FIELDS)[number];

export interface RuleChange {
  key: string;
  changes: Partial<Record<ComparedField, { from: unknown; to: unknown }>>;
}

export interface VersionDiff {
  from: number | null;
  to: number | null;
  added: string[];
  removed: string[];
  modified: RuleChange[];
}

/** Standalone and grouped rules, keyed by rule key */
function rulesByKey(definition: CriteriaDefinition): Map<string, RuleDefinition> {
  const map = new Map<string, RuleDefinition>();
  for (const rule of definition.rules) map.set(rule.key, rule);
  for (const group of definition.groups) {
    for (const rule of group.rules) map.set(rule.key, rule);
  }
  return map;
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export function compareVersions(a: CriteriaDefinition, b: CriteriaDefinition): VersionDiff {
  const before = rulesByKey(a);
  const after = rulesByKey(b);

  const added = [...after.keys()].filter((k) => !before.has(k));
  const removed = [...before.keys()].filter((k) => !after.has(k));
  const modified: RuleChange[] = [];

  for (const [key, prev] of before) {
    const next = after.get(key);
    if (!next) continue;

    const changes: RuleChange["changes"] = {};
    for (const field of COMPARED_FIELDS) {
      if (!sameValue(prev[field], next[field])) {
        changes[field] = { from: prev[field], to: next[field] };
      }
    }
    if (Object.keys(changes).length > 0) modified.push({ key, changes });
  }

  return { from: a.version ?? null, to: b.version ?? null, added, removed, modified };
}

/* ---------- Evaluation ---------- */

export function evaluateVersion(
  version: CriteriaVersion,
  input: Snapshot | SnapshotObject,
  options: EvaluateOptions = {}
): EvaluationResult {
  return evaluate(version.definition, input, options);
}
