// src/store/json.ts
// JSON column helpers. Columns are written by the stores themselves, but
// what comes back is still checked before it reaches a typed record.

import {
  isGroupLogic,
  isRuleOperator,
  isScoringMethod,
  type CriteriaDefinition,
  type DecisionTier,
  type GroupCombination,
  type RuleDefinition,
  type RuleDependency,
  type RuleGroupDefinition,
  type RuleValue,
  type ScalarValue,
} from "../engine";
import { isPlainObject, toSnapshotObject, type SnapshotObject } from "../snapshot";

/** Parse a column, falling back on null/empty/malformed input */
export function parseJson(json: string | null): unknown {
  if (!json) return null;
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch {
    return null;
  }
}

function isScalar(value: unknown): value is ScalarValue {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toRuleValue(value: unknown): RuleValue {
  if (Array.isArray(value)) return value.filter(isScalar);
  return isScalar(value) ? value : null;
}

export function readRuleValue(json: string | null): RuleValue {
  return toRuleValue(parseJson(json));
}

export function readStringArray(json: string | null): string[] {
  const value = parseJson(json);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

export function readRecord(json: string | null): Record<string, unknown> {
  const value = parseJson(json);
  return isPlainObject(value) ? value : {};
}

export function readRecordArray(json: string | null): Record<string, unknown>[] {
  const value = parseJson(json);
  return Array.isArray(value) ? value.filter(isPlainObject) : [];
}

export function readSnapshotObject(json: string | null): SnapshotObject {
  return toSnapshotObject(readRecord(json));
}

export function readDependencies(json: string | null): RuleDependency[] {
  return toDependencies(parseJson(json));
}

function toDependencies(value: unknown): RuleDependency[] {
  if (!Array.isArray(value)) return [];

  const deps: RuleDependency[] = [];
  for (const item of value) {
    if (!isPlainObject(item)) continue;
    const { field, operator, value: expected } = item;
    if (typeof field !== "string" || typeof operator !== "string" || !isRuleOperator(operator)) continue;
    deps.push({ field, operator, value: toRuleValue(expected) });
  }
  return deps;
}

export function readDecisionTiers(json: string | null): DecisionTier[] {
  return toDecisionTiers(parseJson(json));
}

function toDecisionTiers(value: unknown): DecisionTier[] {
  if (!Array.isArray(value)) return [];

  const tiers: DecisionTier[] = [];
  for (const item of value) {
    if (isPlainObject(item) && typeof item.minScore === "number" && typeof item.label === "string") {
      tiers.push({ minScore: item.minScore, label: item.label });
    }
  }
  return tiers;
}

export function readGroupCombination(json: string | null): GroupCombination | null {
  return toGroupCombination(parseJson(json));
}

function toGroupCombination(value: unknown): GroupCombination | null {
  if (!isPlainObject(value)) return null;

  const { logic, expression } = value;
  if (logic !== "all" && logic !== "any" && logic !== "boolean") return null;
  return { logic, expression: typeof expression === "string" ? expression : null };
}

export function readScoringMethod(value: string | null) {
  return value !== null && isScoringMethod(value) ? value : null;
}

/* ---------- Definitions ---------- */

const nullableNumber = (value: unknown): number | null => (typeof value === "number" ? value : null);
const nullableString = (value: unknown): string | null => (typeof value === "string" ? value : null);

function toRule(value: unknown): RuleDefinition | null {
  if (!isPlainObject(value)) return null;
  const { id, key, field, operator, weight, order, isActive } = value;
  if (typeof id !== "string" || typeof key !== "string" || typeof field !== "string") return null;
  if (typeof operator !== "string" || !isRuleOperator(operator)) return null;
  if (typeof weight !== "number" || typeof order !== "number") return null;

  const rule: RuleDefinition = {
    id,
    key,
    field,
    operator,
    value: toRuleValue(value.value),
    weight,
    order,
    isActive: isActive !== false,
  };
  const dependencies = toDependencies(value.dependencies);
  if (dependencies.length > 0) rule.dependencies = dependencies;
  if (isPlainObject(value.meta)) rule.meta = value.meta;
  return rule;
}

function toRules(value: unknown): RuleDefinition[] | null {
  if (!Array.isArray(value)) return null;
  const rules = value.map(toRule);
  return rules.every((r): r is RuleDefinition => r !== null) ? rules : null;
}

function toGroup(value: unknown): RuleGroupDefinition | null {
  if (!isPlainObject(value)) return null;
  const { id, key, name, logicType, weight, order, isActive } = value;
  if (typeof id !== "string" || typeof key !== "string" || typeof name !== "string") return null;
  if (typeof logicType !== "string" || !isGroupLogic(logicType)) return null;
  const rules = toRules(value.rules);
  if (!rules) return null;

  return {
    id,
    key,
    name,
    logicType,
    minRequired: nullableNumber(value.minRequired),
    booleanExpression: nullableString(value.booleanExpression),
    weight: typeof weight === "number" ? weight : 1,
    order: typeof order === "number" ? order : 0,
    isActive: isActive !== false,
    rules,
  };
}

/** A stored definition, or null when the JSON does not describe one */
export function readCriteriaDefinition(json: string | null): CriteriaDefinition | null {
  const value = parseJson(json);
  if (!isPlainObject(value)) return null;

  const { id, name, slug, scoringMethod } = value;
  if (typeof id !== "string" || typeof name !== "string" || typeof slug !== "string") return null;

  const rules = toRules(value.rules);
  const groups = Array.isArray(value.groups) ? value.groups.map(toGroup) : null;
  if (!rules || !groups || !groups.every((g): g is RuleGroupDefinition => g !== null)) return null;

  return {
    id,
    name,
    slug,
    passThreshold: nullableNumber(value.passThreshold),
    scoringMethod: typeof scoringMethod === "string" && isScoringMethod(scoringMethod) ? scoringMethod : null,
    rules,
    groups,
    decisionThresholds: toDecisionTiers(value.decisionThresholds),
    groupCombination: toGroupCombination(value.groupCombination),
    version: nullableNumber(value.version),
  };
}
