// src/criteria/ruleInput.ts
// Authoring-time checks for rule inputs. Stricter than the engine: a value
// whose shape can never match its operator is rejected here instead of
// failing quietly at evaluation time.

import { nanoid } from "nanoid";
import {
  compilePattern,
  parseOperator,
  toNumber,
  type RuleDefinition,
  type RuleDependency,
  type RuleOperator,
  type RuleValue,
  type ScalarValue,
} from "../engine";
import { ConfigurationError, errorMessage } from "../errors";
import { DEFAULT_RULE_WEIGHT, PRIORITY_WEIGHTS, RULE_PRIORITIES, type RuleInput, type RulePriority } from "./types";

/* ---------- Guards ---------- */

export function isRulePriority(value: string): value is RulePriority {
  return RULE_PRIORITIES.some((p) => p === value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

/** "true"/"false" (any case) become booleans */
function normalizeScalar(value: ScalarValue): ScalarValue {
  if (typeof value === "string") {
    const lower = value.toLowerCase();
    if (lower === "true") return true;
    if (lower === "false") return false;
  }
  return value;
}

/* ---------- Values ---------- */

function listValue(value: unknown, path: string): ScalarValue[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError("in and not_in require a non-empty array", path);
  }
  return value.map((item, i) => {
    if (!isScalar(item)) {
      throw new ConfigurationError("List items must be scalar values", `${path}[${i}]`);
    }
    return item;
  });
}

function rangeValue(value: unknown, path: string): [number, number] {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ConfigurationError("between and not_between require exactly 2 values", path);
  }
  const min = toNumber(value[0]);
  const max = toNumber(value[1]);
  if (min === null || max === null) {
    throw new ConfigurationError("between and not_between require numeric bounds", path);
  }
  if (min >= max) {
    throw new ConfigurationError("Range minimum must be less than maximum", path);
  }
  return [min, max];
}

function patternValue(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new ConfigurationError("regex requires a string pattern", path);
  }
  try {
    compilePattern(value);
  } catch (err) {
    throw new ConfigurationError(`Invalid regex pattern: ${errorMessage(err)}`, path, { cause: err });
  }
  return value;
}

/**
 * Check a value against its operator and return the stored form.
 * @throws ConfigurationError
 */
export function toRuleValue(operator: RuleOperator, value: unknown, path: string): RuleValue {
  switch (operator) {
    case "in":
    case "not_in":
      return listValue(value, path);
    case "between":
    case "not_between":
      return rangeValue(value, path);
    case "regex":
      return patternValue(value, path);
    case "exists":
    case "not_exists":
      return null;
    default:
      if (value === undefined) return null;
      if (!isScalar(value)) {
        throw new ConfigurationError(`Operator ${operator} requires a scalar value`, path);
      }
      return normalizeScalar(value);
  }
}

/* ---------- Weights ---------- */

/** Explicit weight wins, then the priority's weight, then the default */
export function resolveWeight(weight: number | null | undefined, priority: RulePriority | null | undefined, path: string): number {
  if (weight !== null && weight !== undefined) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigurationError("Rule weight must be a non-negative number", path);
    }
    return weight;
  }
  if (priority) return PRIORITY_WEIGHTS[priority];
  return DEFAULT_RULE_WEIGHT;
}

/* ---------- Keys ---------- */

/** Field name as key, suffixed _2, _3... when taken */
export function allocateRuleKey(base: string, taken: Set<string>): string {
  let key = base;
  let n = 2;
  while (taken.has(key)) key = `${base}_${n++}`;
  taken.add(key);
  return key;
}

/* ---------- Rules ---------- */

export function toRuleDependencies(input: RuleInput["dependencies"], path: string): RuleDependency[] {
  return (input ?? []).map((dep, i) => {
    const depPath = `${path}.dependencies[${i}]`;
    const operator = parseOperator(dep.operator, `${depPath}.operator`);
    return { field: dep.field, operator, value: toRuleValue(operator, dep.value, `${depPath}.value`) };
  });
}

/**
 * Turn authoring input into an engine rule.
 * @throws ConfigurationError naming the offending path
 */
export function toRuleDefinition(input: RuleInput, order: number, taken: Set<string>, path: string): RuleDefinition {
  if (typeof input.field !== "string" || input.field.trim() === "") {
    throw new ConfigurationError("Rule field must be a non-empty string", `${path}.field`);
  }
  const operator = parseOperator(input.operator, `${path}.operator`);
  const dependencies = toRuleDependencies(input.dependencies, path);

  const rule: RuleDefinition = {
    id: nanoid(12),
    key: allocateRuleKey(input.key?.trim() || input.field.trim(), taken),
    field: input.field.trim(),
    operator,
    value: toRuleValue(operator, input.value, `${path}.value`),
    weight: resolveWeight(input.weight, input.priority, `${path}.weight`),
    order,
    isActive: input.isActive ?? true,
  };
  if (dependencies.length > 0) rule.dependencies = dependencies;
  if (input.meta) rule.meta = input.meta;
  return rule;
}
