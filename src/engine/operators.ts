// src/engine/operators.ts
// Operator catalog and the pure comparison function behind every rule.
//
// The catalog is closed: names are checked once when a rule is parsed
// (parseOperator) and dispatch is an exhaustive switch. A type mismatch at
// evaluation time is an ordinary `false`, never an exception. The one
// exception path is a malformed regex pattern, which rule evaluation catches.

import { ConfigurationError } from "../errors";

/* ============= Catalog ============= */

export const RULE_OPERATORS = [
  "==",
  "!=",
  ">",
  ">=",
  "<",
  "<=",
  "in",
  "not_in",
  "between",
  "not_between",
  "contains",
  "starts_with",
  "ends_with",
  "exists",
  "not_exists",
  "regex",
] as const;

export type RuleOperator = (typeof RULE_OPERATORS)[number];

export type FieldType = "numeric" | "integer" | "string" | "boolean" | "date" | "array";

export const OPERATOR_LABELS: Record<RuleOperator, string> = {
  "==": "Equal To",
  "!=": "Not Equal To",
  ">": "Greater Than",
  ">=": "Greater Than or Equal",
  "<": "Less Than",
  "<=": "Less Than or Equal",
  in: "In Array",
  not_in: "Not In Array",
  between: "Between",
  not_between: "Not Between",
  contains: "Contains",
  starts_with: "Starts With",
  ends_with: "Ends With",
  exists: "Exists",
  not_exists: "Does Not Exist",
  regex: "Regular Expression",
};

const MULTI_VALUE_OPERATORS: ReadonlySet<RuleOperator> = new Set(["in", "not_in", "between", "not_between"]);
const VALUELESS_OPERATORS: ReadonlySet<RuleOperator> = new Set(["exists", "not_exists"]);

const COMPARISON_OPERATORS: RuleOperator[] = ["==", "!=", ">", ">=", "<", "<=", "between", "not_between"];

const FIELD_TYPE_OPERATORS: Record<FieldType, RuleOperator[]> = {
  numeric: [...COMPARISON_OPERATORS, "in", "not_in"],
  integer: [...COMPARISON_OPERATORS, "in", "not_in"],
  string: ["==", "!=", "in", "not_in", "contains", "starts_with", "ends_with", "regex"],
  boolean: ["==", "!="],
  date: COMPARISON_OPERATORS,
  array: ["in", "not_in", "contains"],
};

export function isRuleOperator(value: string): value is RuleOperator {
  return RULE_OPERATORS.some((op) => op === value);
}

/**
 * Resolve an operator name, rejecting anything outside the catalog.
 * @throws ConfigurationError
 */
export function parseOperator(value: string, path: string | null = null): RuleOperator {
  const trimmed = value.trim();
  if (isRuleOperator(trimmed)) return trimmed;
  throw new ConfigurationError(
    `Unknown operator "${value}". Must be one of: ${RULE_OPERATORS.join(", ")}`,
    path
  );
}

/** in, not_in, between and not_between take a list */
export function requiresMultipleValues(operator: RuleOperator): boolean {
  return MULTI_VALUE_OPERATORS.has(operator);
}

/** exists and not_exists ignore the expected value */
export function ignoresValue(operator: RuleOperator): boolean {
  return VALUELESS_OPERATORS.has(operator);
}

export function operatorsForFieldType(fieldType: FieldType): RuleOperator[] {
  return [...FIELD_TYPE_OPERATORS[fieldType]];
}

/* ============= Coercion Helpers ============= */

/** Finite number, or a numeric string; null otherwise (booleans are not numeric) */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function looselyEqual(actual: unknown, expected: unknown): boolean {
  if (actual === expected) return true;

  const a = toNumber(actual);
  const b = toNumber(expected);
  if (a !== null && b !== null) return a === b;

  if (Array.isArray(actual) && Array.isArray(expected)) {
    return (
      actual.length === expected.length &&
      actual.every((item, i) => looselyEqual(item, expected[i]))
    );
  }

  return false;
}

function compareNumeric(
  actual: unknown,
  expected: unknown,
  cmp: (a: number, b: number) => boolean
): boolean {
  const a = toNumber(actual);
  const b = toNumber(expected);
  return a !== null && b !== null && cmp(a, b);
}

function isBetween(actual: unknown, expected: unknown): boolean {
  if (!Array.isArray(expected) || expected.length !== 2) return false;

  const value = toNumber(actual);
  const min = toNumber(expected[0]);
  const max = toNumber(expected[1]);
  if (value === null || min === null || max === null) return false;

  return value >= min && value <= max;
}

function contains(actual: unknown, expected: unknown): boolean {
  if (typeof actual === "string" && typeof expected === "string") {
    return actual.includes(expected);
  }
  if (Array.isArray(actual)) {
    return actual.some((item) => item === expected);
  }
  return false;
}

function exists(actual: unknown): boolean {
  return actual !== null && actual !== undefined && actual !== "";
}

/* ============= Regex ============= */

const DELIMITED_PATTERN = /^\/(.*)\/([a-z]*)$/s;
const SUPPORTED_FLAGS = /^[imsu]*$/;

/**
 * Compile "/body/flags" or a bare pattern.
 * The global and sticky flags are not accepted: tests must stay stateless.
 * @throws SyntaxError for malformed patterns or unsupported flags
 */
export function compilePattern(pattern: string): RegExp {
  const delimited = DELIMITED_PATTERN.exec(pattern);
  if (delimited) {
    const [, body, flags] = delimited;
    if (!SUPPORTED_FLAGS.test(flags)) {
      throw new SyntaxError(`Unsupported regex flags "${flags}" in ${pattern}`);
    }
    return new RegExp(body, flags);
  }
  return new RegExp(pattern);
}

function matchesRegex(actual: unknown, expected: unknown): boolean {
  if (typeof actual !== "string" || typeof expected !== "string") return false;
  return compilePattern(expected).test(actual);
}

/* ============= Dispatch ============= */

/**
 * Apply `operator` to the field value and the rule's expected value.
 * Total over the catalog; only `regex` can throw (malformed pattern).
 */
export function evaluateOperator(operator: RuleOperator, actual: unknown, expected: unknown): boolean {
  switch (operator) {
    case "==":
      return looselyEqual(actual, expected);
    case "!=":
      return !looselyEqual(actual, expected);
    case ">":
      return compareNumeric(actual, expected, (a, b) => a > b);
    case ">=":
      return compareNumeric(actual, expected, (a, b) => a >= b);
    case "<":
      return compareNumeric(actual, expected, (a, b) => a < b);
    case "<=":
      return compareNumeric(actual, expected, (a, b) => a <= b);
    case "in":
      return Array.isArray(expected) && expected.some((item) => item === actual);
    case "not_in":
      return Array.isArray(expected) && !expected.some((item) => item === actual);
    case "between":
      return isBetween(actual, expected);
    case "not_between":
      return !isBetween(actual, expected);
    case "contains":
      return contains(actual, expected);
    case "starts_with":
      return typeof actual === "string" && typeof expected === "string" && actual.startsWith(expected);
    case "ends_with":
      return typeof actual === "string" && typeof expected === "string" && actual.endsWith(expected);
    case "exists":
      return exists(actual);
    case "not_exists":
      return !exists(actual);
    case "regex":
      return matchesRegex(actual, expected);
    default: {
      const unreachable: never = operator;
      throw new ConfigurationError(`Unhandled operator: ${String(unreachable)}`);
    }
  }
}
