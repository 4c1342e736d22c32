// src/engine/validation.ts
// Eager structural checks on a criteria definition. Anything caught here is
// a ConfigurationError and stops the evaluation before it starts.
//
// Rule values are not shape-checked here: a malformed `between` range or a
// bad regex is an ordinary failed rule at evaluation time. The authoring
// builder applies the stricter value checks.

import { ConfigurationError } from "../errors";
import { collectIdentifiers, createIdentifierResolver, parseBooleanExpression } from "./booleanExpression";
import { isRuleOperator } from "./operators";
import { sortByOrder } from "./rules";
import { isScoringMethod } from "./scoring";
import type { CriteriaDefinition, GroupLogic, RuleDefinition, RuleGroupDefinition } from "./types";

export const GROUP_LOGICS: readonly GroupLogic[] = ["all", "any", "min", "majority", "boolean"];

export function isGroupLogic(value: string): value is GroupLogic {
  return GROUP_LOGICS.some((l) => l === value);
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/* ---------- Rules ---------- */

export function validateRule(rule: RuleDefinition, path: string): void {
  if (typeof rule.field !== "string" || rule.field.trim() === "") {
    throw new ConfigurationError("Rule field must be a non-empty string", `${path}.field`);
  }
  if (typeof rule.operator !== "string" || !isRuleOperator(rule.operator)) {
    throw new ConfigurationError(`Unknown operator "${String(rule.operator)}"`, `${path}.operator`);
  }
  if (!isNonNegativeNumber(rule.weight)) {
    throw new ConfigurationError("Rule weight must be a non-negative number", `${path}.weight`);
  }

  (rule.dependencies ?? []).forEach((dep, i) => {
    if (typeof dep.operator !== "string" || !isRuleOperator(dep.operator)) {
      throw new ConfigurationError(
        `Unknown operator "${String(dep.operator)}"`,
        `${path}.dependencies[${i}].operator`
      );
    }
  });
}

/* ---------- Groups ---------- */

export function validateGroup(group: RuleGroupDefinition, path: string): void {
  if (!isGroupLogic(group.logicType)) {
    throw new ConfigurationError(`Unknown group logic "${String(group.logicType)}"`, `${path}.logicType`);
  }
  if (!isNonNegativeNumber(group.weight)) {
    throw new ConfigurationError("Group weight must be a non-negative number", `${path}.weight`);
  }

  group.rules.forEach((rule, i) => validateRule(rule, `${path}.rules[${i}]`));

  // Only active members can count towards MIN
  if (group.logicType === "min") {
    const min = group.minRequired;
    const activeCount = group.rules.filter((r) => r.isActive).length;
    if (min === null || !Number.isInteger(min) || min <= 0 || min > activeCount) {
      throw new ConfigurationError(
        `MIN group requires 0 < minRequired <= ${activeCount}, got ${String(min)}`,
        `${path}.minRequired`
      );
    }
  }

  if (group.logicType === "boolean") {
    const exprPath = `${path}.booleanExpression`;
    const expr = parseBooleanExpression(group.booleanExpression ?? "", exprPath);
    const resolve = createIdentifierResolver(sortByOrder(group.rules).map((r) => r.key));
    for (const name of collectIdentifiers(expr)) {
      if (resolve(name) === null) {
        throw new ConfigurationError(`Boolean expression references unknown rule "${name}"`, exprPath);
      }
    }
  }
}

/* ---------- Criteria ---------- */

/**
 * Validate a full definition.
 * @throws ConfigurationError naming the offending path
 */
export function validateCriteria(criteria: CriteriaDefinition): void {
  if (criteria.scoringMethod !== null && !isScoringMethod(criteria.scoringMethod)) {
    throw new ConfigurationError(`Unknown scoring method "${String(criteria.scoringMethod)}"`, "scoringMethod");
  }

  if (criteria.passThreshold !== null) {
    const t = criteria.passThreshold;
    const upperBound = criteria.scoringMethod === "sum" ? Infinity : 100;
    if (!isNonNegativeNumber(t) || t > upperBound) {
      throw new ConfigurationError(`Pass threshold out of range: ${String(t)}`, "passThreshold");
    }
  }

  const keys = new Set<string>();
  const checkKey = (rule: RuleDefinition, path: string) => {
    if (keys.has(rule.key)) {
      throw new ConfigurationError(`Duplicate rule key "${rule.key}"`, `${path}.key`);
    }
    keys.add(rule.key);
  };

  criteria.rules.forEach((rule, i) => {
    validateRule(rule, `rules[${i}]`);
    checkKey(rule, `rules[${i}]`);
  });

  const groupKeys = new Set<string>();
  criteria.groups.forEach((group, i) => {
    const path = `groups[${i}]`;
    if (groupKeys.has(group.key)) {
      throw new ConfigurationError(`Duplicate group key "${group.key}"`, `${path}.key`);
    }
    groupKeys.add(group.key);
    validateGroup(group, path);
    group.rules.forEach((rule, j) => checkKey(rule, `${path}.rules[${j}]`));
  });

  const combination = criteria.groupCombination;
  if (combination) {
    if (!["all", "any", "boolean"].includes(combination.logic)) {
      throw new ConfigurationError(`Unknown group combination "${String(combination.logic)}"`, "groupCombination.logic");
    }
    if (combination.logic === "boolean") {
      const expr = parseBooleanExpression(combination.expression ?? "", "groupCombination.expression");
      const resolve = createIdentifierResolver(sortByOrder(criteria.groups).map((g) => g.key));
      for (const name of collectIdentifiers(expr)) {
        if (resolve(name) === null) {
          throw new ConfigurationError(`Group expression references unknown group "${name}"`, "groupCombination.expression");
        }
      }
    }
  }

  (criteria.decisionThresholds ?? []).forEach((tier, i) => {
    if (typeof tier.minScore !== "number" || !Number.isFinite(tier.minScore) || !tier.label) {
      throw new ConfigurationError("Decision tier needs a numeric minScore and a label", `decisionThresholds[${i}]`);
    }
  });
}
