// src/engine/rules.ts
// Single-rule evaluation with per-rule error isolation.
//
// A rule that throws (malformed regex, a getter blowing up on lookup) is
// recorded as failed with the message on its trace; siblings keep going.

import { errorMessage } from "../errors";
import { createLogger } from "../observability";
import type { Snapshot } from "../snapshot";
import { evaluateOperator } from "./operators";
import type { RuleDefinition, RuleOutcome } from "./types";

const log = createLogger("engine/rules");

/** True when every declared dependency holds (vacuously true without any) */
export function dependenciesMet(rule: RuleDefinition, snapshot: Snapshot): boolean {
  const deps = rule.dependencies ?? [];
  return deps.every((dep) => evaluateOperator(dep.operator, snapshot.get(dep.field), dep.value));
}

export function evaluateRule(
  rule: RuleDefinition,
  snapshot: Snapshot,
  groupId: string | null = null
): RuleOutcome {
  const started = performance.now();

  let actual: unknown = null;
  let passed = false;
  let skipped = false;
  let error: string | null = null;

  try {
    actual = snapshot.get(rule.field, null);
    if (!dependenciesMet(rule, snapshot)) {
      skipped = true;
    } else {
      passed = evaluateOperator(rule.operator, actual, rule.value);
    }
  } catch (err) {
    passed = false;
    error = errorMessage(err);
    log.debug({ ruleKey: rule.key, field: rule.field, operator: rule.operator, error }, "Rule evaluation failed");
  }

  const contribution = passed ? rule.weight : 0;

  return {
    passed,
    contribution,
    trace: {
      ruleId: rule.id,
      ruleKey: rule.key,
      groupId,
      field: rule.field,
      operator: rule.operator,
      expected: rule.value,
      actual,
      passed,
      skipped,
      weight: rule.weight,
      contribution,
      latencyMs: Math.round((performance.now() - started) * 1000) / 1000,
      error,
    },
  };
}

/** Active rules in execution order */
export function activeRules(rules: readonly RuleDefinition[]): RuleDefinition[] {
  return sortByOrder(rules.filter((r) => r.isActive));
}

export function sortByOrder<T extends { order: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.order - b.order);
}
