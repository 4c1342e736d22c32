// src/engine/groups.ts
// Group combinators. A group scores like one weighted rule: its weight when
// the combinator holds, 0 otherwise.

import type { Snapshot } from "../snapshot";
import { ConfigurationError } from "../errors";
import {
  createIdentifierResolver,
  evaluateBooleanExpression,
  parseBooleanExpression,
} from "./booleanExpression";
import { evaluateRule, sortByOrder } from "./rules";
import type { GroupOutcome, RuleGroupDefinition, RuleOutcome } from "./types";

export interface GroupTally {
  passed: boolean;
  contribution: number;
  passedCount: number;
  ruleCount: number;
}

/**
 * Combine already-evaluated member outcomes under the group's logic.
 * Skipped rules (unmet dependencies) do not count towards the tallies;
 * for BOOLEAN they read as false. A group with nothing to count passes.
 */
export function combineGroup(group: RuleGroupDefinition, outcomes: readonly RuleOutcome[]): GroupTally {
  const counted = outcomes.filter((o) => !o.trace.skipped);
  const ruleCount = counted.length;
  const passedCount = counted.filter((o) => o.passed).length;

  let passed: boolean;
  if (ruleCount === 0) {
    passed = true;
  } else {
    switch (group.logicType) {
      case "all":
        passed = passedCount === ruleCount;
        break;
      case "any":
        passed = passedCount > 0;
        break;
      case "min":
        passed = passedCount >= (group.minRequired ?? ruleCount);
        break;
      case "majority":
        passed = passedCount > Math.floor(ruleCount / 2);
        break;
      case "boolean":
        passed = evaluateGroupExpression(group, outcomes);
        break;
      default: {
        const unreachable: never = group.logicType;
        throw new ConfigurationError(`Unknown group logic: ${String(unreachable)}`);
      }
    }
  }

  return {
    passed,
    contribution: passed ? group.weight : 0,
    passedCount,
    ruleCount,
  };
}

function evaluateGroupExpression(group: RuleGroupDefinition, outcomes: readonly RuleOutcome[]): boolean {
  const path = `groups.${group.key}.booleanExpression`;
  const expr = parseBooleanExpression(group.booleanExpression ?? "", path);
  const memberKeys = sortByOrder(group.rules).map((r) => r.key);
  const resolveKey = createIdentifierResolver(memberKeys);

  const truth = new Map<string, boolean>();
  for (const outcome of outcomes) {
    truth.set(outcome.trace.ruleKey, outcome.passed && !outcome.trace.skipped);
  }

  return evaluateBooleanExpression(expr, (name) => {
    const key = resolveKey(name);
    if (key === null) {
      throw new ConfigurationError(`Unknown rule "${name}" in boolean expression`, path);
    }
    // Inactive members were never evaluated
    return truth.get(key) ?? false;
  });
}

/** Evaluate a group's active rules and combine them */
export function evaluateGroup(group: RuleGroupDefinition, snapshot: Snapshot): GroupOutcome {
  const members = sortByOrder(group.rules).filter((r) => r.isActive);
  const outcomes = members.map((rule) => evaluateRule(rule, snapshot, group.id));
  const combined = combineGroup(group, outcomes);

  return {
    groupId: group.id,
    groupKey: group.key,
    name: group.name,
    logicType: group.logicType,
    passed: combined.passed,
    weight: group.weight,
    contribution: combined.contribution,
    passedCount: combined.passedCount,
    ruleCount: combined.ruleCount,
    rules: outcomes.map((o) => o.trace),
  };
}
