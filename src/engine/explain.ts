// src/engine/explain.ts
// Execution plan: what an evaluation of this definition will run, in order,
// without touching any data.

import { config } from "../config";
import { OPERATOR_LABELS } from "./operators";
import { activeRules, sortByOrder } from "./rules";
import type {
  CriteriaDefinition,
  DecisionTier,
  GroupCombination,
  GroupLogic,
  RuleDefinition,
  RuleDependency,
  ScoringMethod,
} from "./types";

export interface PlannedRule {
  key: string;
  field: string;
  operator: string;
  operatorLabel: string;
  value: RuleDefinition["value"];
  weight: number;
  dependencies: RuleDependency[];
}

export interface PlannedGroup {
  key: string;
  name: string;
  logicType: GroupLogic;
  minRequired: number | null;
  booleanExpression: string | null;
  weight: number;
  rules: PlannedRule[];
}

export interface ExecutionPlan {
  criteriaId: string;
  criteria: string;
  scoringMethod: ScoringMethod;
  passThreshold: number;
  rules: PlannedRule[];
  groups: PlannedGroup[];
  groupCombination: GroupCombination | null;
  decisionThresholds: DecisionTier[];
}

function planRule(rule: RuleDefinition): PlannedRule {
  return {
    key: rule.key,
    field: rule.field,
    operator: rule.operator,
    operatorLabel: OPERATOR_LABELS[rule.operator],
    value: rule.value,
    weight: rule.weight,
    dependencies: rule.dependencies ?? [],
  };
}

export function explain(criteria: CriteriaDefinition): ExecutionPlan {
  return {
    criteriaId: criteria.id,
    criteria: criteria.name,
    scoringMethod: criteria.scoringMethod ?? config.scoring.method,
    passThreshold: criteria.passThreshold ?? config.scoring.passThreshold,
    rules: activeRules(criteria.rules).map(planRule),
    groups: sortByOrder(criteria.groups.filter((g) => g.isActive)).map((group) => ({
      key: group.key,
      name: group.name,
      logicType: group.logicType,
      minRequired: group.minRequired,
      booleanExpression: group.booleanExpression,
      weight: group.weight,
      rules: activeRules(group.rules).map(planRule),
    })),
    groupCombination: criteria.groupCombination ?? null,
    decisionThresholds: [...(criteria.decisionThresholds ?? [])].sort((a, b) => b.minScore - a.minScore),
  };
}
