// src/engine/types.ts
// Eligibility engine: shared type definitions
//
// Definitions (criteria, rules, groups) are plain data so they can be loaded
// from storage, versioned as JSON and frozen for the duration of an evaluation.

import type { RuleOperator } from "./operators";

export type { RuleOperator } from "./operators";

/* ============= Values ============= */

export type ScalarValue = string | number | boolean | null;

/** Expected value of a rule: a scalar, or a list for in/not_in/between */
export type RuleValue = ScalarValue | ScalarValue[];

/* ============= Strategies ============= */

export type ScoringMethod = "weighted" | "pass_fail" | "sum" | "average";

export type GroupLogic = "all" | "any" | "min" | "majority" | "boolean";

/** How group outcomes combine at criteria level */
export type GroupCombinationLogic = "all" | "any" | "boolean";

export interface GroupCombination {
  logic: GroupCombinationLogic;
  /** Boolean formula over group keys (boolean logic only) */
  expression?: string | null;
}

export interface DecisionTier {
  minScore: number;
  label: string;
}

/* ============= Definitions ============= */

/** A precondition that must hold for a rule to be evaluated at all */
export interface RuleDependency {
  field: string;
  operator: RuleOperator;
  value: RuleValue;
}

export interface RuleDefinition {
  id: string;
  /** Stable identifier referenced from boolean expressions and traces */
  key: string;
  field: string;
  operator: RuleOperator;
  value: RuleValue;
  weight: number;
  order: number;
  isActive: boolean;
  dependencies?: RuleDependency[];
  meta?: Record<string, unknown>;
}

export interface RuleGroupDefinition {
  id: string;
  key: string;
  name: string;
  logicType: GroupLogic;
  minRequired: number | null;
  booleanExpression: string | null;
  weight: number;
  order: number;
  isActive: boolean;
  rules: RuleDefinition[];
}

export interface CriteriaDefinition {
  id: string;
  name: string;
  slug: string;
  /** null falls back to the configured default */
  passThreshold: number | null;
  scoringMethod: ScoringMethod | null;
  rules: RuleDefinition[];
  groups: RuleGroupDefinition[];
  decisionThresholds?: DecisionTier[];
  groupCombination?: GroupCombination | null;
  version?: number | null;
}

/* ============= Results ============= */

export interface RuleTrace {
  ruleId: string;
  ruleKey: string;
  groupId: string | null;
  field: string;
  operator: RuleOperator;
  expected: RuleValue;
  actual: unknown;
  passed: boolean;
  /** Dependencies not met; excluded from tallies and scoring */
  skipped: boolean;
  weight: number;
  contribution: number;
  latencyMs: number;
  error: string | null;
}

export interface RuleOutcome {
  passed: boolean;
  contribution: number;
  trace: RuleTrace;
}

export interface GroupOutcome {
  groupId: string;
  groupKey: string;
  name: string;
  logicType: GroupLogic;
  passed: boolean;
  weight: number;
  contribution: number;
  passedCount: number;
  ruleCount: number;
  rules: RuleTrace[];
}

/** What the scorer sees: a standalone rule or a whole group */
export interface ScoredItem {
  id: string;
  passed: boolean;
  weight: number;
  contribution: number;
}

export interface EvaluationResult {
  criteriaId: string;
  criteriaSlug: string;
  version: number | null;
  passed: boolean;
  score: number;
  threshold: number;
  scoringMethod: ScoringMethod;
  decision: string;
  ruleResults: RuleTrace[];
  groupResults: GroupOutcome[];
  /** Keys of rules that were evaluated and failed */
  failedRules: string[];
  /** Criteria-level group gate outcome; null when no gate applies */
  groupCombinationPassed: boolean | null;
  evaluatedAt: string;
  executionTimeMs: number;
}
