// src/criteria/types.ts
// Authoring-side types: what a builder or an HTTP body produces before it
// is stored or evaluated.

import type { CriteriaDefinition, GroupLogic } from "../engine";

/* ---------- Priority ---------- */
export type RulePriority = "critical" | "high" | "medium" | "low" | "info";

export const RULE_PRIORITIES: readonly RulePriority[] = ["critical", "high", "medium", "low", "info"];

export const PRIORITY_WEIGHTS: Record<RulePriority, number> = {
  critical: 100,
  high: 75,
  medium: 50,
  low: 25,
  info: 0,
};

/** Weight used when a rule names neither a weight nor a priority */
export const DEFAULT_RULE_WEIGHT = 1;

/* ---------- Inputs ---------- */
export interface RuleInput {
  field: string;
  operator: string;
  value?: unknown;
  weight?: number | null;
  priority?: RulePriority | null;
  key?: string | null;
  dependencies?: Array<{ field: string; operator: string; value?: unknown }>;
  isActive?: boolean;
  meta?: Record<string, unknown>;
}

export interface GroupInput {
  name: string;
  key?: string | null;
  logicType?: GroupLogic;
  minRequired?: number | null;
  booleanExpression?: string | null;
  weight?: number;
  rules?: RuleInput[];
}

/* ---------- Draft ---------- */
export interface CriteriaAttributes {
  name: string;
  slug: string;
  description: string | null;
  isActive: boolean;
  type: string | null;
  group: string | null;
  category: string | null;
  tags: string[];
  meta: Record<string, unknown>;
}

/** A validated, not yet persisted criteria */
export interface CriteriaDraft extends CriteriaAttributes {
  definition: CriteriaDefinition;
}
