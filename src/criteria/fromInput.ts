// src/criteria/fromInput.ts
// Criteria described as plain data (HTTP bodies, fixtures) opened as a
// builder, so the same eager checks apply as for code-built criteria.

import type { DecisionTier, GroupCombinationLogic } from "../engine";
import { ConfigurationError } from "../errors";
import { CriteriaBuilder, type CriteriaBuilderOptions, type GroupBuilder } from "./builder";
import type { GroupInput, RuleInput } from "./types";

export interface CriteriaInput {
  name: string;
  slug?: string;
  description?: string | null;
  isActive?: boolean;
  type?: string | null;
  group?: string | null;
  category?: string | null;
  tags?: string[];
  meta?: Record<string, unknown>;
  passThreshold?: number | null;
  scoringMethod?: string | null;
  rules?: RuleInput[];
  groups?: GroupInput[];
  decisionThresholds?: Record<string, string> | DecisionTier[];
  groupCombination?: { logic: GroupCombinationLogic; expression?: string | null } | null;
}

function configureGroup(group: GroupBuilder, input: GroupInput, index: number): void {
  switch (input.logicType ?? "all") {
    case "all":
      group.requireAll();
      break;
    case "any":
      group.requireAny();
      break;
    case "majority":
      group.requireMajority();
      break;
    case "min":
      if (typeof input.minRequired !== "number") {
        throw new ConfigurationError("MIN groups need minRequired", `groups[${index}].minRequired`);
      }
      group.requireMin(input.minRequired);
      break;
    case "boolean":
      group.requireLogic(input.booleanExpression ?? "");
      break;
    default:
      throw new ConfigurationError(`Unknown group logic "${String(input.logicType)}"`, `groups[${index}].logicType`);
  }
  if (input.weight !== undefined) group.weight(input.weight);
  group.addRules(input.rules ?? []);
}

/** @throws ConfigurationError naming the offending path */
export function builderFromInput(input: CriteriaInput, options: CriteriaBuilderOptions = {}): CriteriaBuilder {
  const builder = new CriteriaBuilder(input.name, { ...options, slug: input.slug ?? options.slug });

  if (input.description) builder.description(input.description);
  if (input.scoringMethod) builder.scoringMethod(input.scoringMethod);
  if (input.passThreshold !== undefined && input.passThreshold !== null) builder.passThreshold(input.passThreshold);
  if (input.isActive !== undefined) builder.active(input.isActive);
  if (input.type) builder.type(input.type);
  if (input.group) builder.group(input.group);
  if (input.category) builder.category(input.category);
  if (input.tags) builder.tags(...input.tags);
  if (input.meta) builder.meta(input.meta);

  builder.addRules(input.rules ?? []);
  (input.groups ?? []).forEach((group, i) => {
    if (typeof group.name !== "string" || group.name.trim() === "") {
      throw new ConfigurationError("Group name must be a non-empty string", `groups[${i}].name`);
    }
    builder.addGroup(group.name, (g) => configureGroup(g, group, i), group.key ?? undefined);
  });

  if (input.decisionThresholds) builder.decisionThresholds(input.decisionThresholds);
  if (input.groupCombination) {
    builder.groupCombination(input.groupCombination.logic, input.groupCombination.expression ?? null);
  }
  return builder;
}
