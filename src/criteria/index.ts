// src/criteria/index.ts
export {
  CriteriaBuilder,
  GroupBuilder,
  groupKeyFor,
  slugify,
  toDecisionTiers,
  type CriteriaBuilderOptions,
} from "./builder";
export {
  allocateRuleKey,
  isRulePriority,
  resolveWeight,
  toRuleDefinition,
  toRuleDependencies,
  toRuleValue,
} from "./ruleInput";
export {
  compareVersions,
  evaluateVersion,
  findVersion,
  hasVersion,
  latestVersion,
  nextVersionNumber,
  snapshotDefinition,
  versionNumbers,
  type CriteriaVersion,
  type RuleChange,
  type VersionDiff,
} from "./versions";
export { builderFromInput, type CriteriaInput } from "./fromInput";
export { createPreset, getPreset, listPresets, type PresetDefinition, type PresetSummary } from "./presets";
export {
  DEFAULT_RULE_WEIGHT,
  PRIORITY_WEIGHTS,
  RULE_PRIORITIES,
  type CriteriaAttributes,
  type CriteriaDraft,
  type GroupInput,
  type RuleInput,
  type RulePriority,
} from "./types";
