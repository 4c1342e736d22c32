// src/engine/index.ts
// Engine exports: operators, rule/group evaluation, scoring and the orchestrator.

export * from "./types";
export {
  RULE_OPERATORS,
  OPERATOR_LABELS,
  compilePattern,
  evaluateOperator,
  ignoresValue,
  isRuleOperator,
  operatorsForFieldType,
  parseOperator,
  requiresMultipleValues,
  toNumber,
  type FieldType,
} from "./operators";
export {
  collectIdentifiers,
  createIdentifierResolver,
  evaluateBooleanExpression,
  parseBooleanExpression,
  type BooleanExpression,
} from "./booleanExpression";
export { activeRules, dependenciesMet, evaluateRule, sortByOrder } from "./rules";
export { combineGroup, evaluateGroup, type GroupTally } from "./groups";
export {
  MAX_SCORE,
  SCORING_METHODS,
  calculateScore,
  isPassing,
  isScoringMethod,
  roundScore,
} from "./scoring";
export { NO_RULES_DECISION, decisionFromTiers, pickDecision, type DecisionOptions } from "./decisions";
export { GROUP_LOGICS, isGroupLogic, validateCriteria, validateGroup, validateRule } from "./validation";
export { evaluate, type EvaluateOptions } from "./evaluator";
export { explain, type ExecutionPlan, type PlannedGroup, type PlannedRule } from "./explain";
