// src/engine/evaluator.ts
// Evaluation orchestrator
//
// Flow (linear, always completes once the definition validates):
// 1. Validate the definition (ConfigurationError aborts before any rule runs)
// 2. Evaluate standalone rules, then groups
// 3. Score rules and groups as weighted items
// 4. Apply the threshold and the optional criteria-level group gate
// 5. Pick the decision label and assemble a frozen result

import { config } from "../config";
import { createLogger } from "../observability";
import { Snapshot, type SnapshotObject } from "../snapshot";
import {
  createIdentifierResolver,
  evaluateBooleanExpression,
  parseBooleanExpression,
} from "./booleanExpression";
import { NO_RULES_DECISION, pickDecision } from "./decisions";
import { evaluateGroup } from "./groups";
import { activeRules, evaluateRule, sortByOrder } from "./rules";
import { MAX_SCORE, calculateScore, isPassing } from "./scoring";
import type {
  CriteriaDefinition,
  EvaluationResult,
  GroupOutcome,
  RuleTrace,
  ScoredItem,
  ScoringMethod,
} from "./types";
import { validateCriteria } from "./validation";

const log = createLogger("engine/evaluator");

/* ============= Options ============= */

export interface EvaluateOptions {
  /** Used when the criteria sets no threshold of its own */
  passThreshold?: number;
  /** Used when the criteria sets no scoring method of its own */
  scoringMethod?: ScoringMethod;
  decisions?: { pass: readonly string[]; fail: readonly string[] };
  random?: () => number;
  now?: () => Date;
  /** Skip validation for definitions already validated by the caller */
  skipValidation?: boolean;
}

/* ============= Helpers ============= */

function resolveThreshold(criteria: CriteriaDefinition, options: EvaluateOptions): number {
  return criteria.passThreshold ?? options.passThreshold ?? config.scoring.passThreshold;
}

function resolveMethod(criteria: CriteriaDefinition, options: EvaluateOptions): ScoringMethod {
  return criteria.scoringMethod ?? options.scoringMethod ?? config.scoring.method;
}

/** Criteria-level gate over group outcomes; null when no gate applies */
function combineGroups(criteria: CriteriaDefinition, groups: readonly GroupOutcome[]): boolean | null {
  const combination = criteria.groupCombination;
  if (!combination || groups.length === 0) return null;

  switch (combination.logic) {
    case "all":
      return groups.every((g) => g.passed);
    case "any":
      return groups.some((g) => g.passed);
    case "boolean": {
      const expr = parseBooleanExpression(combination.expression ?? "", "groupCombination.expression");
      const resolve = createIdentifierResolver(sortByOrder(criteria.groups).map((g) => g.key));
      const truth = new Map<string, boolean>(groups.map((g): [string, boolean] => [g.groupKey, g.passed]));
      return evaluateBooleanExpression(expr, (name) => {
        const key = resolve(name);
        return key !== null && (truth.get(key) ?? false);
      });
    }
  }
}

function freezeResult(result: EvaluationResult): EvaluationResult {
  for (const trace of result.ruleResults) Object.freeze(trace);
  for (const group of result.groupResults) {
    Object.freeze(group.rules);
    Object.freeze(group);
  }
  Object.freeze(result.ruleResults);
  Object.freeze(result.groupResults);
  Object.freeze(result.failedRules);
  return Object.freeze(result);
}

/* ============= Orchestrator ============= */

/**
 * Evaluate one criteria definition against one snapshot.
 *
 * @throws ConfigurationError when the definition is invalid
 */
export function evaluate(
  criteria: CriteriaDefinition,
  input: Snapshot | SnapshotObject,
  options: EvaluateOptions = {}
): EvaluationResult {
  const started = performance.now();

  if (!options.skipValidation) {
    try {
      validateCriteria(criteria);
    } catch (err) {
      log.warn({ criteriaId: criteria.id, err }, "Criteria failed validation");
      throw err;
    }
  }

  // Work on a private copy so a caller mutating the definition mid-flight
  // cannot change this evaluation
  const definition = structuredClone(criteria);
  const snapshot = Snapshot.from(input);
  const now = options.now ?? (() => new Date());

  const threshold = resolveThreshold(definition, options);
  const scoringMethod = resolveMethod(definition, options);

  // Step 2: rules and groups
  const ruleOutcomes = activeRules(definition.rules).map((rule) => evaluateRule(rule, snapshot));
  const groupResults = sortByOrder(definition.groups.filter((g) => g.isActive)).map((group) =>
    evaluateGroup(group, snapshot)
  );

  const ruleResults: RuleTrace[] = [
    ...ruleOutcomes.map((o) => o.trace),
    ...groupResults.flatMap((g) => g.rules),
  ];
  const failedRules = ruleResults.filter((t) => !t.passed && !t.skipped).map((t) => t.ruleKey);

  // Step 3: score
  const items: ScoredItem[] = [
    ...ruleOutcomes
      .filter((o) => !o.trace.skipped)
      .map((o) => ({ id: o.trace.ruleKey, passed: o.passed, weight: o.trace.weight, contribution: o.contribution })),
    ...groupResults.map((g) => ({ id: g.groupKey, passed: g.passed, weight: g.weight, contribution: g.contribution })),
  ];

  const base = {
    criteriaId: definition.id,
    criteriaSlug: definition.slug,
    version: definition.version ?? null,
    threshold,
    scoringMethod,
    ruleResults,
    groupResults,
    failedRules,
  };

  if (items.length === 0) {
    const result = freezeResult({
      ...base,
      passed: true,
      score: MAX_SCORE,
      decision: NO_RULES_DECISION,
      groupCombinationPassed: null,
      evaluatedAt: now().toISOString(),
      executionTimeMs: elapsed(started),
    });
    log.debug({ criteriaId: definition.id }, "No rules to evaluate");
    return result;
  }

  const score = calculateScore(scoringMethod, items);

  // Step 4: threshold and group gate
  const groupCombinationPassed = combineGroups(definition, groupResults);
  const passed = isPassing(score, threshold) && groupCombinationPassed !== false;

  // Step 5: decision
  const decisions = options.decisions ?? config.decisions;
  const decision = pickDecision(passed, score, {
    pass: decisions.pass,
    fail: decisions.fail,
    tiers: definition.decisionThresholds,
    random: options.random,
  });

  const result = freezeResult({
    ...base,
    passed,
    score,
    decision,
    groupCombinationPassed,
    evaluatedAt: now().toISOString(),
    executionTimeMs: elapsed(started),
  });

  log.debug(
    { criteriaId: definition.id, passed, score, failed: failedRules.length },
    "Evaluation completed"
  );
  return result;
}

function elapsed(started: number): number {
  return Math.round((performance.now() - started) * 1000) / 1000;
}
