import { describe, it, expect } from 'vitest';
import { evaluate } from '../evaluator';
import { explain } from '../explain';
import { validateCriteria } from '../validation';
import { ConfigurationError } from '../../errors';
import { Snapshot } from '../../snapshot';
import type { CriteriaDefinition, RuleDefinition, RuleGroupDefinition } from '../types';

/* ============= Helpers ============= */

const NOW = new Date('2026-03-01T12:00:00.000Z');

function makeRule(overrides: Partial<RuleDefinition>): RuleDefinition {
  return {
    id: 'rule_test',
    key: 'rule_test',
    field: 'score',
    operator: '>=',
    value: 0,
    weight: 1,
    order: 0,
    isActive: true,
    ...overrides,
  };
}

function makeGroup(overrides: Partial<RuleGroupDefinition>): RuleGroupDefinition {
  return {
    id: 'grp_test',
    key: 'grp_test',
    name: 'Test Group',
    logicType: 'all',
    minRequired: null,
    booleanExpression: null,
    weight: 10,
    order: 0,
    isActive: true,
    rules: [],
    ...overrides,
  };
}

function makeCriteria(overrides: Partial<CriteriaDefinition>): CriteriaDefinition {
  return {
    id: 'crit_test',
    name: 'Loan Approval',
    slug: 'loan-approval',
    passThreshold: 65,
    scoringMethod: 'weighted',
    rules: [],
    groups: [],
    ...overrides,
  };
}

const loanCriteria = makeCriteria({
  rules: [
    makeRule({ id: 'r_income', key: 'income', field: 'income', operator: '>=', value: 3000, weight: 40, order: 0 }),
    makeRule({ id: 'r_credit', key: 'credit', field: 'credit_score', operator: '>=', value: 650, weight: 60, order: 1 }),
  ],
});

const fixed = { random: () => 0, now: () => NOW };

/* ============= End to end ============= */

describe('evaluate', () => {
  it('passes an applicant meeting every rule with score 100', () => {
    const result = evaluate(loanCriteria, { income: 5000, credit_score: 750 }, fixed);
    expect(result.passed).toBe(true);
    expect(result.score).toBe(100);
    expect(result.failedRules).toEqual([]);
    expect(result.decision).toBe('Approved');
    expect(result.threshold).toBe(65);
    expect(result.scoringMethod).toBe('weighted');
    expect(result.evaluatedAt).toBe('2026-03-01T12:00:00.000Z');
  });

  it('fails an applicant meeting only the credit rule with score 60', () => {
    const result = evaluate(loanCriteria, { income: 2000, credit_score: 700 }, fixed);
    expect(result.passed).toBe(false);
    expect(result.score).toBe(60);
    expect(result.failedRules).toEqual(['income']);
    expect(result.decision).toBe('Rejected');
  });

  it('scores 40 and fails at threshold 65 when only the 40-weight rule passes', () => {
    const result = evaluate(loanCriteria, { income: 5000, credit_score: 600 }, fixed);
    expect(result.score).toBe(40);
    expect(result.passed).toBe(false);
    expect(result.failedRules).toEqual(['credit']);
  });

  it('accepts a Snapshot as input', () => {
    const result = evaluate(loanCriteria, new Snapshot({ income: 5000, credit_score: 800 }), fixed);
    expect(result.passed).toBe(true);
  });

  it('traces every rule in execution order', () => {
    const result = evaluate(loanCriteria, { income: 2000, credit_score: 700 }, fixed);
    expect(result.ruleResults.map((t) => [t.ruleKey, t.actual, t.passed, t.contribution])).toEqual([
      ['income', 2000, false, 0],
      ['credit', 700, true, 60],
    ]);
  });

  it('returns a frozen result', () => {
    const result = evaluate(loanCriteria, { income: 5000, credit_score: 750 }, fixed);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.ruleResults)).toBe(true);
    expect(Object.isFrozen(result.ruleResults[0])).toBe(true);
  });

  it('is deterministic apart from timing', () => {
    const a = evaluate(loanCriteria, { income: 2000, credit_score: 750 }, fixed);
    const b = evaluate(loanCriteria, { income: 2000, credit_score: 750 }, fixed);
    expect({ ...a, executionTimeMs: 0, ruleResults: [] }).toEqual({ ...b, executionTimeMs: 0, ruleResults: [] });
  });

  it('ignores inactive rules', () => {
    const criteria = makeCriteria({
      rules: [
        makeRule({ key: 'income', field: 'income', value: 3000, weight: 40 }),
        makeRule({ id: 'r2', key: 'credit', field: 'credit_score', value: 750, weight: 60, isActive: false }),
      ],
    });
    const result = evaluate(criteria, { income: 5000, credit_score: 0 }, fixed);
    expect(result.score).toBe(100);
    expect(result.ruleResults).toHaveLength(1);
  });
});

/* ============= Thresholds and methods ============= */

describe('evaluate - scoring options', () => {
  it('pass_fail gives 0 when any rule fails', () => {
    const criteria = { ...loanCriteria, scoringMethod: 'pass_fail' as const };
    const result = evaluate(criteria, { income: 5000, credit_score: 600 }, fixed);
    expect(result.score).toBe(0);
    expect(result.passed).toBe(false);
  });

  it('sum compares the raw total against the threshold', () => {
    const criteria = { ...loanCriteria, scoringMethod: 'sum' as const, passThreshold: 90 };
    const result = evaluate(criteria, { income: 5000, credit_score: 800 }, fixed);
    expect(result.score).toBe(100);
    expect(result.passed).toBe(true);
  });

  it('falls back to option and then configured defaults', () => {
    const criteria = { ...loanCriteria, passThreshold: null, scoringMethod: null };
    const fromOptions = evaluate(criteria, { income: 5000, credit_score: 600 }, { ...fixed, passThreshold: 30 });
    expect(fromOptions.threshold).toBe(30);
    expect(fromOptions.passed).toBe(true);

    const fromConfig = evaluate(criteria, { income: 5000, credit_score: 600 }, fixed);
    expect(fromConfig.threshold).toBe(65);
    expect(fromConfig.scoringMethod).toBe('weighted');
  });

  it('uses decision tiers when configured', () => {
    const criteria = {
      ...loanCriteria,
      decisionThresholds: [
        { minScore: 90, label: 'Fast Track' },
        { minScore: 50, label: 'Manual Review' },
      ],
    };
    expect(evaluate(criteria, { income: 5000, credit_score: 800 }, fixed).decision).toBe('Fast Track');
    expect(evaluate(criteria, { income: 1000, credit_score: 800 }, fixed).decision).toBe('Manual Review');
    expect(evaluate(criteria, { income: 5000, credit_score: 100 }, fixed).decision).toBe('Rejected');
  });

  it('uses custom decision wording', () => {
    const result = evaluate(loanCriteria, { income: 5000, credit_score: 800 }, {
      ...fixed,
      decisions: { pass: ['Welcome aboard'], fail: ['Not this time'] },
    });
    expect(result.decision).toBe('Welcome aboard');
  });
});

/* ============= Edge cases ============= */

describe('evaluate - edge cases', () => {
  it('passes with score 100 when there are no rules', () => {
    const result = evaluate(makeCriteria({}), {}, fixed);
    expect(result.passed).toBe(true);
    expect(result.score).toBe(100);
    expect(result.decision).toBe('No rules to evaluate');
    expect(result.groupCombinationPassed).toBeNull();
  });

  it('records a malformed regex on the trace and keeps evaluating', () => {
    const criteria = makeCriteria({
      rules: [
        makeRule({ id: 'r1', key: 'code', field: 'code', operator: 'regex', value: '/[bad/', weight: 50 }),
        makeRule({ id: 'r2', key: 'age', field: 'age', operator: 'between', value: [18, 65], weight: 50, order: 1 }),
      ],
    });
    const result = evaluate(criteria, { code: 'X1', age: 30 }, fixed);
    expect(result.score).toBe(50);
    expect(result.failedRules).toEqual(['code']);
    expect(result.ruleResults[0].error).toMatch(/Invalid regular expression/);
    expect(result.ruleResults[1].error).toBeNull();
  });

  it('rejects an unknown operator before any rule runs', () => {
    const bad: CriteriaDefinition = structuredClone(loanCriteria);
    Reflect.set(bad.rules[1], 'operator', 'like');
    expect(() => validateCriteria(bad)).toThrow(ConfigurationError);
    expect(() => evaluate(bad, { income: 5000 }, fixed)).toThrow(
      'Unknown operator "like" (at rules[1].operator)'
    );
  });

  it('rejects MIN greater than the group size', () => {
    const criteria = makeCriteria({
      groups: [makeGroup({ logicType: 'min', minRequired: 3, rules: [makeRule({ key: 'a' }), makeRule({ key: 'b' })] })],
    });
    expect(() => evaluate(criteria, {}, fixed)).toThrow('(at groups[0].minRequired)');
  });

  it('counts only active members against MIN', () => {
    const criteria = makeCriteria({
      groups: [
        makeGroup({
          logicType: 'min',
          minRequired: 2,
          rules: [makeRule({ id: 'a', key: 'a' }), makeRule({ id: 'b', key: 'b', isActive: false })],
        }),
      ],
    });
    expect(() => validateCriteria(criteria)).toThrow('MIN group requires 0 < minRequired <= 1, got 2 (at groups[0].minRequired)');
  });

  it('rejects duplicate rule keys across groups', () => {
    const criteria = makeCriteria({
      rules: [makeRule({ key: 'dup' })],
      groups: [makeGroup({ rules: [makeRule({ key: 'dup' })] })],
    });
    expect(() => evaluate(criteria, {}, fixed)).toThrow('Duplicate rule key "dup"');
  });

  it('rejects a threshold above 100 except for sum', () => {
    expect(() => evaluate({ ...loanCriteria, passThreshold: 150 }, {}, fixed)).toThrow('Pass threshold out of range: 150');
    expect(() =>
      evaluate({ ...loanCriteria, passThreshold: 150, scoringMethod: 'sum' }, {}, fixed)
    ).not.toThrow();
  });

  it('rejects a boolean group referencing an unknown rule', () => {
    const criteria = makeCriteria({
      groups: [makeGroup({ logicType: 'boolean', booleanExpression: 'a AND ghost', rules: [makeRule({ key: 'real' })] })],
    });
    expect(() => evaluate(criteria, {}, fixed)).toThrow('Boolean expression references unknown rule "ghost"');
  });

  it('does not see changes made to the definition after the call', () => {
    const criteria: CriteriaDefinition = structuredClone(loanCriteria);
    const result = evaluate(criteria, { income: 5000, credit_score: 800 }, fixed);
    criteria.rules[0].value = 999999;
    expect(result.ruleResults[0].expected).toBe(3000);
  });

  it('leaves skipped rules out of score and failures', () => {
    const criteria = makeCriteria({
      rules: [
        makeRule({ id: 'r1', key: 'income', field: 'income', value: 3000, weight: 50 }),
        makeRule({
          id: 'r2',
          key: 'spouse',
          field: 'spouse_income',
          value: 1000,
          weight: 50,
          order: 1,
          dependencies: [{ field: 'married', operator: '==', value: true }],
        }),
      ],
    });
    const result = evaluate(criteria, { income: 5000, married: false }, fixed);
    expect(result.score).toBe(100);
    expect(result.failedRules).toEqual([]);
    expect(result.ruleResults[1].skipped).toBe(true);
  });
});

/* ============= Groups ============= */

describe('evaluate - groups', () => {
  const identity = makeGroup({
    id: 'g_identity',
    key: 'identity',
    name: 'Identity',
    logicType: 'all',
    weight: 50,
    rules: [
      makeRule({ id: 'gr1', key: 'verified', field: 'verified', operator: '==', value: true }),
      makeRule({ id: 'gr2', key: 'adult', field: 'age', operator: '>=', value: 18, order: 1 }),
    ],
  });
  const finance = makeGroup({
    id: 'g_finance',
    key: 'finance',
    name: 'Finance',
    logicType: 'any',
    weight: 50,
    order: 1,
    rules: [
      makeRule({ id: 'gr3', key: 'salary', field: 'income', operator: '>=', value: 3000 }),
      makeRule({ id: 'gr4', key: 'savings', field: 'savings', operator: '>=', value: 10000, order: 1 }),
    ],
  });

  it('scores groups as weighted items', () => {
    const criteria = makeCriteria({ groups: [identity, finance] });
    const result = evaluate(criteria, { verified: true, age: 30, income: 1000, savings: 500 }, fixed);
    expect(result.score).toBe(50);
    expect(result.passed).toBe(false);
    expect(result.groupResults.map((g) => [g.groupKey, g.passed])).toEqual([
      ['identity', true],
      ['finance', false],
    ]);
    expect(result.failedRules).toEqual(['salary', 'savings']);
    expect(result.ruleResults.map((t) => t.groupId)).toEqual(['g_identity', 'g_identity', 'g_finance', 'g_finance']);
  });

  it('mixes standalone rules and groups', () => {
    const criteria = makeCriteria({
      rules: [makeRule({ id: 'r1', key: 'country', field: 'country', operator: 'in', value: ['MY', 'SG'], weight: 50 })],
      groups: [{ ...identity, weight: 50 }],
    });
    const result = evaluate(criteria, { country: 'US', verified: true, age: 30 }, fixed);
    expect(result.score).toBe(50);
    expect(result.failedRules).toEqual(['country']);
  });

  it('gates the result on all groups passing', () => {
    const criteria = makeCriteria({
      passThreshold: 40,
      groups: [identity, finance],
      groupCombination: { logic: 'all' },
    });
    const result = evaluate(criteria, { verified: true, age: 30, income: 1000, savings: 500 }, fixed);
    expect(result.score).toBe(50);
    expect(result.groupCombinationPassed).toBe(false);
    expect(result.passed).toBe(false);
  });

  it('gates the result on a boolean formula over groups', () => {
    const criteria = makeCriteria({
      passThreshold: 40,
      groups: [identity, finance],
      groupCombination: { logic: 'boolean', expression: 'identity AND NOT b' },
    });
    const result = evaluate(criteria, { verified: true, age: 30, income: 1000, savings: 500 }, fixed);
    expect(result.groupCombinationPassed).toBe(true);
    expect(result.passed).toBe(true);
  });

  it('rejects a group formula naming an unknown group', () => {
    const criteria = makeCriteria({
      groups: [identity],
      groupCombination: { logic: 'boolean', expression: 'identity OR employment' },
    });
    expect(() => evaluate(criteria, {}, fixed)).toThrow('Group expression references unknown group "employment"');
  });
});

/* ============= Explain ============= */

describe('explain', () => {
  it('lists what an evaluation will run', () => {
    const criteria = makeCriteria({
      rules: [
        makeRule({ id: 'r2', key: 'credit', field: 'credit_score', value: 750, order: 1 }),
        makeRule({ id: 'r1', key: 'income', field: 'income', value: 3000, order: 0 }),
        makeRule({ id: 'r3', key: 'off', field: 'x', isActive: false, order: 2 }),
      ],
      decisionThresholds: [
        { minScore: 50, label: 'Review' },
        { minScore: 90, label: 'Fast Track' },
      ],
    });
    const plan = explain(criteria);
    expect(plan.rules.map((r) => r.key)).toEqual(['income', 'credit']);
    expect(plan.rules[0].operatorLabel).toBe('Greater Than or Equal');
    expect(plan.decisionThresholds.map((t) => t.label)).toEqual(['Fast Track', 'Review']);
    expect(plan.passThreshold).toBe(65);
    expect(plan.groupCombination).toBeNull();
  });
});
