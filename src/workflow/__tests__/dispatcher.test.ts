import { describe, it, expect, vi } from 'vitest';
import { WorkflowDispatcher, conditionHolds } from '../dispatcher';
import { WorkflowCallbackError } from '../../errors';
import type { EvaluationResult } from '../../engine';
import type { WorkflowContext } from '../types';

/* ============= Helpers ============= */

function makeResult(overrides: Partial<EvaluationResult>): EvaluationResult {
  return {
    criteriaId: 'crit_test',
    criteriaSlug: 'loan-approval',
    version: null,
    passed: true,
    score: 70,
    threshold: 65,
    scoringMethod: 'weighted',
    decision: 'Approved',
    ruleResults: [],
    groupResults: [],
    failedRules: [],
    groupCombinationPassed: null,
    evaluatedAt: '2026-03-01T00:00:00.000Z',
    executionTimeMs: 0,
    ...overrides,
  };
}

function quiet(): WorkflowDispatcher {
  return new WorkflowDispatcher({ logCallbackErrors: false, failOnCallbackError: false });
}

/* ============= Lifecycle ============= */

describe('WorkflowDispatcher lifecycle', () => {
  it('fires before_evaluation with no result', async () => {
    const seen: Array<WorkflowContext['result']> = [];
    const dispatcher = quiet().on('before_evaluation', (ctx) => {
      seen.push(ctx.result);
    });
    const report = await dispatcher.before('crit_test', { income: 5000 });
    expect(seen).toEqual([null]);
    expect(report.events).toEqual(['before_evaluation']);
    expect(report.executed).toBe(1);
  });

  it('fires after, pass and excellent for a high passing score', async () => {
    const calls: string[] = [];
    const dispatcher = quiet()
      .on('after_evaluation', () => { calls.push('after'); })
      .on('on_pass', () => { calls.push('pass'); })
      .on('on_fail', () => { calls.push('fail'); })
      .on('on_excellent', () => { calls.push('excellent'); })
      .on('on_good', () => { calls.push('good'); });

    await dispatcher.after(makeResult({ score: 95 }), {});
    expect(calls).toEqual(['after', 'pass', 'excellent']);
  });

  it('fires good for scores from 80 up to excellent', async () => {
    const calls: string[] = [];
    const dispatcher = quiet()
      .on('on_excellent', () => { calls.push('excellent'); })
      .on('on_good', () => { calls.push('good'); });

    await dispatcher.after(makeResult({ score: 80 }), {});
    await dispatcher.after(makeResult({ score: 89.99 }), {});
    await dispatcher.after(makeResult({ score: 79 }), {});
    expect(calls).toEqual(['good', 'good']);
  });

  it('fires fail and never the score tiers for a failed result', async () => {
    const calls: string[] = [];
    const dispatcher = quiet()
      .on('on_fail', () => { calls.push('fail'); })
      .on('on_excellent', () => { calls.push('excellent'); });

    const report = await dispatcher.after(makeResult({ passed: false, score: 95 }), {});
    expect(calls).toEqual(['fail']);
    expect(report.events).toEqual(['on_fail']);
  });

  it('awaits async callbacks in registration order', async () => {
    const calls: number[] = [];
    const dispatcher = quiet()
      .on('on_pass', async () => {
        await Promise.resolve();
        calls.push(1);
      })
      .on('on_pass', () => { calls.push(2); });

    await dispatcher.after(makeResult({}), {});
    expect(calls).toEqual([1, 2]);
  });
});

/* ============= Conditions ============= */

describe('conditional callbacks', () => {
  it('fires score range callbacks inclusively', async () => {
    const cb = vi.fn();
    const dispatcher = quiet().onScoreRange(60, 70, cb);
    await dispatcher.after(makeResult({ score: 70 }), {});
    await dispatcher.after(makeResult({ score: 71 }), {});
    expect(cb).toHaveBeenCalledTimes(1);
  });

  it('checks every key of a condition', () => {
    const ctx: WorkflowContext = {
      criteriaId: 'crit_test',
      data: { country: 'MY' },
      result: makeResult({ score: 72, passed: true, failedRules: ['credit'] }),
    };
    expect(conditionHolds({ minScore: 70, maxScore: 80, passed: true }, ctx)).toBe(true);
    expect(conditionHolds({ failedRulesCount: 1 }, ctx)).toBe(true);
    expect(conditionHolds({ failedRulesCount: 0 }, ctx)).toBe(false);
    expect(conditionHolds({ fieldEquals: ['country', 'MY'] }, ctx)).toBe(true);
    expect(conditionHolds({ fieldEquals: ['country', 'SG'] }, ctx)).toBe(false);
    expect(conditionHolds({ custom: (c) => c.result?.decision === 'Approved' }, ctx)).toBe(true);
    expect(conditionHolds({ minScore: 73 }, ctx)).toBe(false);
  });

  it('never matches without a result', () => {
    expect(conditionHolds({}, { criteriaId: 'crit_test', data: {}, result: null })).toBe(false);
  });
});

/* ============= Errors ============= */

describe('callback errors', () => {
  it('collects errors and keeps running the rest', async () => {
    const after = vi.fn();
    const dispatcher = quiet()
      .on('on_pass', () => {
        throw new Error('webhook down');
      }, null, 'notify')
      .on('on_pass', after);

    const report = await dispatcher.after(makeResult({}), {});
    expect(after).toHaveBeenCalledTimes(1);
    expect(report.executed).toBe(1);
    expect(report.errors).toEqual([{ event: 'on_pass', label: 'notify', message: 'webhook down' }]);
  });

  it('rethrows as WorkflowCallbackError when configured', async () => {
    const dispatcher = new WorkflowDispatcher({ logCallbackErrors: false, failOnCallbackError: true }).on(
      'on_fail',
      () => {
        throw new Error('boom');
      }
    );
    await expect(dispatcher.after(makeResult({ passed: false }), {})).rejects.toThrow(WorkflowCallbackError);
    await expect(dispatcher.after(makeResult({ passed: false }), {})).rejects.toThrow(
      'Workflow callback "on_fail#1" failed: boom'
    );
  });
});

/* ============= Registry ============= */

describe('registration', () => {
  it('counts, copies and clears callbacks', () => {
    const source = quiet().on('on_pass', () => {}).onCondition({ passed: false }, () => {});
    const target = quiet();
    source.copyTo(target);
    expect(target.count()).toBe(2);
    expect(target.count('on_condition')).toBe(1);
    target.clear('on_pass');
    expect(target.count()).toBe(1);
    target.clear();
    expect(target.count()).toBe(0);
  });

  it('scopes copied callbacks to one criteria', async () => {
    const calls: string[] = [];
    const source = quiet().on('on_pass', (ctx) => {
      calls.push(ctx.criteriaId);
    });
    const target = quiet().on('on_pass', () => {
      calls.push('global');
    });
    source.copyTo(target, 'crit_scoped');

    await target.after(makeResult({ criteriaId: 'crit_other' }), {});
    await target.after(makeResult({ criteriaId: 'crit_scoped' }), {});
    expect(calls).toEqual(['global', 'global', 'crit_scoped']);

    expect(target.forgetCriteria('crit_scoped')).toBe(1);
    expect(target.count('on_pass')).toBe(1);
  });

  it('reports no event when only other criteria have callbacks', async () => {
    const target = quiet();
    quiet().on('on_pass', () => {}).copyTo(target, 'crit_scoped');
    const report = await target.after(makeResult({ criteriaId: 'crit_other' }), {});
    expect(report.events).toEqual([]);
    expect(report.executed).toBe(0);
  });
});
