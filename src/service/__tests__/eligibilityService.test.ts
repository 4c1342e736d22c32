import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EligibilityService } from '../eligibilityService';
import { AuditLogger } from '../../audit';
import { EvaluationCache } from '../../cache';
import { CriteriaBuilder, type CriteriaInput } from '../../criteria';
import { createAdapter, ensureSchema, type SqliteAdapter } from '../../db';
import { ConfigurationError, CriteriaNotFoundError, InputValidationError } from '../../errors';
import { Snapshot } from '../../snapshot';
import { createStores, type Stores } from '../../store';

/* ============= Helpers ============= */

const NOW = new Date('2026-03-01T12:00:00.000Z');

let db: SqliteAdapter;
let stores: Stores;
let cache: EvaluationCache;
let audit: AuditLogger;
let service: EligibilityService;

const loanInput: CriteriaInput = {
  name: 'Loan Approval',
  passThreshold: 60,
  rules: [
    { field: 'income', operator: '>=', value: 3000, weight: 40 },
    { field: 'credit_score', operator: '>=', value: 650, weight: 60 },
  ],
};

const strong = { income: 4000, credit_score: 700 };
const weak = { income: 4000, credit_score: 600 };

beforeEach(async () => {
  db = createAdapter(':memory:');
  await ensureSchema(db);
  stores = createStores(db);
  cache = new EvaluationCache({ enabled: true, ttlSeconds: 600, maxEntries: 100 });
  audit = new AuditLogger(stores.audit, { enabled: true, events: [] });
  service = new EligibilityService({ stores, cache, audit, random: () => 0, now: () => NOW });
  await service.createCriteria(loanInput);
});

afterEach(async () => {
  await db.close();
});

async function ruleId(key: string): Promise<string> {
  const { definition } = await service.getCriteria('loan-approval');
  const rule = definition.rules.find((r) => r.key === key);
  if (!rule) throw new Error(`no rule ${key}`);
  return rule.id;
}

/* ============= Criteria ============= */

describe('criteria management', () => {
  it('creates from plain input and resolves by id, slug or name', async () => {
    const byName = await service.getCriteria('Loan Approval');
    expect(byName.slug).toBe('loan-approval');
    expect(byName.definition.rules.map((r) => r.key)).toEqual(['income', 'credit_score']);

    const byId = await service.getCriteria(byName.id);
    expect(byId.name).toBe('Loan Approval');

    const trail = await audit.trail({ type: 'criteria', id: byName.id });
    expect(trail.map((e) => e.event)).toEqual(['criteria_created']);
    expect(trail[0].context).toEqual({ ruleCount: 2, groupCount: 0 });
  });

  it('accepts a builder', async () => {
    const created = await service.createCriteria(new CriteriaBuilder('Age Check').addRule('age', '>=', 18));
    expect(created.definition.rules).toHaveLength(1);
    expect((await service.listCriteria()).map((c) => c.slug).sort()).toEqual(['age-check', 'loan-approval']);
  });

  it('rejects a duplicate slug', async () => {
    await expect(service.createCriteria(loanInput)).rejects.toThrow('Criteria "loan-approval" already exists');
  });

  it('updates attributes and audits the diff', async () => {
    const updated = await service.updateCriteria('loan-approval', { passThreshold: 70, category: 'finance' });
    expect(updated.passThreshold).toBe(70);
    expect(updated.definition.passThreshold).toBe(70);

    const [entry] = await audit.trail({ type: 'criteria', id: updated.id }, 1);
    expect(entry.event).toBe('criteria_updated');
    expect(entry.oldValues).toEqual({ passThreshold: 60, category: null });
    expect(entry.newValues).toEqual({ passThreshold: 70, category: 'finance' });
  });

  it('validates before writing', async () => {
    await expect(service.updateCriteria('loan-approval', { passThreshold: 150 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(
      service.updateCriteria('loan-approval', { groupCombination: { logic: 'boolean', expression: 'a AND' } })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect((await service.getCriteria('loan-approval')).passThreshold).toBe(60);
  });

  it('audits deactivation and refuses to evaluate inactive criteria', async () => {
    const criteria = await service.setActive('loan-approval', false);
    const trail = await audit.trail({ type: 'criteria', id: criteria.id });
    expect(trail.map((e) => e.event)).toEqual(['criteria_updated', 'criteria_deactivated', 'criteria_created']);

    await expect(service.evaluate('loan-approval', strong)).rejects.toBeInstanceOf(CriteriaNotFoundError);
  });

  it('deletes criteria and keeps the audit entry', async () => {
    const { id } = await service.getCriteria('loan-approval');
    await service.deleteCriteria(id);

    expect(await service.findCriteria(id)).toBeNull();
    await expect(service.evaluate(id, strong)).rejects.toThrow(`Criteria not found: ${id}`);
    expect((await audit.query({ event: 'criteria_deleted' })).map((e) => e.auditableId)).toEqual([id]);
  });
});

/* ============= Rules ============= */

describe('rule management', () => {
  it('adds, updates and removes rules', async () => {
    const added = await service.addRule('loan-approval', { field: 'age', operator: '>=', value: 18 });
    expect(added.key).toBe('age');
    expect(added.order).toBe(2);
    expect(added.weight).toBe(1);

    const result = await service.evaluate('loan-approval', { ...strong, age: 16 });
    expect(result.score).toBe(99.01);
    expect(result.failedRules).toEqual(['age']);

    const updated = await service.updateRule('loan-approval', added.id, { operator: 'between', value: [18, 65] });
    expect(updated.operator).toBe('between');
    expect(updated.value).toEqual([18, 65]);

    await service.removeRule('loan-approval', added.id);
    expect((await service.getCriteria('loan-approval')).definition.rules).toHaveLength(2);

    const trail = await audit.trail({ type: 'rule', id: added.id });
    expect(trail.map((e) => e.event)).toEqual(['rule_deleted', 'rule_updated', 'rule_created']);
  });

  it('rejects invalid rule updates', async () => {
    const id = await ruleId('income');
    await expect(service.updateRule('loan-approval', id, { operator: 'nope' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(service.updateRule('loan-approval', id, { operator: 'between' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(service.updateRule('loan-approval', 'missing', { weight: 5 })).rejects.toBeInstanceOf(
      CriteriaNotFoundError
    );
  });

  it('drops cached results when rules change', async () => {
    await service.evaluate('loan-approval', strong);
    expect(await service.isCached('loan-approval', strong)).toBe(true);

    await service.addRule('loan-approval', { field: 'age', operator: '>=', value: 18 });
    expect(await service.isCached('loan-approval', strong)).toBe(false);
  });

  it('refuses changes that leave a MIN group unsatisfiable', async () => {
    await service.createCriteria(
      new CriteriaBuilder('Two Of Two').addGroup('Checks', (g) => g.requireMin(2).addRule('a', '==', 1).addRule('b', '==', 1))
    );
    const { definition } = await service.getCriteria('two-of-two');
    const [first, second] = definition.groups[0].rules;

    await expect(service.updateRule('two-of-two', first.id, { isActive: false })).rejects.toThrow(
      'MIN group requires 0 < minRequired <= 1, got 2 (at groups[0].minRequired)'
    );
    await expect(service.removeRule('two-of-two', second.id)).rejects.toBeInstanceOf(ConfigurationError);

    const rules = await service.listRules('two-of-two');
    expect(rules.map((r) => r.isActive)).toEqual([true, true]);
    expect((await service.evaluate('two-of-two', { a: 1, b: 1 })).passed).toBe(true);
  });

  it('refuses to remove a rule a boolean group names', async () => {
    await service.createCriteria(
      new CriteriaBuilder('Formula Keys').addGroup('Checks', (g) =>
        g.requireLogic('income AND verified').addRule('income', '>=', 3000).addRule('verified', '==', true)
      )
    );
    const { definition } = await service.getCriteria('formula-keys');
    const verified = definition.groups[0].rules[1];

    await expect(service.removeRule('formula-keys', verified.id)).rejects.toThrow(
      'Boolean expression references unknown rule "verified"'
    );
    const deactivated = await service.updateRule('formula-keys', verified.id, { isActive: false });
    expect(deactivated.isActive).toBe(false);
    expect((await service.evaluate('formula-keys', { income: 5000, verified: true })).passed).toBe(false);
  });
});

/* ============= Stored definitions ============= */

describe('stored definitions', () => {
  it('resolves positional formula letters the same way as in memory', async () => {
    const builder = new CriteriaBuilder('Positional').addGroup('Checks', (g) =>
      g
        .requireLogic('a AND NOT b')
        .addRuleInput({ field: 'x', operator: '==', value: 1, isActive: false })
        .addRule('y', '==', 1)
        .addRule('z', '==', 1)
    );
    const input = { x: 0, y: 1, z: 0 };
    const inMemory = await builder.evaluate(input, { random: () => 0 });
    await service.createCriteria(builder);
    const stored = await service.evaluate('positional', input);

    expect(inMemory.passed).toBe(false);
    expect(inMemory.groupResults[0].passed).toBe(false);
    expect(stored.groupResults[0].passed).toBe(false);
    expect(stored.passed).toBe(inMemory.passed);
    expect(stored.score).toBe(inMemory.score);
  });

  it('keeps deactivated rules in the loaded definition', async () => {
    const id = await ruleId('income');
    await service.updateRule('loan-approval', id, { isActive: false });
    const { definition } = await service.getCriteria('loan-approval');
    expect(definition.rules.map((r) => [r.key, r.isActive])).toEqual([
      ['income', false],
      ['credit_score', true],
    ]);
    expect((await service.evaluate('loan-approval', { income: 0, credit_score: 700 })).score).toBe(100);
  });
});

/* ============= Evaluation ============= */

describe('evaluate', () => {
  it('scores, decides and persists', async () => {
    const pass = await service.evaluate('loan-approval', strong);
    expect(pass.passed).toBe(true);
    expect(pass.score).toBe(100);
    expect(pass.decision).toBe('Approved');
    expect(pass.evaluatedAt).toBe('2026-03-01T12:00:00.000Z');

    const fail = await service.evaluate('loan-approval', weak, { context: { channel: 'web' } });
    expect(fail.passed).toBe(false);
    expect(fail.score).toBe(40);
    expect(fail.decision).toBe('Rejected');
    expect(fail.failedRules).toEqual(['credit_score']);

    const history = await service.evaluations('loan-approval', { passed: false });
    expect(history).toHaveLength(1);
    expect(history[0].context).toEqual({ channel: 'web' });
    expect(history[0].snapshotHash).toBe(new Snapshot(weak).hash());

    expect(await service.evaluationStats('loan-approval')).toMatchObject({ total: 2, passed: 1, failed: 1 });
  });

  it('serves repeated input from the cache without persisting again', async () => {
    const first = await service.evaluate('loan-approval', strong);
    const second = await service.evaluate('loan-approval', new Snapshot(strong));

    expect(second).toBe(first);
    expect(service.cacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    expect(await service.evaluations('loan-approval')).toHaveLength(1);
  });

  it('bypasses the cache on request', async () => {
    await service.evaluate('loan-approval', strong);
    await service.evaluate('loan-approval', strong, { useCache: false, persist: false });
    expect(service.cacheStats()).toMatchObject({ hits: 0, misses: 1 });
    expect(await service.evaluations('loan-approval')).toHaveLength(1);
  });

  it('rejects oversized input before evaluating', async () => {
    await expect(service.evaluate('loan-approval', { ...strong, note: 'x'.repeat(1001) })).rejects.toBeInstanceOf(
      InputValidationError
    );
    expect(await service.evaluations('loan-approval')).toEqual([]);
  });

  it('fires workflow callbacks on every evaluation, cached or not', async () => {
    const seen: string[] = [];
    service.workflow.on('before_evaluation', () => {
      seen.push('before');
    });
    service.workflow.on('on_fail', (ctx) => {
      seen.push(`fail:${ctx.result?.score}`);
    });

    await service.evaluate('loan-approval', weak);
    await service.evaluate('loan-approval', weak);
    expect(seen).toEqual(['before', 'fail:40', 'before', 'fail:40']);
  });

  it('runs builder callbacks for that criteria only', async () => {
    const passes: number[] = [];
    const builder = new CriteriaBuilder('Adults').addRule('age', '>=', 18).onPass((ctx) => {
      passes.push(ctx.result?.score ?? -1);
    });
    await service.createCriteria(builder);

    await service.evaluate('adults', { age: 30 });
    await service.evaluate('loan-approval', strong);
    expect(passes).toEqual([100]);

    await service.deleteCriteria('adults');
    expect(service.workflow.count('on_pass')).toBe(0);
  });

  it('audits completed evaluations with sensitive fields redacted', async () => {
    const { id } = await service.getCriteria('loan-approval');
    await service.evaluate('loan-approval', { ...strong, password: 'test-secret' });

    const [entry] = await audit.query({ event: 'evaluation_completed' });
    expect(entry.auditableId).toBe(id);
    expect(entry.context).toMatchObject({
      criteriaName: 'Loan Approval',
      passed: true,
      score: 100,
      input: { income: 4000, credit_score: 700, password: '[REDACTED]' },
      warnings: [],
    });
  });
});

describe('evaluateBatch', () => {
  it('evaluates each item and reports failures in place', async () => {
    const badKey = 'x'.repeat(300);
    const batch = await service.evaluateBatch('loan-approval', [strong, { income: 1000, credit_score: 700 }, { [badKey]: 1 }]);

    expect(batch.totalEvaluated).toBe(3);
    expect(batch.passed).toBe(2);
    expect(batch.failed).toBe(1);
    expect(batch.averageScore).toBe(80);
    expect(batch.results.map((r) => r.score)).toEqual([100, 60, 0]);

    const broken = batch.results[2];
    expect(broken.result).toBeNull();
    expect(broken.error).toBe(`Input validation failed: ${'x'.repeat(32)}...: Field name exceeds 255 characters`);
    expect(broken.snapshotHash).toBe(new Snapshot({ [badKey]: 1 }).hash());
  });

  it('averages to zero when nothing evaluates', async () => {
    const batch = await service.evaluateBatch('loan-approval', []);
    expect(batch).toEqual({ results: [], totalEvaluated: 0, passed: 0, failed: 0, averageScore: 0 });
  });
});

/* ============= Cache ============= */

describe('cache helpers', () => {
  it('warms up without persisting', async () => {
    expect(await service.warmupCache('loan-approval', [strong, weak, { note: 'x'.repeat(1001) }])).toBe(2);
    expect(await service.isCached('loan-approval', weak)).toBe(true);
    expect(await service.evaluations('loan-approval')).toEqual([]);
  });

  it('flushes one criteria or everything', async () => {
    await service.evaluate('loan-approval', strong);
    await service.evaluate('loan-approval', weak);
    expect(await service.flushCache('loan-approval')).toBe(2);

    await service.evaluate('loan-approval', strong);
    expect(await service.flushCache()).toBe(1);
    expect(service.cacheStats()).toMatchObject({ size: 0, hits: 0, misses: 0 });
  });

  it('reports nothing cached without a cache', async () => {
    const uncached = new EligibilityService({ stores, random: () => 0, now: () => NOW });
    await uncached.evaluate('loan-approval', strong);
    expect(await uncached.isCached('loan-approval', strong)).toBe(false);
    expect(uncached.cacheStats()).toBeNull();
    expect(await uncached.evaluations('loan-approval')).toHaveLength(1);
  });
});

/* ============= Versions ============= */

describe('versions', () => {
  it('freezes, compares and evaluates versions', async () => {
    const v1 = await service.createVersion('loan-approval', 'Initial');
    expect(v1.version).toBe(1);
    expect((await service.getCriteria('loan-approval')).currentVersion).toBe(1);

    await service.updateRule('loan-approval', await ruleId('credit_score'), { value: 700 });
    await service.createVersion('loan-approval');

    expect(await service.versionNumbers('loan-approval')).toEqual([1, 2]);
    expect(await service.hasVersion('loan-approval', 3)).toBe(false);
    expect((await service.latestVersion('loan-approval'))?.version).toBe(2);

    expect(await service.compareVersions('loan-approval', 1, 2)).toEqual({
      from: 1,
      to: 2,
      added: [],
      removed: [],
      modified: [{ key: 'credit_score', changes: { value: { from: 650, to: 700 } } }],
    });

    const input = { income: 4000, credit_score: 680 };
    const old = await service.evaluateVersion('loan-approval', 1, input);
    expect(old.version).toBe(1);
    expect(old.score).toBe(100);

    const current = await service.evaluate('loan-approval', input);
    expect(current.version).toBe(2);
    expect(current.score).toBe(40);

    const history = await service.evaluations('loan-approval');
    expect(history.map((e) => e.criteriaVersion).sort()).toEqual([1, 2]);
  });

  it('reports missing versions', async () => {
    await expect(service.compareVersions('loan-approval', 1, 2)).rejects.toBeInstanceOf(CriteriaNotFoundError);
    expect(await service.getVersion('loan-approval', 1)).toBeNull();
  });
});
