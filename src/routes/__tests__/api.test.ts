import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server';
import { AuditLogger } from '../../audit';
import { EvaluationCache } from '../../cache';
import { createAdapter, ensureSchema, type SqliteAdapter } from '../../db';
import { createDefaultRegistry } from '../../extraction';
import { EligibilityService } from '../../service';
import { createStores } from '../../store';

/* ============= Helpers ============= */

let db: SqliteAdapter;
let app: FastifyInstance;

const loanBody = {
  name: 'Loan Approval',
  passThreshold: 60,
  rules: [
    { field: 'income', operator: '>=', value: 3000, weight: 40 },
    { field: 'credit_score', operator: '>=', value: 650, weight: 60 },
  ],
};

const strong = { income: 4000, credit_score: 700 };

beforeEach(async () => {
  db = createAdapter(':memory:');
  await ensureSchema(db);
  const stores = createStores(db);
  const audit = new AuditLogger(stores.audit, { enabled: true, events: [] });
  const service = new EligibilityService({
    stores,
    audit,
    cache: new EvaluationCache({ enabled: true, ttlSeconds: 600 }),
    registry: createDefaultRegistry(),
    random: () => 0,
  });
  app = await buildServer({ db, service, audit });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  await db.close();
});

async function createLoan() {
  const res = await app.inject({ method: 'POST', url: '/criteria', payload: loanBody });
  expect(res.statusCode).toBe(201);
  return res.json();
}

/* ============= Health ============= */

describe('health', () => {
  it('reports the database as up and echoes the request id', async () => {
    const res = await app.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'req-test' } });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('healthy');
    expect(res.json().database.status).toBe('up');
    expect(res.headers['x-request-id']).toBe('req-test');
  });
});

/* ============= Criteria ============= */

describe('criteria routes', () => {
  it('creates, reads and lists criteria', async () => {
    const created = await createLoan();
    expect(created.slug).toBe('loan-approval');
    expect(created.definition.rules).toHaveLength(2);

    const byId = await app.inject({ method: 'GET', url: `/criteria/${created.id}` });
    expect(byId.json().name).toBe('Loan Approval');

    const list = await app.inject({ method: 'GET', url: '/criteria?active=true' });
    expect(list.json().total).toBe(1);

    const inactive = await app.inject({ method: 'GET', url: '/criteria?active=false' });
    expect(inactive.json().total).toBe(0);
  });

  it('validates the create body', async () => {
    const missing = await app.inject({ method: 'POST', url: '/criteria', payload: { rules: [] } });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().error).toBe('missing_required_fields');

    const badOperator = await app.inject({
      method: 'POST',
      url: '/criteria',
      payload: { name: 'Broken', rules: [{ field: 'age', operator: 'roughly', value: 1 }] },
    });
    expect(badOperator.statusCode).toBe(400);
    expect(badOperator.json().error).toBe('invalid_criteria');
    expect(badOperator.json().path).toBe('rules[0].operator');
  });

  it('rejects a duplicate slug', async () => {
    await createLoan();
    const res = await app.inject({ method: 'POST', url: '/criteria', payload: loanBody });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'invalid_criteria',
      message: 'Criteria "loan-approval" already exists (at slug)',
      path: 'slug',
    });
  });

  it('returns 404 for unknown criteria', async () => {
    const res = await app.inject({ method: 'GET', url: '/criteria/missing' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'not_found', message: 'Criteria not found: missing' });
  });

  it('updates attributes and decision tiers', async () => {
    await createLoan();
    const res = await app.inject({
      method: 'PATCH',
      url: '/criteria/loan-approval',
      payload: { passThreshold: 70, decisionThresholds: { '50': 'Review', '90': 'Fast Track' } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().passThreshold).toBe(70);
    expect(res.json().decisionThresholds).toEqual([
      { minScore: 90, label: 'Fast Track' },
      { minScore: 50, label: 'Review' },
    ]);

    const evaluated = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/evaluate',
      payload: { data: { income: 1000, credit_score: 700 } },
    });
    expect(evaluated.json()).toMatchObject({ score: 60, passed: false, decision: 'Review' });
  });

  it('rejects an unknown scoring method', async () => {
    await createLoan();
    const res = await app.inject({ method: 'PATCH', url: '/criteria/loan-approval', payload: { scoringMethod: 'median' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().path).toBe('scoringMethod');
  });

  it('deactivates and deletes', async () => {
    await createLoan();
    const off = await app.inject({ method: 'POST', url: '/criteria/loan-approval/deactivate' });
    expect(off.json().isActive).toBe(false);

    const evaluated = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/evaluate',
      payload: { data: strong },
    });
    expect(evaluated.statusCode).toBe(404);

    const removed = await app.inject({ method: 'DELETE', url: '/criteria/loan-approval' });
    expect(removed.statusCode).toBe(204);
    expect((await app.inject({ method: 'GET', url: '/criteria/loan-approval' })).statusCode).toBe(404);
  });

  it('rejects malformed JSON', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/criteria',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('bad_request');
  });
});

/* ============= Rules ============= */

describe('rule routes', () => {
  it('adds, updates and removes a rule', async () => {
    await createLoan();
    const added = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/rules',
      payload: { field: 'age', operator: '>=', value: 18, priority: 'low' },
    });
    expect(added.statusCode).toBe(201);
    expect(added.json().key).toBe('age');
    expect(added.json().weight).toBe(25);

    const ruleId = added.json().id;
    const updated = await app.inject({
      method: 'PATCH',
      url: `/criteria/loan-approval/rules/${ruleId}`,
      payload: { operator: 'between', value: [18, 65] },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json().value).toEqual([18, 65]);

    const removed = await app.inject({ method: 'DELETE', url: `/criteria/loan-approval/rules/${ruleId}` });
    expect(removed.statusCode).toBe(204);

    const list = await app.inject({ method: 'GET', url: '/criteria/loan-approval/rules' });
    expect(list.json().rules.map((r: { key: string }) => r.key)).toEqual(['income', 'credit_score']);
  });

  it('requires field and operator', async () => {
    await createLoan();
    const res = await app.inject({ method: 'POST', url: '/criteria/loan-approval/rules', payload: { value: 1 } });
    expect(res.statusCode).toBe(400);
  });
});

/* ============= Evaluation ============= */

describe('evaluation routes', () => {
  it('evaluates plain input', async () => {
    await createLoan();
    const res = await app.inject({ method: 'POST', url: '/criteria/loan-approval/evaluate', payload: { data: strong } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ passed: true, score: 100, decision: 'Approved', failedRules: [] });
  });

  it('extracts through a registered mapping', async () => {
    await createLoan();
    const res = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/evaluate',
      payload: { data: { monthly_income: 4000, bureau_score: 600 }, sourceType: 'loan_applicant' },
    });
    expect(res.json().score).toBe(40);
    expect(res.json().failedRules).toEqual(['credit_score']);
  });

  it('requires data', async () => {
    await createLoan();
    const res = await app.inject({ method: 'POST', url: '/criteria/loan-approval/evaluate', payload: {} });
    expect(res.statusCode).toBe(400);
  });

  it('returns 422 for oversized input', async () => {
    await createLoan();
    const res = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/evaluate',
      payload: { data: { ...strong, note: 'x'.repeat(1001) } },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json().violations).toEqual([{ path: 'note', message: 'Value exceeds 1000 characters' }]);
  });

  it('evaluates batches and lists history', async () => {
    await createLoan();
    const batch = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/evaluate/batch',
      payload: { items: [strong, {}] },
    });
    expect(batch.statusCode).toBe(200);
    expect(batch.json()).toMatchObject({ totalEvaluated: 2, passed: 1, failed: 1, averageScore: 50 });

    const history = await app.inject({ method: 'GET', url: '/criteria/loan-approval/evaluations?passed=false' });
    expect(history.json().evaluations).toHaveLength(1);
    expect(history.json().evaluations[0].failedRules).toEqual(['income', 'credit_score']);

    const stats = await app.inject({ method: 'GET', url: '/criteria/loan-approval/evaluations/stats' });
    expect(stats.json()).toMatchObject({ total: 2, passed: 1, failed: 1, passRate: 50 });

    const empty = await app.inject({ method: 'POST', url: '/criteria/loan-approval/evaluate/batch', payload: { items: [] } });
    expect(empty.statusCode).toBe(400);
  });

  it('warms up, reports and flushes the cache', async () => {
    await createLoan();
    const warm = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/cache/warmup',
      payload: { items: [strong, { income: 1 }] },
    });
    expect(warm.json()).toEqual({ warmed: 2, total: 2 });

    const stats = await app.inject({ method: 'GET', url: '/cache/stats' });
    expect(stats.json()).toMatchObject({ enabled: true, size: 2 });

    const flushed = await app.inject({ method: 'DELETE', url: '/criteria/loan-approval/cache' });
    expect(flushed.json()).toEqual({ removed: 2 });
  });
});

/* ============= Versions ============= */

describe('version routes', () => {
  it('creates, reads and compares versions', async () => {
    await createLoan();
    const created = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/versions',
      payload: { description: 'Initial' },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json().version).toBe(1);

    const list = await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions' });
    expect(list.json().versions.map((v: { version: number }) => v.version)).toEqual([1]);
    expect(list.json().versions[0].description).toBe('Initial');

    const one = await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions/1' });
    expect(one.json().definition.version).toBe(1);

    const diff = await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions/compare?from=1&to=1' });
    expect(diff.json()).toEqual({ from: 1, to: 1, added: [], removed: [], modified: [] });

    const evaluated = await app.inject({
      method: 'POST',
      url: '/criteria/loan-approval/versions/1/evaluate',
      payload: { data: strong },
    });
    expect(evaluated.json().version).toBe(1);
  });

  it('validates version numbers', async () => {
    await createLoan();
    expect((await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions/abc' })).statusCode).toBe(400);
    expect((await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions/9' })).statusCode).toBe(404);
    expect(
      (await app.inject({ method: 'GET', url: '/criteria/loan-approval/versions/compare?from=1' })).statusCode
    ).toBe(400);
  });
});

/* ============= Presets ============= */

describe('preset routes', () => {
  it('lists presets and creates criteria from one', async () => {
    const list = await app.inject({ method: 'GET', url: '/presets' });
    expect(list.json().presets.map((p: { key: string }) => p.key)).toEqual([
      'loan_approval',
      'scholarship_eligibility',
      'job_application',
    ]);

    const created = await app.inject({
      method: 'POST',
      url: '/presets/scholarship_eligibility',
      payload: { passThreshold: 80 },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json().slug).toBe('scholarship-eligibility');
    expect(created.json().passThreshold).toBe(80);
    expect(created.json().definition.rules).toHaveLength(4);

    const custom = await app.inject({ method: 'POST', url: '/presets/loan_approval', payload: { slug: 'loan-preset' } });
    expect(custom.json().slug).toBe('loan-preset');
  });

  it('returns 404 and 400 for unknown presets', async () => {
    expect((await app.inject({ method: 'GET', url: '/presets/nope' })).statusCode).toBe(404);
    expect((await app.inject({ method: 'POST', url: '/presets/nope' })).statusCode).toBe(400);
  });
});

/* ============= Audit ============= */

describe('audit routes', () => {
  it('queries the trail', async () => {
    const created = await createLoan();
    await app.inject({ method: 'PATCH', url: '/criteria/loan-approval', payload: { passThreshold: 75 } });

    const all = await app.inject({ method: 'GET', url: '/audit?event=criteria_created' });
    expect(all.json().entries.map((e: { auditableId: string }) => e.auditableId)).toEqual([created.id]);

    const trail = await app.inject({ method: 'GET', url: '/criteria/loan-approval/audit' });
    expect(trail.json().entries.map((e: { event: string }) => e.event)).toEqual(['criteria_updated', 'criteria_created']);

    const stats = await app.inject({ method: 'GET', url: '/audit/stats?days=7' });
    expect(stats.json().eventBreakdown).toEqual({ criteria_created: 1, criteria_updated: 1 });

    const bad = await app.inject({ method: 'GET', url: '/audit?event=bogus' });
    expect(bad.statusCode).toBe(400);
  });
});
