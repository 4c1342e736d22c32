// src/service/eligibilityService.ts
// Stored criteria management and evaluation.
//
// Evaluate path:
//   resolve criteria -> snapshot -> input checks -> before callbacks ->
//   cache lookup | (engine -> persist -> audit -> cache) -> after callbacks
//
// Every write that changes what a criteria evaluates to drops its cached
// results.

import type { AuditLogger, AuditSubject } from "../audit";
import type { CacheStats, EvaluationCache } from "../cache";
import {
  CriteriaBuilder,
  builderFromInput,
  compareVersions,
  evaluateVersion,
  nextVersionNumber,
  resolveWeight,
  slugify,
  snapshotDefinition,
  toRuleDefinition,
  toRuleDependencies,
  toRuleValue,
  type CriteriaDraft,
  type CriteriaInput,
  type CriteriaVersion,
  type RuleInput,
  type RulePriority,
  type VersionDiff,
} from "../criteria";
import {
  evaluate,
  parseOperator,
  roundScore,
  validateCriteria,
  type CriteriaDefinition,
  type EvaluationResult,
  type RuleDefinition,
} from "../engine";
import { ConfigurationError, CriteriaNotFoundError, errorMessage } from "../errors";
import type { MappingRegistry } from "../extraction";
import { createLogger } from "../observability";
import { Snapshot, toSnapshotObject } from "../snapshot";
import type {
  Criteria,
  EvaluationRecord,
  EvaluationStats,
  ListCriteriaOptions,
  ListEvaluationsOptions,
  Stores,
  StoredRule,
  UpdateCriteriaInput,
  UpdateRuleInput,
} from "../store";
import { WorkflowDispatcher } from "../workflow";
import { validateInput } from "./inputValidation";

const log = createLogger("service");

/* ---------- Types ---------- */

export type EvaluationInput = Snapshot | Record<string, unknown>;

export interface EligibilityServiceDeps {
  stores: Stores;
  cache?: EvaluationCache | null;
  audit?: AuditLogger | null;
  registry?: MappingRegistry | null;
  workflow?: WorkflowDispatcher;
  random?: () => number;
  now?: () => Date;
}

export interface EvaluateRequestOptions {
  /** Extract through the registry mapping for this source type */
  sourceType?: string;
  /** Store the result in evaluation history (default true) */
  persist?: boolean;
  /** Defaults to the cache's own enabled flag */
  useCache?: boolean;
  /** Kept with the evaluation record and audit entry */
  context?: Record<string, unknown>;
}

export interface BatchItem {
  index: number;
  snapshotHash: string | null;
  passed: boolean;
  score: number;
  result: EvaluationResult | null;
  error: string | null;
}

export interface BatchResult {
  results: BatchItem[];
  totalEvaluated: number;
  passed: number;
  failed: number;
  averageScore: number;
}

export interface RulePatch {
  field?: string;
  operator?: string;
  value?: unknown;
  weight?: number | null;
  priority?: RulePriority | null;
  order?: number;
  isActive?: boolean;
  dependencies?: RuleInput["dependencies"];
  meta?: Record<string, unknown>;
}

export interface CriteriaDetails extends Criteria {
  definition: CriteriaDefinition;
}

const criteriaSubject = (id: string): AuditSubject => ({ type: "criteria", id });
const ruleSubject = (id: string): AuditSubject => ({ type: "rule", id });

/** Attributes compared for criteria_updated entries */
function auditedAttributes(c: Criteria): Record<string, unknown> {
  return {
    name: c.name,
    description: c.description,
    isActive: c.isActive,
    type: c.type,
    group: c.group,
    category: c.category,
    tags: c.tags,
    meta: c.meta,
    passThreshold: c.passThreshold,
    scoringMethod: c.scoringMethod,
    decisionThresholds: c.decisionThresholds,
    groupCombination: c.groupCombination,
  };
}

function ruleAttributes(r: StoredRule): Record<string, unknown> {
  return {
    key: r.key,
    field: r.field,
    operator: r.operator,
    value: r.value,
    weight: r.weight,
    order: r.order,
    isActive: r.isActive,
    dependencies: r.dependencies ?? [],
  };
}

function findRule(definition: CriteriaDefinition, ruleId: string): RuleDefinition | undefined {
  return [...definition.rules, ...definition.groups.flatMap((g) => g.rules)].find((r) => r.id === ruleId);
}

/** The definition with one rule swapped out, or dropped when `next` is null */
function replaceRule(definition: CriteriaDefinition, ruleId: string, next: RuleDefinition | null): CriteriaDefinition {
  const swap = (rules: RuleDefinition[]) => rules.flatMap((r) => (r.id !== ruleId ? [r] : next ? [next] : []));
  return {
    ...definition,
    rules: swap(definition.rules),
    groups: definition.groups.map((g) => ({ ...g, rules: swap(g.rules) })),
  };
}

/* ---------- Service ---------- */

export class EligibilityService {
  readonly workflow: WorkflowDispatcher;

  private readonly stores: Stores;
  private readonly cache: EvaluationCache | null;
  private readonly audit: AuditLogger | null;
  private readonly registry: MappingRegistry | null;
  private readonly random: (() => number) | undefined;
  private readonly now: (() => Date) | undefined;

  constructor(deps: EligibilityServiceDeps) {
    this.stores = deps.stores;
    this.cache = deps.cache ?? null;
    this.audit = deps.audit ?? null;
    this.registry = deps.registry ?? null;
    this.workflow = deps.workflow ?? new WorkflowDispatcher();
    this.random = deps.random;
    this.now = deps.now;
  }

  /* ---------- Criteria ---------- */

  /** Persist a builder, a built draft or a plain criteria description */
  async createCriteria(input: CriteriaBuilder | CriteriaDraft | CriteriaInput): Promise<CriteriaDetails> {
    const draft =
      input instanceof CriteriaBuilder ? input.build() : "definition" in input ? input : builderFromInput(input).build();

    if (await this.stores.criteria.getBySlug(draft.slug)) {
      throw new ConfigurationError(`Criteria "${draft.slug}" already exists`, "slug");
    }

    const created = await this.stores.criteria.create(draft);
    if (input instanceof CriteriaBuilder) input.workflow.copyTo(this.workflow, created.id);
    await this.audit?.record("criteria_created", criteriaSubject(created.id), {
      after: auditedAttributes(created),
      context: { ruleCount: draft.definition.rules.length, groupCount: draft.definition.groups.length },
    });
    log.info({ criteriaId: created.id, slug: created.slug }, "Criteria created");
    return this.details(created);
  }

  /** By id, or by slug (names are slugged first) */
  async findCriteria(identifier: string): Promise<Criteria | null> {
    return (
      (await this.stores.criteria.getById(identifier)) ?? (await this.stores.criteria.getBySlug(slugify(identifier)))
    );
  }

  async getCriteria(identifier: string): Promise<CriteriaDetails> {
    return this.details(await this.requireCriteria(identifier));
  }

  listCriteria(opts: ListCriteriaOptions = {}): Promise<Criteria[]> {
    return this.stores.criteria.list(opts);
  }

  /**
   * Update attributes. The merged definition is validated before anything
   * is written.
   */
  async updateCriteria(identifier: string, updates: UpdateCriteriaInput): Promise<CriteriaDetails> {
    const before = await this.requireCriteria(identifier);
    const definition = await this.requireDefinition(before.id);

    const method = updates.scoringMethod !== undefined ? updates.scoringMethod : before.scoringMethod;
    const threshold = updates.passThreshold !== undefined ? updates.passThreshold : before.passThreshold;
    if (threshold !== null && (!Number.isFinite(threshold) || threshold < 0 || (threshold > 100 && method !== "sum"))) {
      throw new ConfigurationError(`Pass threshold out of range: ${threshold}`, "passThreshold");
    }

    const patch: UpdateCriteriaInput = { ...updates };
    if (updates.decisionThresholds) {
      patch.decisionThresholds = [...updates.decisionThresholds].sort((a, b) => b.minScore - a.minScore);
    }

    validateCriteria({
      ...definition,
      passThreshold: threshold,
      scoringMethod: method,
      decisionThresholds: patch.decisionThresholds ?? definition.decisionThresholds,
      groupCombination: patch.groupCombination !== undefined ? patch.groupCombination : definition.groupCombination,
    });

    const after = await this.stores.criteria.update(before.id, patch);
    if (!after) throw new CriteriaNotFoundError(identifier);
    this.cache?.forget(before.id);

    if (before.isActive !== after.isActive) {
      await this.audit?.record(after.isActive ? "criteria_activated" : "criteria_deactivated", criteriaSubject(after.id));
    }
    await this.audit?.record("criteria_updated", criteriaSubject(after.id), {
      before: auditedAttributes(before),
      after: auditedAttributes(after),
    });
    return this.details(after);
  }

  setActive(identifier: string, active: boolean): Promise<CriteriaDetails> {
    return this.updateCriteria(identifier, { isActive: active });
  }

  async deleteCriteria(identifier: string): Promise<void> {
    const criteria = await this.requireCriteria(identifier);
    await this.stores.criteria.delete(criteria.id);
    this.cache?.forget(criteria.id);
    this.workflow.forgetCriteria(criteria.id);
    await this.audit?.record("criteria_deleted", criteriaSubject(criteria.id), {
      before: auditedAttributes(criteria),
      context: { slug: criteria.slug },
    });
    log.info({ criteriaId: criteria.id }, "Criteria deleted");
  }

  /* ---------- Rules ---------- */

  async listRules(identifier: string): Promise<StoredRule[]> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.criteria.listRules(criteria.id);
  }

  async addRule(identifier: string, input: RuleInput): Promise<StoredRule> {
    const criteria = await this.requireCriteria(identifier);
    const order = await this.stores.criteria.nextRuleOrder(criteria.id);
    const taken = new Set(await this.stores.criteria.ruleKeys(criteria.id));
    const rule = toRuleDefinition(input, order, taken, "rule");

    const created = await this.stores.criteria.addRule(criteria.id, rule);
    this.cache?.forget(criteria.id);
    await this.audit?.record("rule_created", ruleSubject(created.id), {
      after: ruleAttributes(created),
      context: { criteriaId: criteria.id },
    });
    return created;
  }

  /** Operator, value and weight are re-checked together */
  async updateRule(identifier: string, ruleId: string, patch: RulePatch): Promise<StoredRule> {
    const criteria = await this.requireCriteria(identifier);
    const existing = await this.stores.criteria.getRule(criteria.id, ruleId);
    if (!existing) throw new CriteriaNotFoundError(`${criteria.id}/rules/${ruleId}`);

    const updates: UpdateRuleInput = {};
    if (patch.field !== undefined) {
      if (typeof patch.field !== "string" || patch.field.trim() === "") {
        throw new ConfigurationError("Rule field must be a non-empty string", "rule.field");
      }
      updates.field = patch.field.trim();
    }

    const operator = patch.operator !== undefined ? parseOperator(patch.operator, "rule.operator") : existing.operator;
    if (patch.operator !== undefined || patch.value !== undefined) {
      updates.operator = operator;
      updates.value = toRuleValue(operator, patch.value !== undefined ? patch.value : existing.value, "rule.value");
    }
    if (patch.weight !== undefined || patch.priority !== undefined) {
      updates.weight = resolveWeight(patch.weight, patch.priority, "rule.weight");
    }
    if (patch.order !== undefined) updates.order = patch.order;
    if (patch.isActive !== undefined) updates.isActive = patch.isActive;
    if (patch.dependencies !== undefined) updates.dependencies = toRuleDependencies(patch.dependencies, "rule");
    if (patch.meta !== undefined) updates.meta = patch.meta;

    const definition = await this.requireDefinition(criteria.id);
    const current = findRule(definition, ruleId);
    if (current) validateCriteria(replaceRule(definition, ruleId, { ...current, ...updates }));

    const updated = await this.stores.criteria.updateRule(criteria.id, ruleId, updates);
    if (!updated) throw new CriteriaNotFoundError(`${criteria.id}/rules/${ruleId}`);
    this.cache?.forget(criteria.id);
    await this.audit?.record("rule_updated", ruleSubject(ruleId), {
      before: ruleAttributes(existing),
      after: ruleAttributes(updated),
      context: { criteriaId: criteria.id },
    });
    return updated;
  }

  async removeRule(identifier: string, ruleId: string): Promise<void> {
    const criteria = await this.requireCriteria(identifier);
    const existing = await this.stores.criteria.getRule(criteria.id, ruleId);
    if (!existing) throw new CriteriaNotFoundError(`${criteria.id}/rules/${ruleId}`);

    validateCriteria(replaceRule(await this.requireDefinition(criteria.id), ruleId, null));

    await this.stores.criteria.removeRule(criteria.id, ruleId);
    this.cache?.forget(criteria.id);
    await this.audit?.record("rule_deleted", ruleSubject(ruleId), {
      before: ruleAttributes(existing),
      context: { criteriaId: criteria.id },
    });
  }

  /* ---------- Evaluation ---------- */

  /**
   * Evaluate input against an active stored criteria.
   * @throws CriteriaNotFoundError, InputValidationError, ConfigurationError
   */
  async evaluate(
    identifier: string,
    input: EvaluationInput,
    options: EvaluateRequestOptions = {}
  ): Promise<EvaluationResult> {
    const criteria = await this.requireActiveCriteria(identifier);
    return this.evaluateCriteria(criteria, input, options);
  }

  /** Per-item failures are reported in place; the batch carries on */
  async evaluateBatch(
    identifier: string,
    inputs: EvaluationInput[],
    options: EvaluateRequestOptions = {}
  ): Promise<BatchResult> {
    const criteria = await this.requireActiveCriteria(identifier);
    const results: BatchItem[] = [];

    for (const [index, input] of inputs.entries()) {
      let snapshotHash: string | null = null;
      try {
        const snapshot = this.toSnapshot(input, options.sourceType);
        snapshotHash = snapshot.hash();
        const result = await this.evaluateCriteria(criteria, snapshot, options);
        results.push({ index, snapshotHash, passed: result.passed, score: result.score, result, error: null });
      } catch (err) {
        log.warn({ err, criteriaId: criteria.id, index }, "Batch item failed");
        results.push({ index, snapshotHash, passed: false, score: 0, result: null, error: errorMessage(err) });
      }
    }

    const passed = results.filter((r) => r.passed).length;
    const scored = results.filter((r) => r.result !== null);
    const averageScore =
      scored.length === 0 ? 0 : roundScore(scored.reduce((acc, r) => acc + r.score, 0) / scored.length);

    return { results, totalEvaluated: results.length, passed, failed: results.length - passed, averageScore };
  }

  /** Evaluate without persisting; successes land in the cache. Returns how many succeeded. */
  async warmupCache(identifier: string, inputs: EvaluationInput[]): Promise<number> {
    const criteria = await this.requireActiveCriteria(identifier);
    let warmed = 0;
    for (const input of inputs) {
      try {
        await this.evaluateCriteria(criteria, input, { persist: false, useCache: true });
        warmed++;
      } catch (err) {
        log.warn({ err, criteriaId: criteria.id }, "Failed to warm up cache");
      }
    }
    return warmed;
  }

  async isCached(identifier: string, input: EvaluationInput, sourceType?: string): Promise<boolean> {
    const criteria = await this.findCriteria(identifier);
    if (!criteria || !this.cache) return false;
    return this.cache.has(criteria.id, this.toSnapshot(input, sourceType));
  }

  /** Returns how many entries were dropped; every criteria when no identifier */
  async flushCache(identifier?: string): Promise<number> {
    if (!this.cache) return 0;
    if (identifier === undefined) {
      const size = this.cache.stats().size;
      this.cache.flush();
      return size;
    }
    const criteria = await this.requireCriteria(identifier);
    return this.cache.forget(criteria.id);
  }

  cacheStats(): CacheStats | null {
    return this.cache?.stats() ?? null;
  }

  async evaluations(identifier: string, opts: ListEvaluationsOptions = {}): Promise<EvaluationRecord[]> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.evaluations.listByCriteria(criteria.id, opts);
  }

  async evaluationStats(identifier: string): Promise<EvaluationStats> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.evaluations.stats(criteria.id);
  }

  /* ---------- Versions ---------- */

  /** Freeze the current definition (inactive rules included) as the next version */
  async createVersion(identifier: string, description: string | null = null): Promise<CriteriaVersion> {
    const criteria = await this.requireCriteria(identifier);
    const definition = await this.requireDefinition(criteria.id);
    const version = nextVersionNumber(await this.stores.versions.numbers(criteria.id));

    const created = await this.stores.versions.create(criteria.id, snapshotDefinition(definition, version), description);
    await this.stores.criteria.update(criteria.id, { currentVersion: version });
    await this.audit?.record("version_created", criteriaSubject(criteria.id), {
      after: { version, description },
    });
    log.info({ criteriaId: criteria.id, version }, "Criteria version created");
    return created;
  }

  async getVersion(identifier: string, version: number): Promise<CriteriaVersion | null> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.versions.get(criteria.id, version);
  }

  async hasVersion(identifier: string, version: number): Promise<boolean> {
    return (await this.getVersion(identifier, version)) !== null;
  }

  async versionNumbers(identifier: string): Promise<number[]> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.versions.numbers(criteria.id);
  }

  async listVersions(identifier: string): Promise<CriteriaVersion[]> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.versions.list(criteria.id);
  }

  async latestVersion(identifier: string): Promise<CriteriaVersion | null> {
    const criteria = await this.requireCriteria(identifier);
    return this.stores.versions.latest(criteria.id);
  }

  async compareVersions(identifier: string, from: number, to: number): Promise<VersionDiff> {
    const a = await this.requireVersion(identifier, from);
    const b = await this.requireVersion(identifier, to);
    return compareVersions(a.definition, b.definition);
  }

  /** Evaluate against a stored version; history rows keep its number */
  async evaluateVersion(
    identifier: string,
    version: number,
    input: EvaluationInput,
    options: EvaluateRequestOptions = {}
  ): Promise<EvaluationResult> {
    const stored = await this.requireVersion(identifier, version);
    const snapshot = this.toSnapshot(input, options.sourceType);
    validateInput(snapshot.all());

    const result = evaluateVersion(stored, snapshot, { random: this.random, now: this.now });
    if (options.persist ?? true) {
      await this.stores.evaluations.record(result, { snapshotHash: snapshot.hash(), context: options.context });
    }
    return result;
  }

  /* ---------- Internals ---------- */

  private async evaluateCriteria(
    criteria: Criteria,
    input: EvaluationInput,
    options: EvaluateRequestOptions
  ): Promise<EvaluationResult> {
    const snapshot = this.toSnapshot(input, options.sourceType);
    const data = snapshot.all();
    const warnings = validateInput(data);

    await this.workflow.before(criteria.id, data);

    const useCache = this.cache !== null && (options.useCache ?? true);
    let result = useCache ? this.cache?.get(criteria.id, snapshot) ?? null : null;

    if (!result) {
      const definition = await this.requireDefinition(criteria.id);
      result = evaluate(definition, snapshot, { random: this.random, now: this.now });

      if (options.persist ?? true) {
        await this.stores.evaluations.record(result, { snapshotHash: snapshot.hash(), context: options.context });
      }
      await this.audit?.record("evaluation_completed", criteriaSubject(criteria.id), {
        context: {
          ...options.context,
          criteriaName: criteria.name,
          passed: result.passed,
          score: result.score,
          decision: result.decision,
          executionTimeMs: result.executionTimeMs,
          input: data,
          warnings,
        },
      });
      if (useCache) this.cache?.set(criteria.id, snapshot, result);
    }

    await this.workflow.after(result, data);
    return result;
  }

  private toSnapshot(input: EvaluationInput, sourceType?: string): Snapshot {
    if (input instanceof Snapshot) return input;
    if (sourceType && this.registry) return this.registry.extractFor(sourceType, input);
    return new Snapshot(toSnapshotObject(input), sourceType ? { sourceType } : {});
  }

  private async details(criteria: Criteria): Promise<CriteriaDetails> {
    return { ...criteria, definition: await this.requireDefinition(criteria.id) };
  }

  private async requireCriteria(identifier: string): Promise<Criteria> {
    const criteria = await this.findCriteria(identifier);
    if (!criteria) throw new CriteriaNotFoundError(identifier);
    return criteria;
  }

  /** Inactive criteria are not evaluated */
  private async requireActiveCriteria(identifier: string): Promise<Criteria> {
    const criteria = await this.requireCriteria(identifier);
    if (!criteria.isActive) throw new CriteriaNotFoundError(identifier);
    return criteria;
  }

  private async requireDefinition(id: string): Promise<CriteriaDefinition> {
    const definition = await this.stores.criteria.loadDefinition(id);
    if (!definition) throw new CriteriaNotFoundError(id);
    return definition;
  }

  private async requireVersion(identifier: string, version: number): Promise<CriteriaVersion> {
    const stored = await this.getVersion(identifier, version);
    if (!stored) throw new CriteriaNotFoundError(`${identifier}@v${version}`);
    return stored;
  }
}

