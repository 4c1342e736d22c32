// src/criteria/builder.ts
// Fluent authoring API for criteria.
//
//   const loan = new CriteriaBuilder("Loan Approval")
//     .passThreshold(70)
//     .addRule("credit_score", ">=", 650, null, "high")
//     .addGroup("Income", (g) => g.requireAny().addRule("income", ">=", 3000))
//     .onPass(notifyApplicant);
//
//   const result = await loan.evaluate({ credit_score: 700, income: 4000 });
//
// Every call validates eagerly and throws ConfigurationError; build()
// additionally runs the engine's whole-definition checks.

import { nanoid } from "nanoid";
import {
  evaluate,
  isScoringMethod,
  validateCriteria,
  type CriteriaDefinition,
  type DecisionTier,
  type EvaluateOptions,
  type EvaluationResult,
  type GroupCombinationLogic,
  type GroupLogic,
  type RuleDefinition,
  type RuleGroupDefinition,
  type ScoringMethod,
} from "../engine";
import { ConfigurationError } from "../errors";
import { createLogger } from "../observability";
import { Snapshot, type SnapshotObject } from "../snapshot";
import { WorkflowDispatcher, type CallbackCondition, type WorkflowCallback, type WorkflowOptions } from "../workflow";
import { toRuleDefinition } from "./ruleInput";
import type { CriteriaDraft, RuleInput, RulePriority } from "./types";

const log = createLogger("criteria/builder");

/* ---------- Helpers ---------- */

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Tiers from a list or a `{ minScore: label }` map, highest first.
 * @throws ConfigurationError
 */
export function toDecisionTiers(tiers: Record<number, string> | DecisionTier[]): DecisionTier[] {
  const list = Array.isArray(tiers)
    ? tiers
    : Object.entries(tiers).map(([minScore, label]) => ({ minScore: Number(minScore), label }));
  list.forEach((tier, i) => {
    if (typeof tier.minScore !== "number" || !Number.isFinite(tier.minScore) || typeof tier.label !== "string" || tier.label.trim() === "") {
      throw new ConfigurationError("Decision tier needs a numeric minScore and a label", `decisionThresholds[${i}]`);
    }
  });
  return [...list].sort((a, b) => b.minScore - a.minScore);
}

/** Group key derived from its display name: "Identity Checks" -> "identity_checks" */
export function groupKeyFor(name: string): string {
  return slugify(name).replace(/-/g, "_");
}

/* ---------- Group Builder ---------- */

export class GroupBuilder {
  private logicType: GroupLogic = "all";
  private minRequired: number | null = null;
  private booleanExpression: string | null = null;
  private groupWeight = 1;
  private readonly rules: RuleDefinition[] = [];

  constructor(
    readonly name: string,
    readonly key: string,
    private readonly order: number,
    private readonly takenKeys: Set<string>
  ) {}

  addRule(
    field: string,
    operator: string,
    value: unknown,
    weight: number | null = null,
    priority: RulePriority | null = null
  ): this {
    return this.addRuleInput({ field, operator, value, weight, priority });
  }

  addRuleInput(input: RuleInput): this {
    const path = `groups.${this.key}.rules[${this.rules.length}]`;
    this.rules.push(toRuleDefinition(input, this.rules.length, this.takenKeys, path));
    return this;
  }

  addRules(inputs: RuleInput[]): this {
    for (const input of inputs) this.addRuleInput(input);
    return this;
  }

  requireAll(): this {
    return this.setLogic("all");
  }

  requireAny(): this {
    return this.setLogic("any");
  }

  requireMin(minRequired: number): this {
    if (!Number.isInteger(minRequired) || minRequired < 1) {
      throw new ConfigurationError("Min required must be an integer of at least 1", `groups.${this.key}.minRequired`);
    }
    this.setLogic("min");
    this.minRequired = minRequired;
    return this;
  }

  requireMajority(): this {
    return this.setLogic("majority");
  }

  /** Formula over rule keys, or a, b, c... by position */
  requireLogic(expression: string): this {
    if (expression.trim() === "") {
      throw new ConfigurationError("Boolean expression must not be empty", `groups.${this.key}.booleanExpression`);
    }
    this.setLogic("boolean");
    this.booleanExpression = expression;
    return this;
  }

  weight(weight: number): this {
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new ConfigurationError("Group weight must be greater than 0", `groups.${this.key}.weight`);
    }
    this.groupWeight = weight;
    return this;
  }

  toDefinition(): RuleGroupDefinition {
    return {
      id: nanoid(12),
      key: this.key,
      name: this.name,
      logicType: this.logicType,
      minRequired: this.minRequired,
      booleanExpression: this.booleanExpression,
      weight: this.groupWeight,
      order: this.order,
      isActive: true,
      rules: this.rules.map((r) => ({ ...r })),
    };
  }

  private setLogic(logic: GroupLogic): this {
    this.logicType = logic;
    this.minRequired = null;
    this.booleanExpression = null;
    return this;
  }
}

/* ---------- Criteria Builder ---------- */

export interface CriteriaBuilderOptions {
  slug?: string;
  workflow?: WorkflowOptions;
}

export class CriteriaBuilder {
  readonly id = nanoid(12);
  readonly workflow: WorkflowDispatcher;

  private readonly slug: string;
  private descriptionText: string | null = null;
  private threshold: number | null = null;
  private method: ScoringMethod | null = null;
  private isActive = true;
  private typeName: string | null = null;
  private groupName: string | null = null;
  private categoryName: string | null = null;
  private tagList: string[] = [];
  private metaData: Record<string, unknown> = {};
  private tiers: DecisionTier[] = [];
  private combination: { logic: GroupCombinationLogic; expression: string | null } | null = null;

  private readonly rules: RuleDefinition[] = [];
  private readonly groups: GroupBuilder[] = [];
  private readonly takenKeys = new Set<string>();

  constructor(readonly name: string, options: CriteriaBuilderOptions = {}) {
    if (name.trim() === "") {
      throw new ConfigurationError("Criteria name must not be empty", "name");
    }
    this.slug = options.slug ?? slugify(name);
    this.workflow = new WorkflowDispatcher(options.workflow);
  }

  /* ---------- Attributes ---------- */

  description(text: string): this {
    this.descriptionText = text;
    return this;
  }

  /** 0..100, or any non-negative number under sum scoring; the upper bound is checked by build() */
  passThreshold(threshold: number): this {
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new ConfigurationError(`Pass threshold out of range: ${threshold}`, "passThreshold");
    }
    this.threshold = threshold;
    return this;
  }

  scoringMethod(method: string): this {
    if (!isScoringMethod(method)) {
      throw new ConfigurationError(`Unknown scoring method "${method}"`, "scoringMethod");
    }
    this.method = method;
    return this;
  }

  active(active = true): this {
    this.isActive = active;
    return this;
  }

  type(type: string): this {
    this.typeName = type;
    return this;
  }

  /** Organisational label; unrelated to rule groups */
  group(group: string): this {
    this.groupName = group;
    return this;
  }

  category(category: string): this {
    this.categoryName = category;
    return this;
  }

  tags(...tags: string[]): this {
    this.tagList = [...new Set([...this.tagList, ...tags])];
    return this;
  }

  meta(meta: Record<string, unknown>): this {
    this.metaData = { ...this.metaData, ...meta };
    return this;
  }

  /* ---------- Rules & Groups ---------- */

  addRule(
    field: string,
    operator: string,
    value: unknown,
    weight: number | null = null,
    priority: RulePriority | null = null
  ): this {
    return this.addRuleInput({ field, operator, value, weight, priority });
  }

  addRuleInput(input: RuleInput): this {
    const path = `rules[${this.rules.length}]`;
    this.rules.push(toRuleDefinition(input, this.rules.length, this.takenKeys, path));
    return this;
  }

  addRules(inputs: RuleInput[]): this {
    for (const input of inputs) this.addRuleInput(input);
    return this;
  }

  /** Key defaults to the slugged name; boolean group combinations refer to it */
  addGroup(name: string, configure: (group: GroupBuilder) => void, key: string = groupKeyFor(name)): this {
    if (key === "") {
      throw new ConfigurationError("Group name must contain letters or digits", `groups[${this.groups.length}].name`);
    }
    if (this.groups.some((g) => g.key === key)) {
      throw new ConfigurationError(`Duplicate group "${name}"`, `groups[${this.groups.length}].name`);
    }
    const builder = new GroupBuilder(name, key, this.groups.length, this.takenKeys);
    configure(builder);
    this.groups.push(builder);
    return this;
  }

  /** { 90: "Fast Track", 70: "Approved" } or a tier list */
  decisionThresholds(tiers: Record<number, string> | DecisionTier[]): this {
    this.tiers = toDecisionTiers(tiers);
    return this;
  }

  /** Require groups to hold together: all, any, or a formula over group keys */
  groupCombination(logic: GroupCombinationLogic, expression: string | null = null): this {
    if (logic === "boolean" && !expression) {
      throw new ConfigurationError("Boolean group combination needs an expression", "groupCombination.expression");
    }
    this.combination = { logic, expression: logic === "boolean" ? expression : null };
    return this;
  }

  /* ---------- Callbacks ---------- */

  onPass(callback: WorkflowCallback): this {
    this.workflow.on("on_pass", callback);
    return this;
  }

  onFail(callback: WorkflowCallback): this {
    this.workflow.on("on_fail", callback);
    return this;
  }

  onExcellent(callback: WorkflowCallback): this {
    this.workflow.on("on_excellent", callback);
    return this;
  }

  onGood(callback: WorkflowCallback): this {
    this.workflow.on("on_good", callback);
    return this;
  }

  onScoreRange(min: number, max: number, callback: WorkflowCallback): this {
    this.workflow.onScoreRange(min, max, callback);
    return this;
  }

  onCondition(condition: CallbackCondition, callback: WorkflowCallback): this {
    this.workflow.onCondition(condition, callback);
    return this;
  }

  beforeEvaluation(callback: WorkflowCallback): this {
    this.workflow.on("before_evaluation", callback);
    return this;
  }

  afterEvaluation(callback: WorkflowCallback): this {
    this.workflow.on("after_evaluation", callback);
    return this;
  }

  /* ---------- Output ---------- */

  /**
   * Validated draft, ready for the criteria store or the engine.
   * @throws ConfigurationError
   */
  build(): CriteriaDraft {
    if (this.method === "sum" && this.threshold === null) {
      log.warn({ criteria: this.slug }, "Sum scoring without an explicit pass threshold uses the default");
    }

    const definition: CriteriaDefinition = {
      id: this.id,
      name: this.name,
      slug: this.slug,
      passThreshold: this.threshold,
      scoringMethod: this.method,
      rules: this.rules.map((r) => ({ ...r })),
      groups: this.groups.map((g) => g.toDefinition()),
      decisionThresholds: [...this.tiers],
      groupCombination: this.combination,
    };
    validateCriteria(definition);

    return {
      name: this.name,
      slug: this.slug,
      description: this.descriptionText,
      isActive: this.isActive,
      type: this.typeName,
      group: this.groupName,
      category: this.categoryName,
      tags: [...this.tagList],
      meta: { ...this.metaData },
      definition,
    };
  }

  /** Evaluate in memory, running the registered callbacks around the engine */
  async evaluate(input: Snapshot | SnapshotObject, options: EvaluateOptions = {}): Promise<EvaluationResult> {
    const { definition } = this.build();
    const snapshot = Snapshot.from(input);

    await this.workflow.before(definition.id, snapshot.all());
    const result = evaluate(definition, snapshot, { ...options, skipValidation: true });
    await this.workflow.after(result, snapshot.all());
    return result;
  }
}
