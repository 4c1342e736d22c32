// src/store/criteria.ts
// Criteria store: criteria rows plus their rule groups and rules.
//
// Tables: criteria, rule_groups, rules
// loadDefinition() assembles the engine's CriteriaDefinition from all three.

import {
  isGroupLogic,
  parseOperator,
  type CriteriaDefinition,
  type DecisionTier,
  type GroupCombination,
  type GroupLogic,
  type RuleDefinition,
  type RuleDependency,
  type RuleGroupDefinition,
  type RuleOperator,
  type RuleValue,
  type ScoringMethod,
} from "../engine";
import { ConfigurationError } from "../errors";
import type { CriteriaAttributes, CriteriaDraft } from "../criteria/types";
import type { DbAdapter } from "../db/types";
import { createLogger } from "../observability";
import {
  readDecisionTiers,
  readDependencies,
  readGroupCombination,
  readRecord,
  readRuleValue,
  readScoringMethod,
  readStringArray,
} from "./json";

const log = createLogger("store/criteria");

/* ---------- Types ---------- */

// Domain type (camelCase, for API)
export interface Criteria extends CriteriaAttributes {
  id: string;
  passThreshold: number | null;
  scoringMethod: ScoringMethod | null;
  decisionThresholds: DecisionTier[];
  groupCombination: GroupCombination | null;
  currentVersion: number | null;
  createdAt: string; // ISO string
  updatedAt: string; // ISO string
}

export interface StoredRule extends RuleDefinition {
  criteriaId: string;
  groupId: string | null;
  createdAt: string;
  updatedAt: string;
}

// Row types (snake_case, matches DB)
interface CriteriaRow {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  is_active: number;
  type: string | null;
  group_name: string | null;
  category: string | null;
  tags_json: string;
  meta_json: string;
  pass_threshold: number | null;
  scoring_method: string | null;
  decision_thresholds_json: string;
  group_combination_json: string | null;
  current_version: number | null;
  created_at: number;
  updated_at: number;
}

interface GroupRow {
  id: string;
  criteria_id: string;
  group_key: string;
  name: string;
  logic_type: string;
  min_required: number | null;
  boolean_expression: string | null;
  weight: number;
  group_order: number;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface RuleRow {
  id: string;
  criteria_id: string;
  group_id: string | null;
  rule_key: string;
  field: string;
  operator: string;
  value_json: string;
  weight: number;
  rule_order: number;
  is_active: number;
  dependencies_json: string;
  meta_json: string;
  created_at: number;
  updated_at: number;
}

export interface ListCriteriaOptions {
  activeOnly?: boolean;
  type?: string;
  category?: string;
}

export interface UpdateCriteriaInput {
  name?: string;
  description?: string | null;
  isActive?: boolean;
  type?: string | null;
  group?: string | null;
  category?: string | null;
  tags?: string[];
  meta?: Record<string, unknown>;
  passThreshold?: number | null;
  scoringMethod?: ScoringMethod | null;
  decisionThresholds?: DecisionTier[];
  groupCombination?: GroupCombination | null;
  currentVersion?: number | null;
}

export interface UpdateRuleInput {
  field?: string;
  operator?: RuleOperator;
  value?: RuleValue;
  weight?: number;
  order?: number;
  isActive?: boolean;
  dependencies?: RuleDependency[];
  meta?: Record<string, unknown>;
}

/* ---------- Row to Domain Converters ---------- */

function rowToCriteria(row: CriteriaRow): Criteria {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    description: row.description,
    isActive: row.is_active === 1,
    type: row.type,
    group: row.group_name,
    category: row.category,
    tags: readStringArray(row.tags_json),
    meta: readRecord(row.meta_json),
    passThreshold: row.pass_threshold,
    scoringMethod: readScoringMethod(row.scoring_method),
    decisionThresholds: readDecisionTiers(row.decision_thresholds_json),
    groupCombination: readGroupCombination(row.group_combination_json),
    currentVersion: row.current_version,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

function rowToRule(row: RuleRow): StoredRule {
  const rule: StoredRule = {
    id: row.id,
    key: row.rule_key,
    field: row.field,
    operator: parseOperator(row.operator, `rules.${row.id}.operator`),
    value: readRuleValue(row.value_json),
    weight: row.weight,
    order: row.rule_order,
    isActive: row.is_active === 1,
    criteriaId: row.criteria_id,
    groupId: row.group_id,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
  const dependencies = readDependencies(row.dependencies_json);
  if (dependencies.length > 0) rule.dependencies = dependencies;
  const meta = readRecord(row.meta_json);
  if (Object.keys(meta).length > 0) rule.meta = meta;
  return rule;
}

/** Engine view of a stored rule */
function toRuleDefinition(stored: StoredRule): RuleDefinition {
  const rule: RuleDefinition = {
    id: stored.id,
    key: stored.key,
    field: stored.field,
    operator: stored.operator,
    value: stored.value,
    weight: stored.weight,
    order: stored.order,
    isActive: stored.isActive,
  };
  if (stored.dependencies) rule.dependencies = stored.dependencies;
  if (stored.meta) rule.meta = stored.meta;
  return rule;
}

function toGroupLogic(value: string, groupId: string): GroupLogic {
  if (!isGroupLogic(value)) {
    throw new ConfigurationError(`Unknown group logic "${value}"`, `groups.${groupId}.logicType`);
  }
  return value;
}

function rowToGroup(row: GroupRow, rules: RuleDefinition[]): RuleGroupDefinition {
  return {
    id: row.id,
    key: row.group_key,
    name: row.name,
    logicType: toGroupLogic(row.logic_type, row.id),
    minRequired: row.min_required,
    booleanExpression: row.boolean_expression,
    weight: row.weight,
    order: row.group_order,
    isActive: row.is_active === 1,
    rules,
  };
}

/* ---------- Store ---------- */

export function createCriteriaStore(db: DbAdapter) {
  async function insertRule(
    tx: DbAdapter,
    criteriaId: string,
    groupId: string | null,
    rule: RuleDefinition,
    now: number
  ): Promise<void> {
    await tx.run(
      `
      INSERT INTO rules (
        id, criteria_id, group_id, rule_key, field, operator, value_json,
        weight, rule_order, is_active, dependencies_json, meta_json,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
      [
        rule.id,
        criteriaId,
        groupId,
        rule.key,
        rule.field,
        rule.operator,
        JSON.stringify(rule.value),
        rule.weight,
        rule.order,
        rule.isActive ? 1 : 0,
        JSON.stringify(rule.dependencies ?? []),
        JSON.stringify(rule.meta ?? {}),
        now,
        now,
      ]
    );
  }

  async function insertGroup(tx: DbAdapter, criteriaId: string, group: RuleGroupDefinition, now: number): Promise<void> {
    await tx.run(
      `
      INSERT INTO rule_groups (
        id, criteria_id, group_key, name, logic_type, min_required,
        boolean_expression, weight, group_order, is_active, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
      [
        group.id,
        criteriaId,
        group.key,
        group.name,
        group.logicType,
        group.minRequired,
        group.booleanExpression,
        group.weight,
        group.order,
        group.isActive ? 1 : 0,
        now,
        now,
      ]
    );
    for (const rule of group.rules) {
      await insertRule(tx, criteriaId, group.id, rule, now);
    }
  }

  /** Get criteria by ID */
  async function getById(id: string): Promise<Criteria | null> {
    const row = await db.queryOne<CriteriaRow>(`SELECT * FROM criteria WHERE id = ?`, [id]);
    return row ? rowToCriteria(row) : null;
  }

  async function getBySlug(slug: string): Promise<Criteria | null> {
    const row = await db.queryOne<CriteriaRow>(`SELECT * FROM criteria WHERE slug = ?`, [slug]);
    return row ? rowToCriteria(row) : null;
  }

  /** Insert a built draft with its groups and rules */
  async function create(draft: CriteriaDraft): Promise<Criteria> {
    const { definition } = draft;
    const now = Date.now();

    try {
      await db.transaction(async (tx) => {
        await tx.run(
          `
          INSERT INTO criteria (
            id, name, slug, description, is_active, type, group_name, category,
            tags_json, meta_json, pass_threshold, scoring_method,
            decision_thresholds_json, group_combination_json, current_version,
            created_at, updated_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `,
          [
            definition.id,
            draft.name,
            draft.slug,
            draft.description,
            draft.isActive ? 1 : 0,
            draft.type,
            draft.group,
            draft.category,
            JSON.stringify(draft.tags),
            JSON.stringify(draft.meta),
            definition.passThreshold,
            definition.scoringMethod,
            JSON.stringify(definition.decisionThresholds ?? []),
            definition.groupCombination ? JSON.stringify(definition.groupCombination) : null,
            definition.version ?? null,
            now,
            now,
          ]
        );
        for (const rule of definition.rules) {
          await insertRule(tx, definition.id, null, rule, now);
        }
        for (const group of definition.groups) {
          await insertGroup(tx, definition.id, group, now);
        }
      });
    } catch (err) {
      log.error({ err, slug: draft.slug }, "Failed to create criteria");
      throw err;
    }

    const created = await getById(definition.id);
    if (!created) throw new Error(`Criteria ${definition.id} missing after insert`);
    return created;
  }

  async function list(opts: ListCriteriaOptions = {}): Promise<Criteria[]> {
    let query = `SELECT * FROM criteria WHERE 1 = 1`;
    const params: unknown[] = [];

    if (opts.activeOnly) {
      query += ` AND is_active = 1`;
    }
    if (opts.type) {
      query += ` AND type = ?`;
      params.push(opts.type);
    }
    if (opts.category) {
      query += ` AND category = ?`;
      params.push(opts.category);
    }

    query += ` ORDER BY created_at DESC, name ASC`;

    const rows = await db.queryAll<CriteriaRow>(query, params);
    return rows.map(rowToCriteria);
  }

  /** Update criteria attributes; null when the criteria does not exist */
  async function update(id: string, updates: UpdateCriteriaInput): Promise<Criteria | null> {
    const sets: string[] = ["updated_at = ?"];
    const params: unknown[] = [Date.now()];

    if (updates.name !== undefined) {
      sets.push("name = ?");
      params.push(updates.name);
    }
    if (updates.description !== undefined) {
      sets.push("description = ?");
      params.push(updates.description);
    }
    if (updates.isActive !== undefined) {
      sets.push("is_active = ?");
      params.push(updates.isActive ? 1 : 0);
    }
    if (updates.type !== undefined) {
      sets.push("type = ?");
      params.push(updates.type);
    }
    if (updates.group !== undefined) {
      sets.push("group_name = ?");
      params.push(updates.group);
    }
    if (updates.category !== undefined) {
      sets.push("category = ?");
      params.push(updates.category);
    }
    if (updates.tags !== undefined) {
      sets.push("tags_json = ?");
      params.push(JSON.stringify(updates.tags));
    }
    if (updates.meta !== undefined) {
      sets.push("meta_json = ?");
      params.push(JSON.stringify(updates.meta));
    }
    if (updates.passThreshold !== undefined) {
      sets.push("pass_threshold = ?");
      params.push(updates.passThreshold);
    }
    if (updates.scoringMethod !== undefined) {
      sets.push("scoring_method = ?");
      params.push(updates.scoringMethod);
    }
    if (updates.decisionThresholds !== undefined) {
      sets.push("decision_thresholds_json = ?");
      params.push(JSON.stringify(updates.decisionThresholds));
    }
    if (updates.groupCombination !== undefined) {
      sets.push("group_combination_json = ?");
      params.push(updates.groupCombination ? JSON.stringify(updates.groupCombination) : null);
    }
    if (updates.currentVersion !== undefined) {
      sets.push("current_version = ?");
      params.push(updates.currentVersion);
    }

    params.push(id);

    try {
      const result = await db.run(`UPDATE criteria SET ${sets.join(", ")} WHERE id = ?`, params);
      if (result.changes === 0) return null;
      return await getById(id);
    } catch (err) {
      log.error({ err, criteriaId: id }, "Failed to update criteria");
      throw err;
    }
  }

  async function setActive(id: string, active: boolean): Promise<Criteria | null> {
    return update(id, { isActive: active });
  }

  /** Delete criteria; groups, rules, versions and evaluations cascade */
  async function remove(id: string): Promise<boolean> {
    try {
      const result = await db.run(`DELETE FROM criteria WHERE id = ?`, [id]);
      return result.changes > 0;
    } catch (err) {
      log.error({ err, criteriaId: id }, "Failed to delete criteria");
      throw err;
    }
  }

  /* ---------- Rules ---------- */

  async function getRule(criteriaId: string, ruleId: string): Promise<StoredRule | null> {
    const row = await db.queryOne<RuleRow>(`SELECT * FROM rules WHERE criteria_id = ? AND id = ?`, [criteriaId, ruleId]);
    return row ? rowToRule(row) : null;
  }

  async function listRules(criteriaId: string): Promise<StoredRule[]> {
    const rows = await db.queryAll<RuleRow>(
      `SELECT * FROM rules WHERE criteria_id = ? ORDER BY rule_order ASC, created_at ASC`,
      [criteriaId]
    );
    return rows.map(rowToRule);
  }

  /** Every rule key in use by the criteria, grouped or not */
  async function ruleKeys(criteriaId: string): Promise<string[]> {
    const rows = await db.queryAll<{ rule_key: string }>(`SELECT rule_key FROM rules WHERE criteria_id = ?`, [criteriaId]);
    return rows.map((r) => r.rule_key);
  }

  /** Order for a rule appended to the criteria (groupId null) or a group */
  async function nextRuleOrder(criteriaId: string, groupId: string | null = null): Promise<number> {
    const row = await db.queryOne<{ max_order: number | null }>(
      `SELECT MAX(rule_order) AS max_order FROM rules WHERE criteria_id = ? AND group_id IS ?`,
      [criteriaId, groupId]
    );
    const max = row?.max_order ?? null;
    return max === null ? 0 : max + 1;
  }

  async function addRule(criteriaId: string, rule: RuleDefinition, groupId: string | null = null): Promise<StoredRule> {
    try {
      await insertRule(db, criteriaId, groupId, rule, Date.now());
      await touch(criteriaId);
    } catch (err) {
      log.error({ err, criteriaId, ruleKey: rule.key }, "Failed to add rule");
      throw err;
    }

    const created = await getRule(criteriaId, rule.id);
    if (!created) throw new Error(`Rule ${rule.id} missing after insert`);
    return created;
  }

  async function updateRule(criteriaId: string, ruleId: string, updates: UpdateRuleInput): Promise<StoredRule | null> {
    const sets: string[] = ["updated_at = ?"];
    const params: unknown[] = [Date.now()];

    if (updates.field !== undefined) {
      sets.push("field = ?");
      params.push(updates.field);
    }
    if (updates.operator !== undefined) {
      sets.push("operator = ?");
      params.push(updates.operator);
    }
    if (updates.value !== undefined) {
      sets.push("value_json = ?");
      params.push(JSON.stringify(updates.value));
    }
    if (updates.weight !== undefined) {
      sets.push("weight = ?");
      params.push(updates.weight);
    }
    if (updates.order !== undefined) {
      sets.push("rule_order = ?");
      params.push(updates.order);
    }
    if (updates.isActive !== undefined) {
      sets.push("is_active = ?");
      params.push(updates.isActive ? 1 : 0);
    }
    if (updates.dependencies !== undefined) {
      sets.push("dependencies_json = ?");
      params.push(JSON.stringify(updates.dependencies));
    }
    if (updates.meta !== undefined) {
      sets.push("meta_json = ?");
      params.push(JSON.stringify(updates.meta));
    }

    params.push(criteriaId, ruleId);

    try {
      const result = await db.run(`UPDATE rules SET ${sets.join(", ")} WHERE criteria_id = ? AND id = ?`, params);
      if (result.changes === 0) return null;
      await touch(criteriaId);
      return await getRule(criteriaId, ruleId);
    } catch (err) {
      log.error({ err, criteriaId, ruleId }, "Failed to update rule");
      throw err;
    }
  }

  async function removeRule(criteriaId: string, ruleId: string): Promise<boolean> {
    try {
      const result = await db.run(`DELETE FROM rules WHERE criteria_id = ? AND id = ?`, [criteriaId, ruleId]);
      if (result.changes > 0) await touch(criteriaId);
      return result.changes > 0;
    } catch (err) {
      log.error({ err, criteriaId, ruleId }, "Failed to delete rule");
      throw err;
    }
  }

  /* ---------- Groups ---------- */

  async function addGroup(criteriaId: string, group: RuleGroupDefinition): Promise<RuleGroupDefinition> {
    try {
      await db.transaction(async (tx) => {
        await insertGroup(tx, criteriaId, group, Date.now());
      });
      await touch(criteriaId);
    } catch (err) {
      log.error({ err, criteriaId, groupKey: group.key }, "Failed to add group");
      throw err;
    }

    const definition = await loadDefinition(criteriaId);
    const created = definition?.groups.find((g) => g.id === group.id);
    if (!created) throw new Error(`Group ${group.id} missing after insert`);
    return created;
  }

  /** Remove a group and its rules */
  async function removeGroup(criteriaId: string, groupId: string): Promise<boolean> {
    try {
      const result = await db.run(`DELETE FROM rule_groups WHERE criteria_id = ? AND id = ?`, [criteriaId, groupId]);
      if (result.changes > 0) await touch(criteriaId);
      return result.changes > 0;
    } catch (err) {
      log.error({ err, criteriaId, groupId }, "Failed to delete group");
      throw err;
    }
  }

  /* ---------- Definition ---------- */

  /**
   * Criteria with its rules and groups, as the engine takes it. Deactivated
   * rules and groups stay in: the engine skips them, and positional formula
   * letters count them.
   */
  async function loadDefinition(id: string): Promise<CriteriaDefinition | null> {
    const criteria = await getById(id);
    if (!criteria) return null;

    const groupRows = await db.queryAll<GroupRow>(
      `SELECT * FROM rule_groups WHERE criteria_id = ? ORDER BY group_order ASC, created_at ASC`,
      [id]
    );
    const ruleRows = await db.queryAll<RuleRow>(
      `SELECT * FROM rules WHERE criteria_id = ? ORDER BY rule_order ASC, created_at ASC`,
      [id]
    );

    const byGroup = new Map<string, RuleDefinition[]>();
    const standalone: RuleDefinition[] = [];
    for (const row of ruleRows) {
      const rule = toRuleDefinition(rowToRule(row));
      if (row.group_id === null) {
        standalone.push(rule);
      } else {
        const members = byGroup.get(row.group_id) ?? [];
        members.push(rule);
        byGroup.set(row.group_id, members);
      }
    }

    return {
      id: criteria.id,
      name: criteria.name,
      slug: criteria.slug,
      passThreshold: criteria.passThreshold,
      scoringMethod: criteria.scoringMethod,
      rules: standalone,
      groups: groupRows.map((row) => rowToGroup(row, byGroup.get(row.id) ?? [])),
      decisionThresholds: criteria.decisionThresholds,
      groupCombination: criteria.groupCombination,
      version: criteria.currentVersion,
    };
  }

  async function touch(id: string): Promise<void> {
    await db.run(`UPDATE criteria SET updated_at = ? WHERE id = ?`, [Date.now(), id]);
  }

  async function count(): Promise<number> {
    const row = await db.queryOne<{ count: number }>(`SELECT COUNT(*) as count FROM criteria`);
    return row?.count ?? 0;
  }

  return {
    create,
    getById,
    getBySlug,
    list,
    update,
    setActive,
    delete: remove,
    count,
    getRule,
    listRules,
    ruleKeys,
    nextRuleOrder,
    addRule,
    updateRule,
    removeRule,
    addGroup,
    removeGroup,
    loadDefinition,
  };
}

export type CriteriaStore = ReturnType<typeof createCriteriaStore>;
