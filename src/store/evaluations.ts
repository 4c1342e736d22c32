// src/store/evaluations.ts
// Evaluation history: one row per persisted result.
//
// Tables: evaluations

import { nanoid } from "nanoid";
import { roundScore, type EvaluationResult } from "../engine";
import type { DbAdapter } from "../db/types";
import { createLogger } from "../observability";
import { readRecord, readRecordArray, readStringArray } from "./json";

const log = createLogger("store/evaluations");

/* ---------- Types ---------- */

export interface EvaluationRecord {
  id: string;
  criteriaId: string;
  criteriaVersion: number | null;
  passed: boolean;
  score: number;
  decision: string;
  failedRules: string[];
  /** Rule traces as stored */
  ruleResults: Record<string, unknown>[];
  context: Record<string, unknown>;
  snapshotHash: string;
  executionTimeMs: number;
  evaluatedAt: string; // ISO string
}

interface EvaluationRow {
  id: string;
  criteria_id: string;
  criteria_version: number | null;
  passed: number;
  score: number;
  decision: string;
  failed_rules_json: string;
  rule_results_json: string;
  context_json: string;
  snapshot_hash: string;
  execution_time_ms: number;
  evaluated_at: number;
}

export interface RecordEvaluationInput {
  snapshotHash: string;
  context?: Record<string, unknown>;
}

export interface ListEvaluationsOptions {
  passed?: boolean;
  limit?: number;
  offset?: number;
}

export interface EvaluationStats {
  total: number;
  passed: number;
  failed: number;
  /** Percentage, 2 decimals */
  passRate: number;
  averageScore: number;
  averageExecutionTimeMs: number;
}

function rowToEvaluation(row: EvaluationRow): EvaluationRecord {
  return {
    id: row.id,
    criteriaId: row.criteria_id,
    criteriaVersion: row.criteria_version,
    passed: row.passed === 1,
    score: row.score,
    decision: row.decision,
    failedRules: readStringArray(row.failed_rules_json),
    ruleResults: readRecordArray(row.rule_results_json),
    context: readRecord(row.context_json),
    snapshotHash: row.snapshot_hash,
    executionTimeMs: row.execution_time_ms,
    evaluatedAt: new Date(row.evaluated_at).toISOString(),
  };
}

/* ---------- Store ---------- */

export function createEvaluationsStore(db: DbAdapter) {
  async function getById(id: string): Promise<EvaluationRecord | null> {
    const row = await db.queryOne<EvaluationRow>(`SELECT * FROM evaluations WHERE id = ?`, [id]);
    return row ? rowToEvaluation(row) : null;
  }

  async function record(result: EvaluationResult, input: RecordEvaluationInput): Promise<EvaluationRecord> {
    const id = nanoid(12);
    const evaluatedAt = Date.parse(result.evaluatedAt);

    try {
      await db.run(
        `
        INSERT INTO evaluations (
          id, criteria_id, criteria_version, passed, score, decision,
          failed_rules_json, rule_results_json, context_json, snapshot_hash,
          execution_time_ms, evaluated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
        [
          id,
          result.criteriaId,
          result.version,
          result.passed ? 1 : 0,
          result.score,
          result.decision,
          JSON.stringify(result.failedRules),
          JSON.stringify(result.ruleResults),
          JSON.stringify(input.context ?? {}),
          input.snapshotHash,
          result.executionTimeMs,
          Number.isNaN(evaluatedAt) ? Date.now() : evaluatedAt,
        ]
      );
    } catch (err) {
      log.error({ err, criteriaId: result.criteriaId }, "Failed to record evaluation");
      throw err;
    }

    const created = await getById(id);
    if (!created) throw new Error(`Evaluation ${id} missing after insert`);
    return created;
  }

  /** Newest first */
  async function listByCriteria(criteriaId: string, opts: ListEvaluationsOptions = {}): Promise<EvaluationRecord[]> {
    let query = `SELECT * FROM evaluations WHERE criteria_id = ?`;
    const params: unknown[] = [criteriaId];

    if (opts.passed !== undefined) {
      query += ` AND passed = ?`;
      params.push(opts.passed ? 1 : 0);
    }

    query += ` ORDER BY evaluated_at DESC, rowid DESC LIMIT ? OFFSET ?`;
    params.push(opts.limit ?? 50, opts.offset ?? 0);

    const rows = await db.queryAll<EvaluationRow>(query, params);
    return rows.map(rowToEvaluation);
  }

  async function stats(criteriaId: string): Promise<EvaluationStats> {
    const row = await db.queryOne<{
      total: number;
      passed: number | null;
      avg_score: number | null;
      avg_time: number | null;
    }>(
      `
      SELECT COUNT(*) AS total,
             SUM(passed) AS passed,
             AVG(score) AS avg_score,
             AVG(execution_time_ms) AS avg_time
      FROM evaluations WHERE criteria_id = ?
    `,
      [criteriaId]
    );

    const total = row?.total ?? 0;
    const passed = row?.passed ?? 0;
    return {
      total,
      passed,
      failed: total - passed,
      passRate: total === 0 ? 0 : roundScore((passed / total) * 100),
      averageScore: roundScore(row?.avg_score ?? 0),
      averageExecutionTimeMs: roundScore(row?.avg_time ?? 0),
    };
  }

  async function deleteByCriteria(criteriaId: string): Promise<number> {
    const result = await db.run(`DELETE FROM evaluations WHERE criteria_id = ?`, [criteriaId]);
    return result.changes;
  }

  return { record, getById, listByCriteria, stats, deleteByCriteria };
}

export type EvaluationsStore = ReturnType<typeof createEvaluationsStore>;
