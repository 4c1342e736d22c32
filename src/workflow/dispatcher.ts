// src/workflow/dispatcher.ts
// Lifecycle callbacks around an evaluation.
//
// before() fires ahead of the engine; after() fires once the result exists:
//   after_evaluation, then on_pass (+ on_excellent | on_good) or on_fail,
//   then conditional callbacks (onCondition, onScoreRange).
// A throwing callback is logged and collected into the report, or rethrown
// as WorkflowCallbackError when failOnCallbackError is set.

import { config } from "../config";
import type { EvaluationResult } from "../engine";
import { WorkflowCallbackError, errorMessage } from "../errors";
import { createLogger } from "../observability";
import type { SnapshotObject } from "../snapshot";
import type {
  CallbackCondition,
  DispatchReport,
  RegisteredCallback,
  WorkflowCallback,
  WorkflowContext,
  WorkflowEvent,
  WorkflowOptions,
} from "./types";

const log = createLogger("workflow/dispatcher");

/* ---------- Conditions ---------- */

export function conditionHolds(condition: CallbackCondition, ctx: WorkflowContext): boolean {
  const result = ctx.result;
  if (!result) return false;

  if (condition.minScore !== undefined && result.score < condition.minScore) return false;
  if (condition.maxScore !== undefined && result.score > condition.maxScore) return false;
  if (condition.passed !== undefined && result.passed !== condition.passed) return false;
  if (condition.failedRulesCount !== undefined && result.failedRules.length !== condition.failedRulesCount) {
    return false;
  }
  if (condition.fieldEquals) {
    const [field, expected] = condition.fieldEquals;
    if ((ctx.data[field] ?? null) !== expected) return false;
  }
  if (condition.scoreRange) {
    const [min, max] = condition.scoreRange;
    if (result.score < min || result.score > max) return false;
  }
  if (condition.custom && !condition.custom(ctx)) return false;

  return true;
}

/* ---------- Dispatcher ---------- */

export class WorkflowDispatcher {
  private callbacks: Map<WorkflowEvent, RegisteredCallback[]> = new Map();
  private readonly options: Required<WorkflowOptions>;

  constructor(options: WorkflowOptions = {}) {
    this.options = {
      logCallbackErrors: options.logCallbackErrors ?? config.workflow.logCallbackErrors,
      failOnCallbackError: options.failOnCallbackError ?? config.workflow.failOnCallbackError,
      excellentScore: options.excellentScore ?? config.workflow.excellentScore,
      goodScore: options.goodScore ?? config.workflow.goodScore,
    };
  }

  /** Register a callback for an event */
  on(
    event: WorkflowEvent,
    callback: WorkflowCallback,
    condition: CallbackCondition | null = null,
    label?: string
  ): this {
    const list = this.callbacks.get(event) ?? [];
    list.push({ label: label ?? `${event}#${list.length + 1}`, callback, condition, criteriaId: null });
    this.callbacks.set(event, list);
    return this;
  }

  onCondition(condition: CallbackCondition, callback: WorkflowCallback, label?: string): this {
    return this.on("on_condition", callback, condition, label);
  }

  /** Fires when min <= score <= max */
  onScoreRange(min: number, max: number, callback: WorkflowCallback): this {
    return this.on("on_condition", callback, { scoreRange: [min, max] }, `score_range:${min}-${max}`);
  }

  count(event?: WorkflowEvent): number {
    if (event) return this.callbacks.get(event)?.length ?? 0;
    let total = 0;
    for (const list of this.callbacks.values()) total += list.length;
    return total;
  }

  clear(event?: WorkflowEvent): void {
    if (event) this.callbacks.delete(event);
    else this.callbacks.clear();
  }

  /**
   * Copy every registration into another dispatcher. With a criteria id the
   * copies fire only for evaluations of that criteria.
   */
  copyTo(target: WorkflowDispatcher, criteriaId: string | null = null): void {
    for (const [event, list] of this.callbacks) {
      const into = target.callbacks.get(event) ?? [];
      for (const entry of list) into.push({ ...entry, criteriaId: criteriaId ?? entry.criteriaId });
      target.callbacks.set(event, into);
    }
  }

  /** Drop the callbacks scoped to one criteria */
  forgetCriteria(criteriaId: string): number {
    let removed = 0;
    for (const [event, list] of this.callbacks) {
      const kept = list.filter((entry) => entry.criteriaId !== criteriaId);
      removed += list.length - kept.length;
      this.callbacks.set(event, kept);
    }
    return removed;
  }

  async before(criteriaId: string, data: Readonly<SnapshotObject>): Promise<DispatchReport> {
    const report = emptyReport();
    await this.fire("before_evaluation", { criteriaId, data, result: null }, report);
    return report;
  }

  async after(result: EvaluationResult, data: Readonly<SnapshotObject>): Promise<DispatchReport> {
    const ctx: WorkflowContext = { criteriaId: result.criteriaId, data, result };
    const report = emptyReport();

    await this.fire("after_evaluation", ctx, report);

    if (result.passed) {
      await this.fire("on_pass", ctx, report);
      if (result.score >= this.options.excellentScore) {
        await this.fire("on_excellent", ctx, report);
      } else if (result.score >= this.options.goodScore) {
        await this.fire("on_good", ctx, report);
      }
    } else {
      await this.fire("on_fail", ctx, report);
    }

    await this.fire("on_condition", ctx, report);
    return report;
  }

  private async fire(event: WorkflowEvent, ctx: WorkflowContext, report: DispatchReport): Promise<void> {
    const list = (this.callbacks.get(event) ?? []).filter(
      (entry) => entry.criteriaId === null || entry.criteriaId === ctx.criteriaId
    );
    if (list.length === 0) return;
    report.events.push(event);

    for (const entry of list) {
      if (entry.condition && !conditionHolds(entry.condition, ctx)) continue;

      try {
        await entry.callback(ctx);
        report.executed++;
      } catch (err) {
        if (this.options.logCallbackErrors) {
          log.error({ err, event, callback: entry.label, criteriaId: ctx.criteriaId }, "Workflow callback failed");
        }
        if (this.options.failOnCallbackError) {
          throw new WorkflowCallbackError(entry.label, { cause: err });
        }
        report.errors.push({ event, label: entry.label, message: errorMessage(err) });
      }
    }
  }
}

function emptyReport(): DispatchReport {
  return { events: [], executed: 0, errors: [] };
}
