// src/workflow/types.ts
// Workflow callback type definitions

import type { EvaluationResult } from "../engine";
import type { SnapshotObject, SnapshotValue } from "../snapshot";

/* ---------- Events ---------- */
export type WorkflowEvent =
  | "before_evaluation"
  | "after_evaluation"
  | "on_pass"
  | "on_fail"
  | "on_excellent"
  | "on_good"
  | "on_condition";

/* ---------- Context ---------- */
export interface WorkflowContext {
  criteriaId: string;
  data: Readonly<SnapshotObject>;
  /** null for before_evaluation */
  result: EvaluationResult | null;
}

export type WorkflowCallback = (ctx: WorkflowContext) => void | Promise<void>;

/* ---------- Conditions ---------- */
export interface CallbackCondition {
  minScore?: number;
  maxScore?: number;
  passed?: boolean;
  failedRulesCount?: number;
  /** [field, value]: the input field must equal the value strictly */
  fieldEquals?: [string, SnapshotValue];
  scoreRange?: [number, number];
  custom?: (ctx: WorkflowContext) => boolean;
}

export interface RegisteredCallback {
  label: string;
  callback: WorkflowCallback;
  condition: CallbackCondition | null;
  /** Fires only for evaluations of this criteria when set */
  criteriaId: string | null;
}

/* ---------- Reports ---------- */
export interface CallbackFailure {
  event: WorkflowEvent;
  label: string;
  message: string;
}

export interface DispatchReport {
  /** Events fired, in order */
  events: WorkflowEvent[];
  executed: number;
  errors: CallbackFailure[];
}

export interface WorkflowOptions {
  logCallbackErrors?: boolean;
  failOnCallbackError?: boolean;
  excellentScore?: number;
  goodScore?: number;
}
