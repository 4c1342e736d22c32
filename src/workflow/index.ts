// src/workflow/index.ts
export { WorkflowDispatcher, conditionHolds } from "./dispatcher";
export type {
  CallbackCondition,
  CallbackFailure,
  DispatchReport,
  RegisteredCallback,
  WorkflowCallback,
  WorkflowContext,
  WorkflowEvent,
  WorkflowOptions,
} from "./types";
