// src/routes/index.ts

export { createAuditRoutes } from "./audit";
export { createCriteriaRoutes } from "./criteria";
export { registerErrorHandler, toErrorResponse, type ErrorBody } from "./errors";
export { MAX_BATCH_SIZE, createEvaluationRoutes } from "./evaluations";
export { createHealthRoutes } from "./health";
export { createPresetRoutes } from "./presets";
export { createVersionRoutes } from "./versions";
