// src/observability/index.ts
// Observability exports.

export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger";
export { REQUEST_ID_HEADER, registerObservability, requestIdGenerator } from "./http";
