// src/service/index.ts

export {
  EligibilityService,
  type BatchItem,
  type BatchResult,
  type CriteriaDetails,
  type EligibilityServiceDeps,
  type EvaluateRequestOptions,
  type EvaluationInput,
  type RulePatch,
} from "./eligibilityService";
export { SUSPICIOUS_PATTERNS, isSuspicious, validateInput, type InputLimits } from "./inputValidation";
