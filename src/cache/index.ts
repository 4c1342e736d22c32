// src/cache/index.ts
export { EvaluationCache, type CacheStats, type EvaluationCacheOptions } from "./evaluationCache";
