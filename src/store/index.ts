// src/store/index.ts

import type { DbAdapter } from "../db/types";
import { createAuditStore, type AuditStore } from "./audit";
import { createCriteriaStore, type CriteriaStore } from "./criteria";
import { createCriteriaVersionsStore, type CriteriaVersionsStore } from "./criteriaVersions";
import { createEvaluationsStore, type EvaluationsStore } from "./evaluations";

export * from "./audit";
export * from "./criteria";
export * from "./criteriaVersions";
export * from "./evaluations";

export interface Stores {
  criteria: CriteriaStore;
  versions: CriteriaVersionsStore;
  evaluations: EvaluationsStore;
  audit: AuditStore;
}

export function createStores(db: DbAdapter): Stores {
  return {
    criteria: createCriteriaStore(db),
    versions: createCriteriaVersionsStore(db),
    evaluations: createEvaluationsStore(db),
    audit: createAuditStore(db),
  };
}
