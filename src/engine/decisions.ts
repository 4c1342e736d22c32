// src/engine/decisions.ts
// Decision wording. Tiers, when configured, map a score to a fixed label;
// otherwise the label is a uniform pick from the pass or fail synonyms.
// This is the only non-deterministic field of a result.

import type { DecisionTier } from "./types";

export const NO_RULES_DECISION = "No rules to evaluate";

export interface DecisionOptions {
  pass: readonly string[];
  fail: readonly string[];
  tiers?: readonly DecisionTier[];
  random?: () => number;
}

/** Highest tier whose minScore the score reaches */
export function decisionFromTiers(score: number, tiers: readonly DecisionTier[]): string | null {
  const sorted = [...tiers].sort((a, b) => b.minScore - a.minScore);
  const tier = sorted.find((t) => score >= t.minScore);
  return tier ? tier.label : null;
}

export function pickDecision(passed: boolean, score: number, options: DecisionOptions): string {
  if (options.tiers && options.tiers.length > 0) {
    const tiered = decisionFromTiers(score, options.tiers);
    if (tiered) return tiered;
  }

  const labels = passed ? options.pass : options.fail;
  if (labels.length === 0) return passed ? "Passed" : "Failed";

  const random = options.random ?? Math.random;
  const index = Math.min(labels.length - 1, Math.max(0, Math.floor(random() * labels.length)));
  return labels[index];
}
