// src/engine/scoring.ts
// Score strategies over rule/group outcomes.
//
// weighted, pass_fail and average land in [0, 100]; sum is the raw total of
// contributions and is compared against the threshold unnormalised.

import { ConfigurationError } from "../errors";
import type { ScoredItem, ScoringMethod } from "./types";

export const SCORING_METHODS: readonly ScoringMethod[] = ["weighted", "pass_fail", "sum", "average"];

export const MAX_SCORE = 100;

export function isScoringMethod(value: string): value is ScoringMethod {
  return SCORING_METHODS.some((m) => m === value);
}

export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

function weighted(items: readonly ScoredItem[]): number {
  const total = items.reduce((acc, item) => acc + item.weight, 0);
  if (total <= 0) return 0;
  const achieved = items.reduce((acc, item) => acc + (item.passed ? item.contribution : 0), 0);
  return Math.min(MAX_SCORE, (achieved / total) * 100);
}

function passFail(items: readonly ScoredItem[]): number {
  return items.every((item) => item.passed) ? MAX_SCORE : 0;
}

function sum(items: readonly ScoredItem[]): number {
  return items.reduce((acc, item) => acc + (item.passed ? item.contribution : 0), 0);
}

function average(items: readonly ScoredItem[]): number {
  if (items.length === 0) return 0;
  const passed = items.filter((item) => item.passed).length;
  return (passed / items.length) * 100;
}

/** Score rounded to two decimals */
export function calculateScore(method: ScoringMethod, items: readonly ScoredItem[]): number {
  switch (method) {
    case "weighted":
      return roundScore(weighted(items));
    case "pass_fail":
      return roundScore(passFail(items));
    case "sum":
      return roundScore(sum(items));
    case "average":
      return roundScore(average(items));
    default: {
      const unreachable: never = method;
      throw new ConfigurationError(`Unknown scoring method: ${String(unreachable)}`);
    }
  }
}

export function isPassing(score: number, threshold: number): boolean {
  return score >= threshold;
}
