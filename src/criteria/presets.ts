// src/criteria/presets.ts
// Ready-made criteria. Definitions live in presets.json; each preset opens
// as a CriteriaBuilder so callers can adjust it before saving.

import { ConfigurationError } from "../errors";
import { CriteriaBuilder, type CriteriaBuilderOptions } from "./builder";
import presetData from "./presets.json";
import type { RuleInput } from "./types";

export interface PresetDefinition {
  key: string;
  name: string;
  description: string;
  category: string;
  passThreshold: number;
  scoringMethod: string;
  rules: RuleInput[];
}

export interface PresetSummary {
  key: string;
  name: string;
  description: string;
  category: string;
  passThreshold: number;
  ruleCount: number;
}

const PRESETS: readonly PresetDefinition[] = presetData.presets;

export function listPresets(): PresetSummary[] {
  return PRESETS.map((p) => ({
    key: p.key,
    name: p.name,
    description: p.description,
    category: p.category,
    passThreshold: p.passThreshold,
    ruleCount: p.rules.length,
  }));
}

export function getPreset(key: string): PresetDefinition | null {
  return PRESETS.find((p) => p.key === key) ?? null;
}

/**
 * Open a preset as a builder.
 * @throws ConfigurationError for unknown presets
 */
export function createPreset(key: string, options: CriteriaBuilderOptions = {}): CriteriaBuilder {
  const preset = getPreset(key);
  if (!preset) {
    throw new ConfigurationError(
      `Unknown preset "${key}". Available: ${PRESETS.map((p) => p.key).join(", ")}`,
      "preset"
    );
  }

  return new CriteriaBuilder(preset.name, options)
    .description(preset.description)
    .category(preset.category)
    .scoringMethod(preset.scoringMethod)
    .passThreshold(preset.passThreshold)
    .addRules(preset.rules);
}
