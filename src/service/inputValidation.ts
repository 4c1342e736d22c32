// src/service/inputValidation.ts
// Limits on evaluation input. Oversized names or values are rejected;
// script or SQL lookalikes are only logged.

import { config } from "../config";
import { InputValidationError, type InputViolation } from "../errors";
import { createLogger } from "../observability";
import type { SnapshotObject, SnapshotValue } from "../snapshot";

const log = createLogger("service/input");

export interface InputLimits {
  maxFieldLength: number;
  maxValueLength: number;
}

export const SUSPICIOUS_PATTERNS: readonly RegExp[] = [
  /<script\b/i,
  /javascript:/i,
  /vbscript:/i,
  /\bon\w+\s*=/i,
  /--/,
  /;\s*drop\s+table/i,
];

export function isSuspicious(value: string): boolean {
  return SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(value));
}

function walk(
  value: SnapshotValue,
  path: string,
  limits: InputLimits,
  errors: InputViolation[],
  warnings: string[]
): void {
  if (typeof value === "string") {
    if (value.length > limits.maxValueLength) {
      errors.push({ path, message: `Value exceeds ${limits.maxValueLength} characters` });
    } else if (isSuspicious(value)) {
      warnings.push(path);
      log.warn({ field: path, preview: value.slice(0, 50) }, "Suspicious content in evaluation input");
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, i) => walk(item, `${path}[${i}]`, limits, errors, warnings));
    return;
  }
  if (typeof value === "object" && value !== null) {
    checkObject(value, `${path}.`, limits, errors, warnings);
  }
}

function checkObject(
  data: Readonly<SnapshotObject>,
  prefix: string,
  limits: InputLimits,
  errors: InputViolation[],
  warnings: string[]
): void {
  for (const [key, value] of Object.entries(data)) {
    const path = `${prefix}${key}`;
    if (key.length > limits.maxFieldLength) {
      errors.push({ path: `${prefix}${key.slice(0, 32)}...`, message: `Field name exceeds ${limits.maxFieldLength} characters` });
      continue;
    }
    walk(value, path, limits, errors, warnings);
  }
}

/**
 * Check every field name and string value.
 * @returns paths holding suspicious content
 * @throws InputValidationError listing every violation
 */
export function validateInput(data: Readonly<SnapshotObject>, limits: InputLimits = config.security): string[] {
  const errors: InputViolation[] = [];
  const warnings: string[] = [];
  checkObject(data, "", limits, errors, warnings);
  if (errors.length > 0) throw new InputValidationError(errors);
  return warnings;
}
