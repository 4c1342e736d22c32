/* src/config.ts
   Centralized config: scoring defaults, decision wording, extraction, cache, audit, workflow */
import path from 'node:path';
import 'dotenv/config';
import { SCORING_METHODS } from './engine/scoring';
import type { ScoringMethod } from './engine/types';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

function envNumber(name: string, fallback: number): number {
  const raw = env(name).trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = env(name).trim().toLowerCase();
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  return fallback;
}

function envList(name: string, fallback: readonly string[]): string[] {
  const raw = env(name).trim();
  if (!raw) return [...fallback];
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

function envScoringMethod(name: string, fallback: ScoringMethod): ScoringMethod {
  const raw = env(name).trim().toLowerCase();
  const match = SCORING_METHODS.find(m => m === raw);
  return match ?? fallback;
}

export const AUDIT_REDACTED_KEYS = ['password', 'token', 'secret', 'api_key', 'ssn', 'credit_card'] as const;

export const DEFAULT_SENSITIVE_FIELDS = [
  'password',
  'remember_token',
  'api_token',
  'secret',
  'two_factor_secret',
  'two_factor_recovery_codes',
] as const;

/**
 * Build the config object from the current environment.
 * Exposed for tests; application code reads the `config` export.
 */
export function loadConfig() {
  return {
    nodeEnv: env('NODE_ENV', 'development'),

    // ── Scoring ──────────────────────────────────────────────────────
    scoring: {
      passThreshold: envNumber('ELIGIBILITY_PASS_THRESHOLD', 65),
      method: envScoringMethod('ELIGIBILITY_SCORING_METHOD', 'weighted'),
      maxScore: 100,
      minScore: 0,
    },

    // ── Decision wording ─────────────────────────────────────────────
    decisions: {
      pass: ['Approved', 'Accepted', 'Qualified', 'Eligible'],
      fail: ['Rejected', 'Declined', 'Not Qualified', 'Ineligible'],
    },

    // ── Extraction ───────────────────────────────────────────────────
    extraction: {
      sensitiveFields: envList('ELIGIBILITY_SENSITIVE_FIELDS', DEFAULT_SENSITIVE_FIELDS),
    },

    // ── Evaluation cache ─────────────────────────────────────────────
    cache: {
      enabled: envBool('ELIGIBILITY_CACHE_ENABLED', true),
      ttlSeconds: envNumber('ELIGIBILITY_CACHE_TTL', 3600),
      prefix: env('ELIGIBILITY_CACHE_PREFIX', 'eligibility:eval'),
      maxEntries: envNumber('ELIGIBILITY_CACHE_MAX_ENTRIES', 1000),
    },

    // ── Audit ────────────────────────────────────────────────────────
    audit: {
      enabled: envBool('ELIGIBILITY_AUDIT_ENABLED', true),
      // Empty: every event
      events: envList('ELIGIBILITY_AUDIT_EVENTS', []),
      includeSensitiveData: envBool('ELIGIBILITY_AUDIT_INCLUDE_SENSITIVE', false),
      retentionDays: envNumber('ELIGIBILITY_AUDIT_RETENTION_DAYS', 365),
    },

    // ── Workflow callbacks ───────────────────────────────────────────
    workflow: {
      logCallbackErrors: envBool('ELIGIBILITY_LOG_CALLBACK_ERRORS', true),
      failOnCallbackError: envBool('ELIGIBILITY_FAIL_ON_CALLBACK_ERROR', false),
      excellentScore: 90,
      goodScore: 80,
    },

    // ── Input limits ─────────────────────────────────────────────────
    security: {
      maxFieldLength: envNumber('ELIGIBILITY_MAX_FIELD_LENGTH', 255),
      maxValueLength: envNumber('ELIGIBILITY_MAX_VALUE_LENGTH', 1000),
    },

    // ── Database ─────────────────────────────────────────────────────
    database: {
      path: env('ELIGIBILITY_DB_PATH') || path.resolve(process.cwd(), 'data/eligibility.db'),
    },

    // ── HTTP server ──────────────────────────────────────────────────
    server: {
      port: envNumber('PORT', 4100),
      host: env('HOST', '127.0.0.1'),
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
