// src/routes/evaluations.ts
// Evaluation, history and cache endpoints.
//
// Endpoints:
// - POST   /criteria/:id/evaluate             Evaluate one input
// - POST   /criteria/:id/evaluate/batch       Evaluate many inputs
// - GET    /criteria/:id/evaluations          Evaluation history (newest first)
// - GET    /criteria/:id/evaluations/stats    Pass rate and averages
// - POST   /criteria/:id/cache/warmup         Evaluate into the cache without persisting
// - DELETE /criteria/:id/cache                Drop cached results for one criteria
// - GET    /cache/stats                       Cache counters
// - DELETE /cache                             Drop every cached result

import type { FastifyInstance } from "fastify";
import type { EligibilityService, EvaluateRequestOptions } from "../service";
import { isRecord, parseBoolean, parseInteger } from "./parse";

/* ---------- Types ---------- */

interface CriteriaParams {
  id: string;
}

interface EvaluateBody {
  data: Record<string, unknown>;
  sourceType?: string;
  persist?: boolean;
  useCache?: boolean;
  context?: Record<string, unknown>;
}

interface BatchBody {
  items: Record<string, unknown>[];
  sourceType?: string;
  persist?: boolean;
  useCache?: boolean;
  context?: Record<string, unknown>;
}

interface WarmupBody {
  items: Record<string, unknown>[];
}

interface HistoryQuery {
  passed?: string;
  limit?: string;
  offset?: string;
}

export const MAX_BATCH_SIZE = 1000;

/* ---------- Helpers ---------- */

function requestOptions(body: EvaluateBody | BatchBody): EvaluateRequestOptions {
  return {
    sourceType: typeof body.sourceType === "string" ? body.sourceType : undefined,
    persist: typeof body.persist === "boolean" ? body.persist : undefined,
    useCache: typeof body.useCache === "boolean" ? body.useCache : undefined,
    context: isRecord(body.context) ? body.context : undefined,
  };
}

function invalidItems(items: unknown): string | null {
  if (!Array.isArray(items) || items.length === 0) return "items must be a non-empty array";
  if (items.length > MAX_BATCH_SIZE) return `items must not exceed ${MAX_BATCH_SIZE} entries`;
  const bad = items.findIndex((item) => !isRecord(item));
  return bad === -1 ? null : `items[${bad}] must be an object`;
}

/* ---------- Routes ---------- */

export function createEvaluationRoutes(service: EligibilityService) {
  return async function evaluationRoutes(app: FastifyInstance) {
    app.post<{ Params: CriteriaParams; Body: EvaluateBody }>("/criteria/:id/evaluate", async (req, reply) => {
      const body = req.body;
      if (!isRecord(body) || !isRecord(body.data)) {
        return reply.code(400).send({ error: "missing_required_fields", message: "data must be an object" });
      }
      const result = await service.evaluate(req.params.id, body.data, requestOptions(body));
      return reply.code(200).send(result);
    });

    app.post<{ Params: CriteriaParams; Body: BatchBody }>("/criteria/:id/evaluate/batch", async (req, reply) => {
      const body = req.body;
      const problem = isRecord(body) ? invalidItems(body.items) : "Body must be a JSON object";
      if (problem) {
        return reply.code(400).send({ error: "invalid_items", message: problem });
      }
      const batch = await service.evaluateBatch(req.params.id, body.items, requestOptions(body));
      return reply.code(200).send(batch);
    });

    app.get<{ Params: CriteriaParams; Querystring: HistoryQuery }>(
      "/criteria/:id/evaluations",
      async (req, reply) => {
        const limit = parseInteger(req.query.limit, 50, 1, 200);
        const offset = parseInteger(req.query.offset, 0);
        const evaluations = await service.evaluations(req.params.id, {
          passed: parseBoolean(req.query.passed),
          limit,
          offset,
        });
        return reply.code(200).send({ evaluations, limit, offset });
      }
    );

    app.get<{ Params: CriteriaParams }>("/criteria/:id/evaluations/stats", async (req, reply) => {
      return reply.code(200).send(await service.evaluationStats(req.params.id));
    });

    /* ---------- Cache ---------- */

    app.post<{ Params: CriteriaParams; Body: WarmupBody }>("/criteria/:id/cache/warmup", async (req, reply) => {
      const body = req.body;
      const problem = isRecord(body) ? invalidItems(body.items) : "Body must be a JSON object";
      if (problem) {
        return reply.code(400).send({ error: "invalid_items", message: problem });
      }
      const warmed = await service.warmupCache(req.params.id, body.items);
      return reply.code(200).send({ warmed, total: body.items.length });
    });

    app.delete<{ Params: CriteriaParams }>("/criteria/:id/cache", async (req, reply) => {
      const removed = await service.flushCache(req.params.id);
      return reply.code(200).send({ removed });
    });

    app.get("/cache/stats", async (_req, reply) => {
      const stats = service.cacheStats();
      return reply.code(200).send(stats ?? { enabled: false });
    });

    app.delete("/cache", async (_req, reply) => {
      const removed = await service.flushCache();
      return reply.code(200).send({ removed });
    });
  };
}
