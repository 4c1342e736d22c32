// src/routes/health.ts
// Health checks.
// - GET /health       Status with a database round trip
// - GET /health/live  Liveness probe

import type { FastifyInstance } from "fastify";
import type { DbAdapter } from "../db/types";
import { errorMessage } from "../errors";
import { createLogger } from "../observability";

const log = createLogger("routes/health");

export function createHealthRoutes(db: DbAdapter) {
  return async function healthRoutes(app: FastifyInstance) {
    app.get("/health", async (_req, reply) => {
      const started = Date.now();
      try {
        await db.queryOne("SELECT 1 AS ok");
        return reply.code(200).send({
          status: "healthy",
          database: { status: "up", latencyMs: Date.now() - started },
          uptimeSeconds: Math.round(process.uptime()),
        });
      } catch (err) {
        log.error({ err }, "Database health check failed");
        return reply.code(503).send({
          status: "unhealthy",
          database: { status: "down", error: errorMessage(err) },
          uptimeSeconds: Math.round(process.uptime()),
        });
      }
    });

    app.get("/health/live", async (_req, reply) => {
      return reply.code(200).send({ alive: true });
    });
  };
}
