// src/routes/audit.ts
// Audit trail queries.
//
// Endpoints:
// - GET    /audit                     Entries, newest first (event/type/id filters)
// - GET    /audit/stats?days=         Event counts over a window
// - GET    /criteria/:id/audit        Trail for one criteria
// - DELETE /audit?olderThanDays=      Remove entries past retention

import type { FastifyInstance } from "fastify";
import type { AuditLogger } from "../audit";
import type { EligibilityService } from "../service";
import { isAuditEvent } from "../store";
import { parseInteger } from "./parse";

interface AuditQuery {
  event?: string;
  type?: string;
  id?: string;
  limit?: string;
}

export function createAuditRoutes(service: EligibilityService, audit: AuditLogger) {
  return async function auditRoutes(app: FastifyInstance) {
    app.get<{ Querystring: AuditQuery }>("/audit", async (req, reply) => {
      const { event, type, id } = req.query;
      if (event !== undefined && !isAuditEvent(event)) {
        return reply.code(400).send({ error: "invalid_event", message: `Unknown audit event "${event}"` });
      }

      const limit = parseInteger(req.query.limit, 100, 1, 500);
      const entries = await audit.query({ event, auditableType: type, auditableId: id, limit });
      return reply.code(200).send({ entries, total: entries.length });
    });

    app.get<{ Querystring: { days?: string } }>("/audit/stats", async (req, reply) => {
      return reply.code(200).send(await audit.stats(parseInteger(req.query.days, 30, 1, 3650)));
    });

    app.get<{ Params: { id: string }; Querystring: { limit?: string } }>(
      "/criteria/:id/audit",
      async (req, reply) => {
        const criteria = await service.getCriteria(req.params.id);
        const entries = await audit.trail({ type: "criteria", id: criteria.id }, parseInteger(req.query.limit, 50, 1, 500));
        return reply.code(200).send({ criteriaId: criteria.id, entries, total: entries.length });
      }
    );

    app.delete<{ Querystring: { olderThanDays?: string } }>("/audit", async (req, reply) => {
      const days = req.query.olderThanDays === undefined ? undefined : parseInteger(req.query.olderThanDays, 365, 1);
      const removed = await audit.cleanup(days);
      return reply.code(200).send({ removed });
    });
  };
}
