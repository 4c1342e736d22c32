// src/routes/versions.ts
// Criteria version history.
//
// Endpoints:
// - GET  /criteria/:id/versions                        List versions
// - POST /criteria/:id/versions                        Freeze the current definition
// - GET  /criteria/:id/versions/compare?from=&to=      Rule-level diff
// - GET  /criteria/:id/versions/:version               One version with its definition
// - POST /criteria/:id/versions/:version/evaluate      Evaluate against a version

import type { FastifyInstance, FastifyReply } from "fastify";
import type { EligibilityService } from "../service";
import { isRecord } from "./parse";

interface CriteriaParams {
  id: string;
}

interface VersionParams extends CriteriaParams {
  version: string;
}

function versionNumber(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const n = parseInt(value, 10);
  return n > 0 ? n : null;
}

function badVersion(reply: FastifyReply, name: string) {
  return reply.code(400).send({ error: "invalid_version", message: `${name} must be a positive integer` });
}

export function createVersionRoutes(service: EligibilityService) {
  return async function versionRoutes(app: FastifyInstance) {
    app.get<{ Params: CriteriaParams }>("/criteria/:id/versions", async (req, reply) => {
      const versions = await service.listVersions(req.params.id);
      return reply.code(200).send({
        versions: versions.map((v) => ({
          id: v.id,
          version: v.version,
          description: v.description,
          createdAt: v.createdAt,
        })),
        total: versions.length,
      });
    });

    app.post<{ Params: CriteriaParams; Body: { description?: string | null } }>(
      "/criteria/:id/versions",
      async (req, reply) => {
        const description = isRecord(req.body) && typeof req.body.description === "string" ? req.body.description : null;
        const version = await service.createVersion(req.params.id, description);
        return reply.code(201).send(version);
      }
    );

    // Registered before /:version
    app.get<{ Params: CriteriaParams; Querystring: { from?: string; to?: string } }>(
      "/criteria/:id/versions/compare",
      async (req, reply) => {
        const from = versionNumber(req.query.from);
        const to = versionNumber(req.query.to);
        if (from === null) return badVersion(reply, "from");
        if (to === null) return badVersion(reply, "to");
        return reply.code(200).send(await service.compareVersions(req.params.id, from, to));
      }
    );

    app.get<{ Params: VersionParams }>("/criteria/:id/versions/:version", async (req, reply) => {
      const version = versionNumber(req.params.version);
      if (version === null) return badVersion(reply, "version");

      const stored = await service.getVersion(req.params.id, version);
      if (!stored) {
        return reply.code(404).send({ error: "not_found", message: `Version ${version} not found` });
      }
      return reply.code(200).send(stored);
    });

    app.post<{ Params: VersionParams; Body: { data: Record<string, unknown>; persist?: boolean } }>(
      "/criteria/:id/versions/:version/evaluate",
      async (req, reply) => {
        const version = versionNumber(req.params.version);
        if (version === null) return badVersion(reply, "version");
        if (!isRecord(req.body) || !isRecord(req.body.data)) {
          return reply.code(400).send({ error: "missing_required_fields", message: "data must be an object" });
        }
        const persist = typeof req.body.persist === "boolean" ? req.body.persist : undefined;
        const result = await service.evaluateVersion(req.params.id, version, req.body.data, { persist });
        return reply.code(200).send(result);
      }
    );
  };
}
