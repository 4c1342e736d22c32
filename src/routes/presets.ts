// src/routes/presets.ts
// Built-in criteria presets.
//
// Endpoints:
// - GET  /presets          Preset summaries
// - GET  /presets/:key     Full preset
// - POST /presets/:key     Create criteria from a preset

import type { FastifyInstance } from "fastify";
import { createPreset, getPreset, listPresets } from "../criteria";
import type { EligibilityService } from "../service";
import { isRecord } from "./parse";

interface PresetParams {
  key: string;
}

interface CreateFromPresetBody {
  slug?: string;
  passThreshold?: number;
}

export function createPresetRoutes(service: EligibilityService) {
  return async function presetRoutes(app: FastifyInstance) {
    app.get("/presets", async (_req, reply) => {
      const presets = listPresets();
      return reply.code(200).send({ presets, total: presets.length });
    });

    app.get<{ Params: PresetParams }>("/presets/:key", async (req, reply) => {
      const preset = getPreset(req.params.key);
      if (!preset) {
        return reply.code(404).send({ error: "not_found", message: `Preset not found: ${req.params.key}` });
      }
      return reply.code(200).send(preset);
    });

    app.post<{ Params: PresetParams; Body: CreateFromPresetBody | undefined }>(
      "/presets/:key",
      async (req, reply) => {
        const body: CreateFromPresetBody = isRecord(req.body) ? req.body : {};
        const slug = typeof body.slug === "string" && body.slug.trim() ? body.slug.trim() : undefined;

        const builder = createPreset(req.params.key, { slug });
        if (typeof body.passThreshold === "number") builder.passThreshold(body.passThreshold);

        const criteria = await service.createCriteria(builder);
        return reply.code(201).send(criteria);
      }
    );
  };
}
