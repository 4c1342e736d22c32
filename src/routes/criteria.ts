// src/routes/criteria.ts
// Criteria and rule management.
//
// Endpoints:
// - GET    /criteria                      List criteria
// - POST   /criteria                      Create criteria (rules and groups inline)
// - GET    /criteria/:id                  Criteria with its definition
// - PATCH  /criteria/:id                  Update attributes
// - DELETE /criteria/:id                  Delete criteria and its history
// - POST   /criteria/:id/activate         Activate
// - POST   /criteria/:id/deactivate       Deactivate
// - GET    /criteria/:id/rules            List rules
// - POST   /criteria/:id/rules            Append a standalone rule
// - PATCH  /criteria/:id/rules/:ruleId    Update a rule
// - DELETE /criteria/:id/rules/:ruleId    Remove a rule
//
// :id is a criteria id or slug.

import type { FastifyInstance } from "fastify";
import { toDecisionTiers, type CriteriaInput, type RuleInput } from "../criteria";
import { isScoringMethod, type DecisionTier, type GroupCombination } from "../engine";
import { ConfigurationError } from "../errors";
import type { EligibilityService, RulePatch } from "../service";
import type { UpdateCriteriaInput } from "../store";
import { isRecord, parseBoolean } from "./parse";

/* ---------- Types ---------- */

interface CriteriaParams {
  id: string;
}

interface RuleParams extends CriteriaParams {
  ruleId: string;
}

interface ListCriteriaQuery {
  active?: string; // "true" or "false"
  type?: string;
  category?: string;
}

interface UpdateCriteriaBody {
  name?: string;
  description?: string | null;
  isActive?: boolean;
  type?: string | null;
  group?: string | null;
  category?: string | null;
  tags?: string[];
  meta?: Record<string, unknown>;
  passThreshold?: number | null;
  scoringMethod?: string | null;
  decisionThresholds?: Record<string, string> | DecisionTier[];
  groupCombination?: GroupCombination | null;
}

/* ---------- Helpers ---------- */

function toCriteriaUpdate(body: UpdateCriteriaBody): UpdateCriteriaInput {
  const { scoringMethod, decisionThresholds, ...rest } = body;
  const update: UpdateCriteriaInput = { ...rest };

  if (rest.name !== undefined && (typeof rest.name !== "string" || rest.name.trim() === "")) {
    throw new ConfigurationError("Criteria name must not be empty", "name");
  }
  if (scoringMethod !== undefined) {
    if (scoringMethod !== null && !isScoringMethod(scoringMethod)) {
      throw new ConfigurationError(`Unknown scoring method "${scoringMethod}"`, "scoringMethod");
    }
    update.scoringMethod = scoringMethod;
  }
  if (decisionThresholds !== undefined) {
    update.decisionThresholds = toDecisionTiers(decisionThresholds);
  }
  return update;
}

/* ---------- Routes ---------- */

export function createCriteriaRoutes(service: EligibilityService) {
  return async function criteriaRoutes(app: FastifyInstance) {
    app.get<{ Querystring: ListCriteriaQuery }>("/criteria", async (req, reply) => {
      const { active, type, category } = req.query;
      const activeFilter = parseBoolean(active);

      const all = await service.listCriteria({ activeOnly: activeFilter === true, type, category });
      // active=false lists only inactive criteria
      const criteria = activeFilter === false ? all.filter((c) => !c.isActive) : all;

      return reply.code(200).send({ criteria, total: criteria.length });
    });

    app.post<{ Body: CriteriaInput }>("/criteria", async (req, reply) => {
      const body = req.body;
      if (!isRecord(body) || typeof body.name !== "string" || !body.name.trim()) {
        return reply.code(400).send({
          error: "missing_required_fields",
          message: "name is required and must be a non-empty string",
        });
      }
      if (body.rules !== undefined && !Array.isArray(body.rules)) {
        return reply.code(400).send({ error: "invalid_rules", message: "rules must be an array" });
      }
      if (body.groups !== undefined && !Array.isArray(body.groups)) {
        return reply.code(400).send({ error: "invalid_groups", message: "groups must be an array" });
      }

      const criteria = await service.createCriteria(body);
      return reply.code(201).send(criteria);
    });

    app.get<{ Params: CriteriaParams }>("/criteria/:id", async (req, reply) => {
      return reply.code(200).send(await service.getCriteria(req.params.id));
    });

    app.patch<{ Params: CriteriaParams; Body: UpdateCriteriaBody }>("/criteria/:id", async (req, reply) => {
      if (!isRecord(req.body)) {
        return reply.code(400).send({ error: "invalid_body", message: "Body must be a JSON object" });
      }
      const criteria = await service.updateCriteria(req.params.id, toCriteriaUpdate(req.body));
      return reply.code(200).send(criteria);
    });

    app.delete<{ Params: CriteriaParams }>("/criteria/:id", async (req, reply) => {
      await service.deleteCriteria(req.params.id);
      return reply.code(204).send();
    });

    app.post<{ Params: CriteriaParams }>("/criteria/:id/activate", async (req, reply) => {
      return reply.code(200).send(await service.setActive(req.params.id, true));
    });

    app.post<{ Params: CriteriaParams }>("/criteria/:id/deactivate", async (req, reply) => {
      return reply.code(200).send(await service.setActive(req.params.id, false));
    });

    /* ---------- Rules ---------- */

    app.get<{ Params: CriteriaParams }>("/criteria/:id/rules", async (req, reply) => {
      const rules = await service.listRules(req.params.id);
      return reply.code(200).send({ rules, total: rules.length });
    });

    app.post<{ Params: CriteriaParams; Body: RuleInput }>("/criteria/:id/rules", async (req, reply) => {
      const body = req.body;
      if (!isRecord(body) || typeof body.field !== "string" || typeof body.operator !== "string") {
        return reply.code(400).send({
          error: "missing_required_fields",
          message: "field and operator are required",
        });
      }
      const rule = await service.addRule(req.params.id, body);
      return reply.code(201).send(rule);
    });

    app.patch<{ Params: RuleParams; Body: RulePatch }>("/criteria/:id/rules/:ruleId", async (req, reply) => {
      if (!isRecord(req.body)) {
        return reply.code(400).send({ error: "invalid_body", message: "Body must be a JSON object" });
      }
      const rule = await service.updateRule(req.params.id, req.params.ruleId, req.body);
      return reply.code(200).send(rule);
    });

    app.delete<{ Params: RuleParams }>("/criteria/:id/rules/:ruleId", async (req, reply) => {
      await service.removeRule(req.params.id, req.params.ruleId);
      return reply.code(204).send();
    });
  };
}
