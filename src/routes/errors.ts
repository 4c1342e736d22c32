// src/routes/errors.ts
// Maps domain errors onto HTTP responses: { error, message, ...details }.

import type { FastifyError, FastifyInstance } from "fastify";
import {
  ConfigurationError,
  CriteriaNotFoundError,
  ExtractionError,
  InputValidationError,
  WorkflowCallbackError,
} from "../errors";
import { createLogger } from "../observability";

const log = createLogger("routes/errors");

export interface ErrorBody {
  error: string;
  message: string;
  [key: string]: unknown;
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof CriteriaNotFoundError) {
    return { status: 404, body: { error: "not_found", message: err.message } };
  }
  if (err instanceof InputValidationError) {
    return { status: 422, body: { error: "invalid_input", message: err.message, violations: err.errors } };
  }
  if (err instanceof ConfigurationError) {
    return { status: 400, body: { error: "invalid_criteria", message: err.message, path: err.path } };
  }
  if (err instanceof ExtractionError) {
    return { status: 422, body: { error: "extraction_failed", message: err.message, field: err.field } };
  }
  if (err instanceof WorkflowCallbackError) {
    return { status: 500, body: { error: "workflow_failed", message: err.message } };
  }
  return { status: 500, body: { error: "internal_error", message: "Internal server error" } };
}

function isClientError(err: FastifyError): boolean {
  return typeof err.statusCode === "number" && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    // Malformed JSON, oversized bodies and the like
    if (isClientError(err)) {
      return reply.code(err.statusCode ?? 400).send({ error: "bad_request", message: err.message });
    }

    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      log.error({ err, requestId: req.id, url: req.url }, "Unhandled route error");
    }
    return reply.code(status).send(body);
  });
}
