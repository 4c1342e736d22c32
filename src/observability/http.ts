// src/observability/http.ts
// Request correlation and access logging for the HTTP API.
//
// - X-Request-ID from upstream is reused, otherwise a fresh id is generated
// - The id is echoed on every response
// - Completion is logged at info, 4xx at warn, 5xx at error

import type { FastifyInstance, FastifyRequest } from "fastify";
import type { IncomingMessage } from "http";
import { nanoid } from "nanoid";
import { createChildLogger, createLogger } from "./logger";

export const REQUEST_ID_HEADER = "x-request-id";
export const REQUEST_ID_LENGTH = 21;

/** For Fastify({ genReqId }) */
export function requestIdGenerator(req: IncomingMessage): string {
  const incomingId = req.headers[REQUEST_ID_HEADER];
  if (typeof incomingId === "string" && incomingId.length > 0) {
    return incomingId;
  }
  return nanoid(REQUEST_ID_LENGTH);
}

const baseLogger = createLogger("http");

// Request start times for duration
const requestStartTimes = new WeakMap<FastifyRequest, number>();

function requestContext(req: FastifyRequest): Record<string, unknown> {
  return { requestId: req.id, method: req.method, url: req.url };
}

export function registerObservability(app: FastifyInstance): void {
  app.addHook("onRequest", async (req, reply) => {
    requestStartTimes.set(req, Date.now());
    reply.header(REQUEST_ID_HEADER, req.id);
    baseLogger.debug(requestContext(req), "request started");
  });

  app.addHook("onResponse", async (req, reply) => {
    const startTime = requestStartTimes.get(req);
    const log = createChildLogger(baseLogger, {
      ...requestContext(req),
      statusCode: reply.statusCode,
      duration: startTime ? Date.now() - startTime : 0,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }
    requestStartTimes.delete(req);
  });
}
