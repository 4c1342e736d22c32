// src/server.ts
// HTTP API: wires stores, cache, audit and the evaluation service into Fastify.

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AuditLogger } from './audit';
import { EvaluationCache } from './cache';
import { config } from './config';
import { openDatabase, type DbAdapter } from './db';
import { createDefaultRegistry, type MappingRegistry } from './extraction';
import { createLogger, registerObservability, requestIdGenerator } from './observability';
import {
  createAuditRoutes,
  createCriteriaRoutes,
  createEvaluationRoutes,
  createHealthRoutes,
  createPresetRoutes,
  createVersionRoutes,
  registerErrorHandler,
} from './routes';
import { EligibilityService } from './service';
import { createStores } from './store';

const log = createLogger('server');

export interface ServerDeps {
  db: DbAdapter;
  service: EligibilityService;
  audit: AuditLogger;
}

export interface AppContext extends ServerDeps {
  cache: EvaluationCache;
  registry: MappingRegistry;
}

/** Service stack over an open database, configured from env */
export function createContext(db: DbAdapter): AppContext {
  const stores = createStores(db);
  const cache = new EvaluationCache();
  const audit = new AuditLogger(stores.audit);
  const registry = createDefaultRegistry();
  const service = new EligibilityService({ stores, cache, audit, registry });
  return { db, service, audit, cache, registry };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    genReqId: requestIdGenerator,
  });

  registerObservability(app);
  registerErrorHandler(app);
  await app.register(cors, { origin: true });

  app.register(createHealthRoutes(deps.db));
  app.register(createPresetRoutes(deps.service));
  app.register(createCriteriaRoutes(deps.service));
  app.register(createVersionRoutes(deps.service));
  app.register(createEvaluationRoutes(deps.service));
  app.register(createAuditRoutes(deps.service, deps.audit));

  return app;
}

/** Open the configured database and listen on config.server */
export async function start(): Promise<FastifyInstance> {
  const db = await openDatabase();
  const context = createContext(db);
  const app = await buildServer(context);

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    await app.close();
    await db.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  const { port, host } = config.server;
  await app.listen({ port, host });
  log.info({ port, host, dbPath: config.database.path }, 'Eligibility API listening');
  return app;
}

if (require.main === module) {
  start().catch((err) => {
    log.fatal({ err }, 'Server startup failed');
    process.exit(1);
  });
}
