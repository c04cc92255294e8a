import fs from 'node:fs';
import path from 'node:path';
import { createDb, type Db } from './adapters/db.js';
import { createGateway, type MessageGateway } from './adapters/gateway.js';
import type { DecisionEngine } from './agent/decision.js';
import { createDecisionEngine } from './agent/engine_factory.js';
import type { AppConfig } from './config.js';
import { createAdmin } from './engine/admin.js';
import { createBroadcaster } from './engine/broadcast.js';
import { createContextAssembler } from './engine/context.js';
import { createDispatchExecutor } from './engine/dispatch.js';
import { createIdentityResolver } from './engine/identity.js';
import { createInboundRouter } from './engine/inbound_router.js';

export interface AppOverrides {
  db?: Db;
  engine?: DecisionEngine;
  gateway?: MessageGateway;
  now?: () => Date;
}

function openDb(config: AppConfig, now?: () => Date) {
  if (config.databasePath !== ':memory:') fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
  return createDb(config.databasePath, { now });
}

/** Wires every component from one config. Overrides exist for tests and scripts. */
export async function createApp(config: AppConfig, overrides: AppOverrides = {}) {
  const db = overrides.db ?? openDb(config, overrides.now);
  const engine = overrides.engine ?? (await createDecisionEngine(config));
  const gateway = overrides.gateway ?? createGateway(config);
  const identity = createIdentityResolver(db, config.defaultCountry);
  const assembler = createContextAssembler(db, identity, { windowSize: config.contextWindow, now: overrides.now });
  const executor = createDispatchExecutor(db, identity, { timezone: config.timezone, now: overrides.now });

  const router = createInboundRouter({
    db, identity, assembler, executor, engine, gateway,
    timezone: config.timezone,
    defaultLanguage: config.defaultLanguage,
    defaultCountry: config.defaultCountry,
  });
  const broadcaster = createBroadcaster({
    db, assembler, engine, gateway,
    timezone: config.timezone,
    concurrency: config.broadcastConcurrency,
    now: overrides.now,
  });
  const admin = createAdmin(db, identity, { language: config.defaultLanguage, country: config.defaultCountry });

  return { config, db, engine, gateway, identity, assembler, executor, router, broadcaster, admin, close: () => db.close() };
}

export type App = Awaited<ReturnType<typeof createApp>>;
