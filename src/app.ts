import Fastify, { FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { RateLimiter } from './api/rateLimiter.js';
import { registerRoutes } from './api/routes.js';
import { LiveFeed, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { EventLogger } from './infra/logger.js';
import { createDefaultState } from './infra/storage/defaultState.js';
import { StateStore } from './infra/storage/stateStore.js';
import { LedgerService } from './services/ledgerService.js';
import { Clock, systemClock } from './utils/time.js';

export interface AppContext {
  app: FastifyInstance;
  ledgerService: LedgerService;
  stateStore: StateStore;
  logger: EventLogger;
  rateLimiter: RateLimiter;
  liveFeed: LiveFeed;
}

export interface BuildOptions {
  clock?: Clock;
  /** Milliseconds source for the rate limiter. */
  nowMs?: () => number;
}

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(
    () => createDefaultState(config.ledger),
    config.storage.persist ? config.paths.stateFile : undefined,
  );
  await stateStore.init();

  const logger = new EventLogger(config.storage.logToFile ? config.paths.logFile : undefined);
  await logger.init();

  const clock = options.clock ?? systemClock;
  const ledgerService = new LedgerService(stateStore, logger, config, clock);
  const rateLimiter = new RateLimiter({
    writesPerMinute: config.rateLimit.writesPerMinute,
    nowMs: options.nowMs,
  });

  const liveFeed = await registerWebSocket(app);

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    ledgerService,
    rateLimiter,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      strategies: stateStore.snapshot().strategyOrder.length,
      wsClients: liveFeed.connectedClients(),
      logWriteFailures: logger.writeFailures,
      processPid: process.pid,
    }),
  });

  return {
    app,
    ledgerService,
    stateStore,
    logger,
    rateLimiter,
    liveFeed,
  };
}
