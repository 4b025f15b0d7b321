import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { LocationAggregatorFactory } from '@traffic-counter/domain';

import type { AppConfig } from './config/env.js';
import { createSensorRouter } from './controllers/sensor.controller.js';
import { createQueryRouter } from './controllers/query.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { AggregatorRegistry } from './services/aggregation/aggregator-registry.js';
import { QueryCoordinator } from './services/aggregation/query-coordinator.js';
import { SensorIngestionService } from './services/sensor-ingestion.service.js';
import { TrafficQueryService } from './services/traffic-query.service.js';

export interface AppContext {
  config: AppConfig;
  registry: AggregatorRegistry;
  ingestion: SensorIngestionService;
  query: TrafficQueryService;
}

export interface AppContextOptions {
  /** Overrides how aggregators are created for new locations. */
  aggregatorFactory?: LocationAggregatorFactory;
}

export function createAppContext(config: AppConfig, opts: AppContextOptions = {}): AppContext {
  const registry = new AggregatorRegistry(opts.aggregatorFactory);
  const coordinator = new QueryCoordinator(registry, { timeoutMs: config.queryTimeoutMs });
  return {
    config,
    registry,
    ingestion: new SensorIngestionService(registry),
    query: new TrafficQueryService(registry, coordinator),
  };
}

export function buildApp(ctx: AppContext): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: ctx.config.corsOrigin }));
  if (ctx.config.httpLogFormat) app.use(morgan(ctx.config.httpLogFormat));
  app.use(express.json({ limit: ctx.config.jsonBodyLimit }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/sensorapi', createSensorRouter(ctx.ingestion));
  app.use('/api', createQueryRouter(ctx.query));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      locations: ctx.registry.size,
      ignoredLabels: ctx.ingestion.ignoredLabelCount,
    });
  });

  // ─── Error handlers (must be last) ──────────────────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/** Wraps the app in an HTTP server and streams location updates over /ws. */
export function buildHttpServer(app: ReturnType<typeof express>, ctx: AppContext) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  ctx.ingestion.setPublisher(wsGateway);
  return { httpServer, wsGateway };
}
