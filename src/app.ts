import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config/env.js';
import { AppError } from './common/errors.js';
import { systemClock, type Clock } from './common/runtime.js';
import { GoesFeedClient } from './modules/goes-feed/goes-feed.client.js';
import type { FeedClient } from './modules/goes-feed/goes-feed.types.js';
import { scoreFlareRisk } from './modules/flare-model/flare-risk.scorer.js';
import { createModelRegistry } from './modules/flare-model/model.registry.js';
import type { ModelRegistry, ScoringFunction } from './modules/flare-model/flare-model.types.js';
import { registerObservationRoutes } from './modules/observations/observation.routes.js';
import type { Observation } from './modules/observations/observation.types.js';
import { registerPredictionRoutes } from './modules/predictions/prediction.routes.js';
import type { Prediction } from './modules/predictions/prediction.types.js';
import { FlarePredictionPipeline } from './modules/pipeline/pipeline.orchestrator.js';
import { registerPipelineRoutes } from './modules/pipeline/pipeline.routes.js';
import { createSchedulerAuthVerifier, type SchedulerAuthVerifier } from './modules/pipeline/scheduler.auth.js';
import type { TimeSeriesStore } from './modules/storage/timeseries.store.js';

/**
 * Collaborators the app is built from. Stores are required; everything else
 * defaults to the production implementation selected by config.
 */
export interface AppServices {
  observations: TimeSeriesStore<Observation>;
  predictions: TimeSeriesStore<Prediction>;
  feed?: FeedClient;
  models?: ModelRegistry;
  score?: ScoringFunction;
  verifier?: SchedulerAuthVerifier;
  clock?: Clock;
}

/**
 * Build Fastify Application
 */
export function buildApp(config: AppConfig, services: AppServices): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    trustProxy: true,
  });

  const clock = services.clock ?? systemClock;

  // CORS
  app.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.warn({ code: err.code, statusCode: err.statusCode }, err.message);

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  // Health
  app.get('/', async () => ({
    status: 'ok',
    message: 'Solar Flare Predictor API is running.',
  }));

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: clock.utcNow().toISOString(),
  }));

  app.register(async (fastify) => {
    const requests = config.requests;

    await registerObservationRoutes(fastify, { store: services.observations, requests, clock });
    await registerPredictionRoutes(fastify, { store: services.predictions, requests, clock });

    const pipeline = new FlarePredictionPipeline({
      observations: services.observations,
      predictions: services.predictions,
      feed:
        services.feed ??
        new GoesFeedClient({
          baseUrl: config.feed.baseUrl,
          energyChannel: config.feed.energyChannel,
          timeoutMs: config.feed.timeoutMs,
          logger: fastify.log,
          clock,
        }),
      models: services.models ?? createModelRegistry(config.model.artifactPath),
      score: services.score ?? scoreFlareRisk,
      config: config.pipeline,
      logger: fastify.log,
      clock,
    });

    await registerPipelineRoutes(fastify, {
      pipeline,
      verifier: services.verifier ?? createSchedulerAuthVerifier(config.schedulerAuth),
    });
  });

  return app;
}
