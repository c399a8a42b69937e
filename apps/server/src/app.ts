import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { createLogger } from '@inbox-triage/utils';
import { type Env, type PipelineConfig, getEnv } from '@inbox-triage/config';
import type { ModelTransport } from '@inbox-triage/integrations';
import { createIngestionService, createTriagePipeline } from '@inbox-triage/core';
import { healthRoutes } from './routes/health.js';
import { runRoutes } from './routes/runs.js';

const logger = createLogger({ service: 'app' });

export interface AppDependencies {
  config: PipelineConfig;
  transport: ModelTransport;
  env?: Env;
}

export async function buildApp(deps: AppDependencies) {
  const env = deps.env ?? getEnv();
  // One pipeline per app: every request shares the gateway's circuit breaker
  const triage = createTriagePipeline(deps.config, deps.transport);

  const app = Fastify({
    logger:
      env.NODE_ENV === 'development'
        ? {
            level: env.LOG_LEVEL,
            transport: {
              target: 'pino-pretty',
              options: { colorize: true },
            },
          }
        : { level: env.LOG_LEVEL },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Security plugins
  await app.register(helmet, {
    contentSecurityPolicy: env.NODE_ENV === 'production',
  });

  await app.register(cors, {
    origin: env.NODE_ENV === 'production' ? false : true,
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // Utility plugin
  await app.register(sensible);

  // API documentation
  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: 'Inbox Triage API',
        description: 'Email classification and automated response pipeline',
        version: env.APP_VERSION,
      },
      servers: [
        {
          url: `http://${env.HOST}:${env.PORT}`,
          description: 'Local server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'runs', description: 'Batch triage runs' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Register routes
  await app.register(healthRoutes, { prefix: '/health', gateway: triage.gateway, version: env.APP_VERSION });
  await app.register(runRoutes, {
    prefix: '/api/runs',
    pipeline: triage.pipeline,
    ingestion: createIngestionService(),
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    logger.error({ err: error, requestId: request.id }, 'Request error');

    if (error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'Invalid request body',
        details: error.validation,
      });
    }

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.name,
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'An error occurred' : error.message,
    });
  });

  return app;
}
