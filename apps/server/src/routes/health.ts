import type { FastifyPluginAsync } from 'fastify';
import type { IModelGateway } from '@inbox-triage/core';

export interface HealthRouteOptions {
  gateway: IModelGateway;
  version: string;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  app.get(
    '/',
    {
      schema: {
        tags: ['health'],
        summary: 'Basic health check',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              timestamp: { type: 'string' },
              version: { type: 'string' },
            },
          },
        },
      },
    },
    async () => {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        version: opts.version,
      };
    }
  );

  app.get(
    '/ready',
    {
      schema: {
        tags: ['health'],
        summary: 'Readiness check (model circuit breaker)',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              breaker: { type: 'string' },
              checks: {
                type: 'object',
                properties: {
                  model: { type: 'boolean' },
                },
              },
            },
          },
          503: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              breaker: { type: 'string' },
              checks: { type: 'object', additionalProperties: { type: 'boolean' } },
              error: { type: 'string' },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const breaker = opts.gateway.breakerStats();
      const checks = {
        model: breaker.state !== 'open',
      };

      if (!checks.model) {
        return reply.status(503).send({
          status: 'unhealthy',
          breaker: breaker.state,
          checks,
          error: 'Model circuit breaker is open',
        });
      }

      return {
        status: 'ready',
        breaker: breaker.state,
        checks,
      };
    }
  );

  app.get(
    '/live',
    {
      schema: {
        tags: ['health'],
        summary: 'Liveness check',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
            },
          },
        },
      },
    },
    async () => {
      return { status: 'alive' };
    }
  );
};
