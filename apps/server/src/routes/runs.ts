import type { FastifyPluginAsync } from 'fastify';
import type { IIngestionService, IPipeline } from '@inbox-triage/core';

export interface RunRouteOptions {
  pipeline: IPipeline;
  ingestion: IIngestionService;
}

export const runRoutes: FastifyPluginAsync<RunRouteOptions> = async (app, opts) => {
  // Triage a batch of raw email records
  app.post(
    '/',
    {
      schema: {
        tags: ['runs'],
        summary: 'Classify and respond to a batch of emails',
        body: {
          type: 'array',
          description: 'Raw email records: id, from, subject, body, timestamp, metadata',
        },
      },
    },
    async (request, reply) => {
      const ingested = opts.ingestion.ingest(request.body);
      if (!ingested.ok) {
        return reply.badRequest(ingested.error.message);
      }

      const { accepted, rejected } = ingested.value;
      if (accepted.length === 0) {
        return reply.status(422).send({
          error: 'Unprocessable Entity',
          message: 'No valid email records in batch',
          rejected,
        });
      }

      const report = await opts.pipeline.run(accepted, { runId: request.id });
      return { ...report, rejected };
    }
  );
};
