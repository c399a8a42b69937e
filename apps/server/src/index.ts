import { createLogger } from '@inbox-triage/utils';
import { getEnv, loadPipelineConfig } from '@inbox-triage/config';
import { createGroqTransport } from '@inbox-triage/integrations';
import { buildApp } from './app.js';

const logger = createLogger({ service: 'server' });

async function main() {
  const env = getEnv();
  const config = loadPipelineConfig(env.PIPELINE_CONFIG_PATH, (path) =>
    logger.warn({ path }, 'Pipeline config not found, using defaults')
  );
  const app = await buildApp({ config, transport: createGroqTransport(env), env });

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  await app.listen({
    host: env.HOST,
    port: env.PORT,
  });
  logger.info({ host: env.HOST, port: env.PORT }, 'Server started');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
