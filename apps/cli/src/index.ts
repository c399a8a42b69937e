import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { createLogger } from '@inbox-triage/utils';
import { getEnv, loadPipelineConfig } from '@inbox-triage/config';
import { createGroqTransport } from '@inbox-triage/integrations';
import { readBatchFile, runBatch, summarize } from './batch.js';

const logger = createLogger({ service: 'cli' });

const defaultBatchPath = fileURLToPath(new URL('../data/sample-emails.json', import.meta.url));

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
    },
  });

  const env = getEnv();
  const batchPath = positionals[0] ?? defaultBatchPath;
  const config = loadPipelineConfig(values.config ?? env.PIPELINE_CONFIG_PATH, (path) =>
    logger.warn({ path }, 'Pipeline config not found, using defaults')
  );

  const input = readBatchFile(batchPath);
  if (!input.ok) {
    logger.error(input.error);
    return 1;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Cancelling run; in-flight emails will finish');
    controller.abort();
  });

  const result = await runBatch(input.value, {
    config,
    transport: createGroqTransport(env),
    logger,
    signal: controller.signal,
  });
  if (!result.ok) {
    logger.error({ code: result.error.code }, result.error.message);
    return 1;
  }

  const { report, rejected, followUpsDispatched } = result.value;
  for (const row of summarize(report)) {
    logger.info(row, 'Processed email');
  }
  for (const entry of report.entries) {
    if (entry.response.text) {
      logger.debug({ emailId: entry.emailId, text: entry.response.text }, 'Response text');
    }
  }

  logger.info(
    {
      runId: report.runId,
      metrics: report.metrics,
      rejected: rejected.length,
      cancelled: report.cancelled,
      followUpsDispatched,
    },
    'Run summary'
  );
  return report.cancelled.length > 0 ? 130 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Batch run failed');
    process.exitCode = 1;
  });
