import * as fs from 'fs';
import { type Result, ok, err, tryCatch, type Logger } from '@inbox-triage/utils';
import type { PipelineConfig } from '@inbox-triage/config';
import type { ModelTransport } from '@inbox-triage/integrations';
import {
  type IngestionError,
  type RejectedRecord,
  type RunReport,
  createIngestionService,
  createTriagePipeline,
} from '@inbox-triage/core';
import { dispatchFollowUps } from './follow-ups.js';

export interface BatchOutcome {
  report: RunReport;
  rejected: RejectedRecord[];
  followUpsDispatched: number;
}

export interface BatchDependencies {
  config: PipelineConfig;
  transport: ModelTransport;
  logger: Logger;
  signal?: AbortSignal;
}

export interface SummaryRow {
  emailId: string;
  category: string;
  classification: string;
  confidence: number;
  response: string;
  followUps: string;
}

/**
 * Read and decode a JSON batch file.
 */
export function readBatchFile(path: string): Result<unknown, string> {
  return tryCatch(
    () => JSON.parse(fs.readFileSync(path, 'utf-8')),
    (e) => `Cannot read batch file ${path}: ${e instanceof Error ? e.message : String(e)}`
  );
}

/**
 * Validate a decoded batch, run it through the pipeline and dispatch the
 * planned follow-ups.
 */
export async function runBatch(
  input: unknown,
  deps: BatchDependencies
): Promise<Result<BatchOutcome, IngestionError>> {
  const ingested = createIngestionService().ingest(input);
  if (!ingested.ok) {
    return err(ingested.error);
  }

  const { accepted, rejected } = ingested.value;
  const { pipeline } = createTriagePipeline(deps.config, deps.transport);
  const report = await pipeline.run(accepted, { signal: deps.signal });

  let followUpsDispatched = 0;
  for (const entry of report.entries) {
    followUpsDispatched += dispatchFollowUps(entry, deps.logger);
  }

  return ok({ report, rejected, followUpsDispatched });
}

export function summarize(report: RunReport): SummaryRow[] {
  return report.entries.map((entry) => ({
    emailId: entry.emailId,
    category: entry.classification.category,
    classification: entry.classification.status,
    confidence: entry.classification.confidence,
    response: entry.response.status,
    followUps: entry.followUps.join(', ') || '-',
  }));
}
