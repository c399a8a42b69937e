import { randomUUID } from 'node:crypto';
import { createChildLogger, createLogger, mapWithConcurrency } from '@inbox-triage/utils';
import { type PipelineSettings } from '@inbox-triage/config';
import { ErrorKind, ItemProcessingError } from '../../errors.js';
import type { ClassificationResult } from '../../types/classification.js';
import type { EmailRecord } from '../../types/email.js';
import { reviewResponse } from '../../types/response.js';
import type { PipelineEntry, RunReport } from '../../types/run.js';
import type { Taxonomy } from '../../types/taxonomy.js';
import type { IClassifierService } from '../classifier.js';
import type { IPipeline, RunOptions } from '../pipeline.js';
import type { IFollowUpPlanner } from '../planner.js';
import type { IResponseGenerator } from '../responder.js';
import { MetricsCollector } from './metrics-collector.js';

const logger = createLogger({ service: 'pipeline' });

export interface PipelineDependencies {
  taxonomy: Taxonomy;
  classifier: IClassifierService;
  generator: IResponseGenerator;
  planner: IFollowUpPlanner;
  settings: PipelineSettings;
  now?: () => Date;
}

/**
 * Batch orchestration: classify, respond and plan follow-ups per email, with
 * failures contained to the email that caused them.
 */
export class PipelineService implements IPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(emails: readonly EmailRecord[], options: RunOptions = {}): Promise<RunReport> {
    const runId = options.runId ?? randomUUID();
    const { signal } = options;
    const runLogger = createChildLogger(logger, { runId });
    const collector = new MetricsCollector(this.deps.taxonomy, emails.length);

    runLogger.info({ count: emails.length, concurrency: this.deps.settings.workerConcurrency }, 'Run started');

    const outcomes = await mapWithConcurrency(emails, this.deps.settings.workerConcurrency, async (email) => {
      if (signal?.aborted) {
        return null;
      }
      const entry = await this.processItem(email, signal);
      collector.record(entry);
      return entry;
    });

    const entries: PipelineEntry[] = [];
    const cancelled: string[] = [];
    outcomes.forEach((entry, index) => {
      if (entry) {
        entries.push(entry);
      } else {
        const email = emails[index];
        if (email) cancelled.push(email.id);
      }
    });

    const metrics = collector.snapshot(cancelled.length);
    runLogger.info(
      { processed: metrics.processed, cancelled: metrics.cancelled, errors: metrics.errors },
      signal?.aborted ? 'Run cancelled' : 'Run completed'
    );

    return Object.freeze({
      runId,
      entries: Object.freeze(entries),
      metrics,
      cancelled: Object.freeze(cancelled),
    });
  }

  private async processItem(email: EmailRecord, signal: AbortSignal | undefined): Promise<PipelineEntry> {
    const { classifier, generator, planner } = this.deps;
    let classification: ClassificationResult | null = null;

    try {
      classification = await classifier.classify(email, { signal });
      const response = await generator.generate(email, classification, { signal });
      const followUps = planner.planFollowUps(classification, response);
      return Object.freeze({ emailId: email.id, classification, response, followUps });
    } catch (e) {
      const error = new ItemProcessingError(email.id, e);
      logger.error({ emailId: email.id, err: error }, 'Email processing failed');

      const degraded = classification ?? classifier.fallback(email, ErrorKind.ITEM_PROCESSING);
      const response = reviewResponse(
        { emailId: email.id, category: degraded.category, timestamp: this.now().toISOString() },
        [error.message],
        error.kind
      );
      return Object.freeze({
        emailId: email.id,
        classification: degraded,
        response,
        followUps: planner.planFollowUps(degraded, response),
      });
    }
  }
}
