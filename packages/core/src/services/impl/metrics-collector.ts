import { ErrorKind } from '../../errors.js';
import { ClassificationStatus } from '../../types/classification.js';
import { ResponseStatus } from '../../types/response.js';
import type { PipelineEntry, RunMetrics } from '../../types/run.js';
import type { Taxonomy } from '../../types/taxonomy.js';

/**
 * Single aggregation point for a run. Every update is synchronous, so
 * concurrent workers cannot lose increments.
 */
export class MetricsCollector {
  private processed = 0;
  private confidenceSum = 0;
  private readonly byCategory: Record<string, number> = {};
  private readonly byClassificationStatus: Record<ClassificationStatus, number> = {
    [ClassificationStatus.CONFIDENT]: 0,
    [ClassificationStatus.LOW_CONFIDENCE]: 0,
    [ClassificationStatus.FALLBACK]: 0,
  };
  private readonly byResponseStatus: Record<ResponseStatus, number> = {
    [ResponseStatus.SENT]: 0,
    [ResponseStatus.SUPPRESSED]: 0,
    [ResponseStatus.NEEDS_REVIEW]: 0,
  };
  private readonly errors: Record<ErrorKind, number> = {
    [ErrorKind.TRANSIENT_API]: 0,
    [ErrorKind.PERMANENT_API]: 0,
    [ErrorKind.VALIDATION]: 0,
    [ErrorKind.CIRCUIT_OPEN]: 0,
    [ErrorKind.GUARDRAIL]: 0,
    [ErrorKind.ITEM_PROCESSING]: 0,
  };

  constructor(
    taxonomy: Taxonomy,
    private readonly total: number
  ) {
    for (const label of taxonomy.labels) {
      this.byCategory[label] = 0;
    }
  }

  record(entry: PipelineEntry): void {
    const { classification, response } = entry;
    this.processed++;
    this.confidenceSum += classification.confidence;
    this.byCategory[classification.category] = (this.byCategory[classification.category] ?? 0) + 1;
    this.byClassificationStatus[classification.status]++;
    this.byResponseStatus[response.status]++;

    // An item counts each distinct failure kind once
    const kinds = new Set<ErrorKind>();
    if (classification.failure) kinds.add(classification.failure);
    if (response.failure) kinds.add(response.failure);
    for (const kind of kinds) {
      this.errors[kind]++;
    }
  }

  snapshot(cancelled: number): RunMetrics {
    return Object.freeze({
      total: this.total,
      processed: this.processed,
      cancelled,
      byCategory: Object.freeze({ ...this.byCategory }),
      byClassificationStatus: Object.freeze({ ...this.byClassificationStatus }),
      byResponseStatus: Object.freeze({ ...this.byResponseStatus }),
      errors: Object.freeze({ ...this.errors }),
      averageConfidence: this.processed > 0 ? this.confidenceSum / this.processed : 0,
    });
  }
}
