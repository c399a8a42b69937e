import type { FollowUpAction } from '@inbox-triage/config';
import type { ErrorKind } from '../errors.js';
import type { ClassificationResult, ClassificationStatus } from './classification.js';
import type { ResponseRecord, ResponseStatus } from './response.js';
import type { Category } from './taxonomy.js';

export interface PipelineEntry {
  readonly emailId: string;
  readonly classification: ClassificationResult;
  readonly response: ResponseRecord;
  readonly followUps: readonly FollowUpAction[];
}

// Aggregated over the completed items of one run; read-only to callers
export interface RunMetrics {
  readonly total: number;
  readonly processed: number;
  readonly cancelled: number;
  readonly byCategory: Readonly<Record<Category, number>>;
  readonly byClassificationStatus: Readonly<Record<ClassificationStatus, number>>;
  readonly byResponseStatus: Readonly<Record<ResponseStatus, number>>;
  readonly errors: Readonly<Record<ErrorKind, number>>;
  readonly averageConfidence: number;
}

export interface RunReport {
  readonly runId: string;
  // Completed items, in input order
  readonly entries: readonly PipelineEntry[];
  readonly metrics: RunMetrics;
  // Ids of records never started because the run was cancelled
  readonly cancelled: readonly string[];
}
