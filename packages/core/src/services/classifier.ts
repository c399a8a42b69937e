import type { ErrorKind } from '../errors.js';
import type { ClassificationResult } from '../types/classification.js';
import type { EmailRecord } from '../types/email.js';

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export interface FallbackAudit {
  attempts?: number;
  rawOutput?: string | null;
}

// Classifier service interface
export interface IClassifierService {
  /**
   * Classify an email into the taxonomy. Never rejects: any failure yields a
   * keyword-based Fallback result.
   */
  classify(email: EmailRecord, options?: ClassifyOptions): Promise<ClassificationResult>;

  /**
   * Keyword heuristic result, used directly by the pipeline's error boundary.
   * A null failure means the run was cancelled before the model was asked.
   */
  fallback(email: EmailRecord, failure: ErrorKind | null, audit?: FallbackAudit): ClassificationResult;
}
