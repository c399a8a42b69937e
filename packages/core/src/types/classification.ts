import type { ErrorKind } from '../errors.js';
import type { Category } from './taxonomy.js';

export const ClassificationStatus = {
  CONFIDENT: 'Confident',
  LOW_CONFIDENCE: 'LowConfidence',
  FALLBACK: 'Fallback',
} as const;
export type ClassificationStatus = (typeof ClassificationStatus)[keyof typeof ClassificationStatus];

// Classification outcome for one email; created once and never mutated
export interface ClassificationResult {
  readonly emailId: string;
  readonly category: Category;
  readonly confidence: number;
  readonly rationale: string;
  // Last raw model text, kept for audit
  readonly rawOutput: string | null;
  readonly attempts: number;
  readonly status: ClassificationStatus;
  // Why the heuristic was used; null unless status is Fallback, and null for
  // a fallback forced by cancellation
  readonly failure: ErrorKind | null;
}
