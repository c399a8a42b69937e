import type { Result } from '@inbox-triage/utils';
import type { EmailRecord } from '../types/email.js';

// Ingestion errors
export const IngestionErrorCode = {
  PARSE_ERROR: 'PARSE_ERROR',
  EMPTY_BATCH: 'EMPTY_BATCH',
} as const;
export type IngestionErrorCode = (typeof IngestionErrorCode)[keyof typeof IngestionErrorCode];

export interface IngestionError {
  code: IngestionErrorCode;
  message: string;
}

export interface RejectedRecord {
  index: number;
  // Present when the raw record had a readable string id
  id: string | null;
  messages: string[];
}

export interface IngestionResult {
  accepted: EmailRecord[];
  rejected: RejectedRecord[];
}

// Ingestion service interface
export interface IIngestionService {
  /**
   * Validate a decoded JSON payload into frozen email records. Bad records are
   * rejected individually; only an unusable payload is an error.
   */
  ingest(input: unknown): Result<IngestionResult, IngestionError>;
}
