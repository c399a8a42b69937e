import { z } from 'zod';
import { type Result, ok, err, createLogger } from '@inbox-triage/utils';
import { type EmailRecord, freezeEmailRecord } from '../../types/email.js';
import {
  type IIngestionService,
  type IngestionError,
  type IngestionResult,
  type RejectedRecord,
  IngestionErrorCode,
} from '../ingestion.js';

const logger = createLogger({ service: 'ingestion-service' });

const rawEmailSchema = z.object({
  id: z.string().trim().min(1),
  from: z.string().trim().email(),
  subject: z.string(),
  body: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  metadata: z.record(z.string(), z.string()).optional(),
});

function readableId(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return null;
}

/**
 * Check every raw record against the email shape. Duplicate ids after the
 * first occurrence are rejected.
 */
export function validateEmailRecords(raw: readonly unknown[]): IngestionResult {
  const accepted: EmailRecord[] = [];
  const rejected: RejectedRecord[] = [];
  const seen = new Set<string>();

  raw.forEach((candidate, index) => {
    const parsed = rawEmailSchema.safeParse(candidate);
    if (!parsed.success) {
      rejected.push({
        index,
        id: readableId(candidate),
        messages: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
      return;
    }

    const record = parsed.data;
    if (seen.has(record.id)) {
      rejected.push({ index, id: record.id, messages: [`id: Duplicate id '${record.id}'`] });
      return;
    }
    seen.add(record.id);

    accepted.push(
      freezeEmailRecord({
        id: record.id,
        sender: record.from,
        subject: record.subject,
        body: record.body,
        receivedAt: new Date(record.timestamp),
        metadata: record.metadata ?? {},
      })
    );
  });

  return { accepted, rejected };
}

/**
 * Input boundary for batches arriving as decoded JSON
 */
export class IngestionService implements IIngestionService {
  ingest(input: unknown): Result<IngestionResult, IngestionError> {
    const records = Array.isArray(input) ? input : null;
    if (!records) {
      return err({ code: IngestionErrorCode.PARSE_ERROR, message: 'Expected a JSON array of email records' });
    }
    if (records.length === 0) {
      return err({ code: IngestionErrorCode.EMPTY_BATCH, message: 'Batch contains no email records' });
    }

    const result = validateEmailRecords(records);
    for (const rejection of result.rejected) {
      logger.warn(rejection, 'Rejected email record');
    }
    logger.info({ accepted: result.accepted.length, rejected: result.rejected.length }, 'Batch ingested');
    return ok(result);
  }
}

export function createIngestionService(): IngestionService {
  return new IngestionService();
}
