// Email records as they enter the pipeline. Records are frozen on ingestion
// and never mutated afterwards.

export interface EmailRecord {
  readonly id: string;
  readonly sender: string;
  readonly subject: string;
  readonly body: string;
  readonly receivedAt: Date;
  readonly metadata: Readonly<Record<string, string>>;
}

// Wire shape accepted at the input boundary (JSON files, HTTP bodies)
export interface RawEmailRecord {
  id: string;
  from: string;
  subject: string;
  body: string;
  timestamp: string;
  metadata?: Record<string, string>;
}

export function freezeEmailRecord(record: EmailRecord): EmailRecord {
  return Object.freeze({
    ...record,
    metadata: Object.freeze({ ...record.metadata }),
  });
}
