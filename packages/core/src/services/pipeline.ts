import type { EmailRecord } from '../types/email.js';
import type { RunReport } from '../types/run.js';

export interface RunOptions {
  signal?: AbortSignal;
  // Correlates log lines for one run; generated when omitted
  runId?: string;
}

// Pipeline interface
export interface IPipeline {
  /**
   * Classify and respond to every email on a bounded worker pool. Resolves
   * with partial results when cancelled; never rejects for a single item.
   */
  run(emails: readonly EmailRecord[], options?: RunOptions): Promise<RunReport>;
}
