import type { ClassificationResult } from '../types/classification.js';
import type { EmailRecord } from '../types/email.js';
import type { ResponseRecord } from '../types/response.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

// Response generator interface
export interface IResponseGenerator {
  /**
   * Produce the response record for a classified email, routed by the
   * category's response policy
   */
  generate(
    email: EmailRecord,
    classification: ClassificationResult,
    options?: GenerateOptions
  ): Promise<ResponseRecord>;
}
