import type { FollowUpAction } from '@inbox-triage/config';
import type { ClassificationResult } from '../types/classification.js';
import type { ResponseRecord } from '../types/response.js';

// Follow-up planner interface
export interface IFollowUpPlanner {
  /**
   * Work to hand to downstream systems for a processed email. Planned only;
   * the pipeline never executes it.
   */
  planFollowUps(classification: ClassificationResult, response: ResponseRecord): readonly FollowUpAction[];
}
