import type { Logger } from '@inbox-triage/utils';
import { FollowUpAction } from '@inbox-triage/config';
import type { PipelineEntry } from '@inbox-triage/core';

export type FollowUpHandler = (entry: PipelineEntry, logger: Logger) => void;

// Stand-ins for ticketing and CRM hooks; each only records what it would do
export const followUpHandlers: Record<FollowUpAction, FollowUpHandler> = {
  [FollowUpAction.CREATE_URGENT_TICKET]: (entry, logger) => {
    logger.info({ emailId: entry.emailId, category: entry.classification.category }, 'Creating urgent ticket');
  },
  [FollowUpAction.CREATE_SUPPORT_TICKET]: (entry, logger) => {
    logger.info({ emailId: entry.emailId }, 'Creating support ticket');
  },
  [FollowUpAction.NOTIFY_SALES]: (entry, logger) => {
    logger.info({ emailId: entry.emailId }, 'Notifying sales team');
  },
  [FollowUpAction.LOG_FEEDBACK]: (entry, logger) => {
    logger.info({ emailId: entry.emailId }, 'Logging customer feedback');
  },
  [FollowUpAction.FLAG_FOR_REVIEW]: (entry, logger) => {
    logger.warn({ emailId: entry.emailId, issues: entry.response.issues }, 'Flagged for manual review');
  },
};

/**
 * Run every planned follow-up of an entry. Returns how many were dispatched.
 */
export function dispatchFollowUps(entry: PipelineEntry, logger: Logger): number {
  for (const action of entry.followUps) {
    followUpHandlers[action](entry, logger);
  }
  return entry.followUps.length;
}
