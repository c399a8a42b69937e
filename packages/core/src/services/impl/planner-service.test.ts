import { describe, it, expect } from 'vitest';
import { FollowUpAction } from '@inbox-triage/config';
import { type ClassificationResult, ClassificationStatus } from '../../types/classification.js';
import { ResponseSource, reviewResponse, sentResponse, suppressedResponse } from '../../types/response.js';
import { FollowUpPlanner } from './planner-service.js';

const planner = new FollowUpPlanner({
  Complaint: [FollowUpAction.CREATE_URGENT_TICKET, FollowUpAction.LOG_FEEDBACK, FollowUpAction.CREATE_URGENT_TICKET],
  Support: [FollowUpAction.CREATE_SUPPORT_TICKET],
});

const classification = (category: string): ClassificationResult => ({
  emailId: 'e1',
  category,
  confidence: 0.9,
  rationale: 'r',
  rawOutput: null,
  attempts: 1,
  status: ClassificationStatus.CONFIDENT,
  failure: null,
});

const fields = (category: string) => ({ emailId: 'e1', category, timestamp: '2024-01-01T00:00:00.000Z' });

describe('FollowUpPlanner', () => {
  it('plans the configured actions for sent responses, once each', () => {
    const actions = planner.planFollowUps(
      classification('Complaint'),
      sentResponse(fields('Complaint'), 'Sorry!', ResponseSource.TEMPLATE)
    );

    expect(actions).toEqual(['create_urgent_ticket', 'log_feedback']);
  });

  it('plans nothing for categories without follow-ups', () => {
    expect(
      planner.planFollowUps(classification('Sales'), sentResponse(fields('Sales'), 'Hi', ResponseSource.MODEL))
    ).toEqual([]);
  });

  it('flags responses that need review', () => {
    expect(
      planner.planFollowUps(classification('Support'), reviewResponse(fields('Support'), ['held'], 'GuardrailFailure'))
    ).toEqual(['flag_for_review']);
  });

  it('plans nothing for suppressed mail', () => {
    expect(planner.planFollowUps(classification('Spam'), suppressedResponse(fields('Spam')))).toEqual([]);
  });
});
