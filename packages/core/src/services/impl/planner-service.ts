import { FollowUpAction } from '@inbox-triage/config';
import type { ClassificationResult } from '../../types/classification.js';
import { type ResponseRecord, ResponseStatus } from '../../types/response.js';
import type { Category } from '../../types/taxonomy.js';
import type { IFollowUpPlanner } from '../planner.js';

const REVIEW_ONLY: readonly FollowUpAction[] = Object.freeze([FollowUpAction.FLAG_FOR_REVIEW]);
const NONE: readonly FollowUpAction[] = Object.freeze([]);

/**
 * Rule-based follow-up planning from the configured per-category table
 */
export class FollowUpPlanner implements IFollowUpPlanner {
  private readonly table: ReadonlyMap<Category, readonly FollowUpAction[]>;

  constructor(followUps: Readonly<Record<Category, readonly FollowUpAction[]>>) {
    this.table = new Map(
      Object.entries(followUps).map(([category, actions]): [Category, readonly FollowUpAction[]] => [
        category,
        Object.freeze([...new Set(actions)]),
      ])
    );
  }

  planFollowUps(classification: ClassificationResult, response: ResponseRecord): readonly FollowUpAction[] {
    switch (response.status) {
      case ResponseStatus.SENT:
        return this.table.get(classification.category) ?? NONE;
      case ResponseStatus.NEEDS_REVIEW:
        return REVIEW_ONLY;
      case ResponseStatus.SUPPRESSED:
        return NONE;
    }
  }
}
