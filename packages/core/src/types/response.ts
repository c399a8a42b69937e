import type { ErrorKind } from '../errors.js';
import type { Category } from './taxonomy.js';

export const ResponseStatus = {
  SENT: 'Sent',
  SUPPRESSED: 'Suppressed',
  NEEDS_REVIEW: 'NeedsReview',
} as const;
export type ResponseStatus = (typeof ResponseStatus)[keyof typeof ResponseStatus];

export const ResponseSource = {
  TEMPLATE: 'template',
  MODEL: 'model',
  NONE: 'none',
} as const;
export type ResponseSource = (typeof ResponseSource)[keyof typeof ResponseSource];

interface ResponseBase {
  readonly emailId: string;
  readonly category: Category;
  readonly source: ResponseSource;
  readonly issues: readonly string[];
  readonly failure: ErrorKind | null;
  readonly timestamp: string;
}

export interface SentResponse extends ResponseBase {
  readonly status: typeof ResponseStatus.SENT;
  readonly text: string;
}

export interface SuppressedResponse extends ResponseBase {
  readonly status: typeof ResponseStatus.SUPPRESSED;
  readonly text: null;
}

export interface ReviewResponse extends ResponseBase {
  readonly status: typeof ResponseStatus.NEEDS_REVIEW;
  readonly text: null;
}

export type ResponseRecord = SentResponse | SuppressedResponse | ReviewResponse;

interface ResponseFields {
  emailId: string;
  category: Category;
  timestamp: string;
}

export function sentResponse(fields: ResponseFields, text: string, source: ResponseSource): SentResponse {
  return Object.freeze({
    ...fields,
    status: ResponseStatus.SENT,
    text,
    source,
    issues: Object.freeze([]),
    failure: null,
  });
}

export function suppressedResponse(fields: ResponseFields): SuppressedResponse {
  return Object.freeze({
    ...fields,
    status: ResponseStatus.SUPPRESSED,
    text: null,
    source: ResponseSource.NONE,
    issues: Object.freeze([]),
    failure: null,
  });
}

export function reviewResponse(
  fields: ResponseFields,
  issues: readonly string[],
  failure: ErrorKind | null,
  source: ResponseSource = ResponseSource.NONE
): ReviewResponse {
  return Object.freeze({
    ...fields,
    status: ResponseStatus.NEEDS_REVIEW,
    text: null,
    source,
    issues: Object.freeze([...issues]),
    failure,
  });
}
