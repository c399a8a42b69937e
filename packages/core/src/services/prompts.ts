import type { z } from 'zod';
import type { EmailRecord } from '../types/email.js';
import type { Category, Taxonomy } from '../types/taxonomy.js';

export const PromptKind = {
  CLASSIFICATION: 'classification',
  RESPONSE: 'response',
} as const;
export type PromptKind = (typeof PromptKind)[keyof typeof PromptKind];

export interface ClassificationPayload {
  category: Category;
  confidence: number;
  rationale: string;
}

export interface ResponsePayload {
  reply: string;
}

/**
 * Everything the gateway needs to ask the model for one structured answer.
 * `outputSchema` validates the parsed payload before anyone consumes it.
 */
export interface PromptSpec<T> {
  readonly kind: PromptKind;
  readonly instructions: string;
  readonly content: string;
  readonly schemaDescription: string;
  readonly outputSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface IPromptBuilder {
  buildClassificationPrompt(email: EmailRecord, taxonomy: Taxonomy): PromptSpec<ClassificationPayload>;
  buildResponsePrompt(email: EmailRecord, category: Category): PromptSpec<ResponsePayload>;
}

export interface PromptBuilderOptions {
  signature?: string;
  maxReplyLength?: number;
}
