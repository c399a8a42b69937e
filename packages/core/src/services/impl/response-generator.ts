import { createLogger } from '@inbox-triage/utils';
import { type GuardrailSettings, type ResponseSettings, ResponsePolicy } from '@inbox-triage/config';
import { GuardrailFailure } from '../../errors.js';
import { type ClassificationResult, ClassificationStatus } from '../../types/classification.js';
import type { EmailRecord } from '../../types/email.js';
import {
  type ResponseRecord,
  ResponseSource,
  reviewResponse,
  sentResponse,
  suppressedResponse,
} from '../../types/response.js';
import { type IModelGateway, cancelledBeforeCall } from '../gateway.js';
import type { IPromptBuilder } from '../prompts.js';
import type { GenerateOptions, IResponseGenerator } from '../responder.js';
import { checkGuardrails } from './guardrails.js';
import { fillTemplate } from './templates.js';

const logger = createLogger({ service: 'response-generator' });

export interface ResponseGeneratorOptions {
  responses: ResponseSettings;
  guardrails: GuardrailSettings;
  now?: () => Date;
}

interface RecordFields {
  emailId: string;
  category: string;
  timestamp: string;
}

/**
 * Category-routed response synthesis. Only ModelDraft categories reach the
 * model, and only for classifications that did not come from the fallback.
 */
export class ResponseGenerator implements IResponseGenerator {
  private readonly now: () => Date;

  constructor(
    private readonly gateway: IModelGateway,
    private readonly prompts: IPromptBuilder,
    private readonly options: ResponseGeneratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async generate(
    email: EmailRecord,
    classification: ClassificationResult,
    options: GenerateOptions = {}
  ): Promise<ResponseRecord> {
    const { category } = classification;
    const fields: RecordFields = { emailId: email.id, category, timestamp: this.now().toISOString() };

    if (classification.status === ClassificationStatus.FALLBACK) {
      return reviewResponse(fields, ['Classification fell back to the keyword heuristic'], null);
    }

    const policy = this.options.responses.policies[category];
    switch (policy) {
      case undefined:
        logger.warn({ emailId: email.id, category }, 'No response policy for category');
        return reviewResponse(fields, [`No response policy for category '${category}'`], null);

      case ResponsePolicy.SUPPRESS:
        return suppressedResponse(fields);

      case ResponsePolicy.TEMPLATE_REPLY: {
        const template = this.options.responses.templates[category];
        if (!template) {
          return reviewResponse(fields, [`No template for category '${category}'`], null);
        }
        const text = fillTemplate(template, { email, category, signature: this.options.responses.signature });
        return sentResponse(fields, text, ResponseSource.TEMPLATE);
      }

      case ResponsePolicy.MODEL_DRAFT:
        return this.draft(email, fields, options);
    }
  }

  private async draft(email: EmailRecord, fields: RecordFields, options: GenerateOptions): Promise<ResponseRecord> {
    const prompt = this.prompts.buildResponsePrompt(email, fields.category);
    const result = await this.gateway.invoke(prompt, { signal: options.signal });

    if (!result.ok) {
      if (cancelledBeforeCall(result.error)) {
        logger.info({ emailId: email.id }, 'Run cancelled before the reply was drafted');
        return reviewResponse(fields, ['Run cancelled before the reply was drafted'], null);
      }
      const { error } = result.error;
      logger.warn({ emailId: email.id, error: error.kind }, 'Reply draft failed');
      return reviewResponse(fields, [error.message], error.kind, ResponseSource.MODEL);
    }

    const text = result.value.value.reply.trim();
    const violations = checkGuardrails(text, email, this.options.guardrails);
    if (violations.length > 0) {
      const failure = new GuardrailFailure(violations);
      logger.warn({ emailId: email.id, rules: violations.map((v) => v.rule) }, failure.message);
      return reviewResponse(
        fields,
        violations.map((v) => v.message),
        failure.kind,
        ResponseSource.MODEL
      );
    }

    return sentResponse(fields, text, ResponseSource.MODEL);
  }
}
