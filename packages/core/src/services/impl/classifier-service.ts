import { createLogger } from '@inbox-triage/utils';
import type { ClassificationSettings } from '@inbox-triage/config';
import { type ErrorKind, errorKindOf } from '../../errors.js';
import { type ClassificationResult, ClassificationStatus } from '../../types/classification.js';
import type { EmailRecord } from '../../types/email.js';
import type { Taxonomy } from '../../types/taxonomy.js';
import type { ClassifyOptions, FallbackAudit, IClassifierService } from '../classifier.js';
import { type IModelGateway, cancelledBeforeCall } from '../gateway.js';
import type { IPromptBuilder } from '../prompts.js';
import { KeywordFallback } from './keyword-fallback.js';

const logger = createLogger({ service: 'classifier-service' });

/**
 * Model-backed classification with a keyword heuristic behind it
 */
export class ClassifierService implements IClassifierService {
  private readonly keywords: KeywordFallback;

  constructor(
    private readonly gateway: IModelGateway,
    private readonly prompts: IPromptBuilder,
    private readonly taxonomy: Taxonomy,
    private readonly settings: ClassificationSettings
  ) {
    this.keywords = new KeywordFallback(taxonomy, settings.keywords);
  }

  async classify(email: EmailRecord, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    logger.debug({ emailId: email.id }, 'Classifying email');

    try {
      const prompt = this.prompts.buildClassificationPrompt(email, this.taxonomy);
      const result = await this.gateway.invoke(prompt, { signal: options.signal });

      if (!result.ok) {
        const { error, attempts, rawOutput } = result.error;
        if (cancelledBeforeCall(result.error)) {
          logger.info({ emailId: email.id }, 'Run cancelled before classification, using keyword fallback');
          return this.fallback(email, null, { attempts, rawOutput });
        }
        logger.warn({ emailId: email.id, error: error.kind, attempts }, 'Classification failed, using keyword fallback');
        return this.fallback(email, error.kind, { attempts, rawOutput });
      }

      const { value, rawOutput, attempts } = result.value;
      const status =
        value.confidence >= this.settings.confidenceThreshold
          ? ClassificationStatus.CONFIDENT
          : ClassificationStatus.LOW_CONFIDENCE;

      logger.info(
        { emailId: email.id, category: value.category, confidence: value.confidence, status, attempts },
        'Email classified'
      );

      return Object.freeze({
        emailId: email.id,
        category: value.category,
        confidence: value.confidence,
        rationale: value.rationale,
        rawOutput,
        attempts,
        status,
        failure: null,
      });
    } catch (e) {
      logger.error({ emailId: email.id, err: e }, 'Unexpected classification error');
      return this.fallback(email, errorKindOf(e));
    }
  }

  fallback(email: EmailRecord, failure: ErrorKind | null, audit: FallbackAudit = {}): ClassificationResult {
    const match = this.keywords.match(email);
    const cause = failure ?? 'cancellation';
    const rationale =
      match.hits.length > 0
        ? `Keyword fallback after ${cause}: matched ${match.hits.join(', ')}`
        : `Keyword fallback after ${cause}: no keywords matched`;

    return Object.freeze({
      emailId: email.id,
      category: match.category,
      confidence: this.settings.fallbackConfidence,
      rationale,
      rawOutput: audit.rawOutput ?? null,
      attempts: audit.attempts ?? 0,
      status: ClassificationStatus.FALLBACK,
      failure,
    });
  }
}
