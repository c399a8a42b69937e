import type { PipelineConfig } from '@inbox-triage/config';
import type { ModelTransport } from '@inbox-triage/integrations';
import { ClassifierService } from './services/impl/classifier-service.js';
import { ModelGateway } from './services/impl/model-gateway.js';
import { PipelineService } from './services/impl/pipeline-service.js';
import { FollowUpPlanner } from './services/impl/planner-service.js';
import { PromptBuilder } from './services/impl/prompt-builder.js';
import { ResponseGenerator } from './services/impl/response-generator.js';
import { type Taxonomy, createTaxonomy } from './types/taxonomy.js';

export interface TriagePipeline {
  taxonomy: Taxonomy;
  gateway: ModelGateway;
  classifier: ClassifierService;
  generator: ResponseGenerator;
  planner: FollowUpPlanner;
  pipeline: PipelineService;
}

export interface TriagePipelineOptions {
  now?: () => Date;
}

/**
 * Wire every component from one configuration record. All workers of the
 * returned pipeline share the same gateway and circuit breaker.
 */
export function createTriagePipeline(
  config: PipelineConfig,
  transport: ModelTransport,
  options: TriagePipelineOptions = {}
): TriagePipeline {
  const taxonomy = createTaxonomy(config.taxonomy);
  const gateway = new ModelGateway(transport, config.gateway);
  const prompts = new PromptBuilder({
    signature: config.responses.signature,
    maxReplyLength: config.guardrails.maxLength,
  });
  const classifier = new ClassifierService(gateway, prompts, taxonomy, config.classification);
  const generator = new ResponseGenerator(gateway, prompts, {
    responses: config.responses,
    guardrails: config.guardrails,
    now: options.now,
  });
  const planner = new FollowUpPlanner(config.responses.followUps);
  const pipeline = new PipelineService({
    taxonomy,
    classifier,
    generator,
    planner,
    settings: config.pipeline,
    now: options.now,
  });

  return { taxonomy, gateway, classifier, generator, planner, pipeline };
}
