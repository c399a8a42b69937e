// Service implementations
export { PromptBuilder } from './prompt-builder.js';
export { parseJsonFromResponse, parseModelOutput } from './json-output.js';
export { ModelGateway } from './model-gateway.js';
export { KeywordFallback, type KeywordMatch } from './keyword-fallback.js';
export { ClassifierService } from './classifier-service.js';
export { checkGuardrails } from './guardrails.js';
export { fillTemplate, senderDisplayName, type TemplateContext } from './templates.js';
export { ResponseGenerator, type ResponseGeneratorOptions } from './response-generator.js';
export { FollowUpPlanner } from './planner-service.js';
export { IngestionService, createIngestionService, validateEmailRecords } from './ingestion-service.js';
export { MetricsCollector } from './metrics-collector.js';
export { PipelineService, type PipelineDependencies } from './pipeline-service.js';
