import { z } from 'zod';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import YAML from 'yaml';

export const FALLBACK_CATEGORY = 'Other';

// Per-category response policies
export const ResponsePolicy = {
  SUPPRESS: 'Suppress',
  TEMPLATE_REPLY: 'TemplateReply',
  MODEL_DRAFT: 'ModelDraft',
} as const;
export type ResponsePolicy = (typeof ResponsePolicy)[keyof typeof ResponsePolicy];

// Follow-up work planned for a processed email; never executed by the pipeline
export const FollowUpAction = {
  CREATE_URGENT_TICKET: 'create_urgent_ticket',
  CREATE_SUPPORT_TICKET: 'create_support_ticket',
  NOTIFY_SALES: 'notify_sales',
  LOG_FEEDBACK: 'log_feedback',
  FLAG_FOR_REVIEW: 'flag_for_review',
} as const;
export type FollowUpAction = (typeof FollowUpAction)[keyof typeof FollowUpAction];

const responsePolicySchema = z.enum(['Suppress', 'TemplateReply', 'ModelDraft']);
const followUpActionSchema = z.enum([
  'create_urgent_ticket',
  'create_support_ticket',
  'notify_sales',
  'log_feedback',
  'flag_for_review',
]);

const categoryDefinitionSchema = z.object({
  label: z.string().trim().min(1),
  description: z.string().min(1),
});
export type CategoryDefinition = z.infer<typeof categoryDefinitionSchema>;

const classificationSettingsSchema = z.object({
  confidenceThreshold: z.number().min(0).max(1).default(0.6),
  fallbackConfidence: z.number().min(0).max(1).default(0.1),
  keywords: z.record(z.string(), z.array(z.string().trim().min(1))).default({}),
});
export type ClassificationSettings = z.infer<typeof classificationSettingsSchema>;

const gatewaySettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  requestTimeoutMs: z.number().int().min(1).default(30000),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(10000),
  multiplier: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0.2),
  breakerThreshold: z.number().int().min(1).default(5),
  breakerCooldownMs: z.number().int().min(0).default(30000),
});
export type GatewaySettings = z.infer<typeof gatewaySettingsSchema>;

const pipelineSettingsSchema = z.object({
  workerConcurrency: z.number().int().min(1).default(4),
});
export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;

const responseSettingsSchema = z.object({
  signature: z.string().default('Customer Care Team'),
  policies: z.record(z.string(), responsePolicySchema),
  templates: z.record(z.string(), z.string().min(1)).default({}),
  followUps: z.record(z.string(), z.array(followUpActionSchema)).default({}),
});
export type ResponseSettings = z.infer<typeof responseSettingsSchema>;

const guardrailSettingsSchema = z.object({
  maxLength: z.number().int().min(1).default(1500),
  sensitiveMetadataKeys: z.array(z.string().min(1)).default([]),
});
export type GuardrailSettings = z.infer<typeof guardrailSettingsSchema>;

const pipelineConfigSchema = z
  .object({
    version: z.string(),
    taxonomy: z.array(categoryDefinitionSchema).min(1),
    classification: classificationSettingsSchema.default({}),
    gateway: gatewaySettingsSchema.default({}),
    pipeline: pipelineSettingsSchema.default({}),
    responses: responseSettingsSchema,
    guardrails: guardrailSettingsSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const labels = config.taxonomy.map((c) => c.label);
    const known = new Set(labels);

    if (known.size !== labels.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['taxonomy'], message: 'Category labels must be unique' });
    }
    if (!known.has(FALLBACK_CATEGORY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['taxonomy'],
        message: `Taxonomy must include the catch-all category '${FALLBACK_CATEGORY}'`,
      });
    }

    const keyedTables: Array<[string[], Record<string, unknown>]> = [
      [['classification', 'keywords'], config.classification.keywords],
      [['responses', 'policies'], config.responses.policies],
      [['responses', 'templates'], config.responses.templates],
      [['responses', 'followUps'], config.responses.followUps],
    ];
    for (const [path, table] of keyedTables) {
      for (const key of Object.keys(table)) {
        if (!known.has(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, key], message: `Unknown category '${key}'` });
        }
      }
    }

    for (const label of labels) {
      const policy = config.responses.policies[label];
      if (!policy) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['responses', 'policies'],
          message: `Missing response policy for category '${label}'`,
        });
      } else if (policy === ResponsePolicy.TEMPLATE_REPLY && !config.responses.templates[label]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['responses', 'templates'],
          message: `Category '${label}' uses TemplateReply but has no template`,
        });
      }
    }
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export class PipelineConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

const defaultConfigPath = fileURLToPath(new URL('../defaults/pipeline.yaml', import.meta.url));

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PipelineConfigError(`Invalid pipeline configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function readYamlConfig(configPath: string): PipelineConfig {
  const fileContent = fs.readFileSync(configPath, 'utf-8');
  return parsePipelineConfig(YAML.parse(fileContent));
}

/**
 * Built-in configuration shipped with this package.
 */
export function getDefaultPipelineConfig(): PipelineConfig {
  return readYamlConfig(defaultConfigPath);
}

/**
 * Load a YAML configuration file. A missing file falls back to the defaults;
 * an invalid one throws PipelineConfigError.
 */
export function loadPipelineConfig(
  configPath?: string,
  onMissing?: (path: string) => void
): PipelineConfig {
  if (!configPath) {
    return getDefaultPipelineConfig();
  }

  if (!fs.existsSync(configPath)) {
    onMissing?.(configPath);
    return getDefaultPipelineConfig();
  }

  return readYamlConfig(configPath);
}
