import {
  type GatewaySettings,
  type GuardrailSettings,
  type PipelineConfig,
  type PipelineSettings,
  type ResponseSettings,
  getDefaultPipelineConfig,
} from '@inbox-triage/config';
import { type CompletionRequest, type ModelTransport, PermanentAPIError } from '@inbox-triage/integrations';
import { type EmailRecord, freezeEmailRecord } from '../types/email.js';

export type ScriptStep = string | Error | ((request: CompletionRequest) => Promise<string> | string);

/**
 * In-process stand-in for the remote model. Plays `script` in order, then
 * repeats `otherwise` (or fails permanently when none is given).
 */
export class ScriptedTransport implements ModelTransport {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];
  private readonly script: ScriptStep[];

  constructor(
    script: ScriptStep[] = [],
    private readonly otherwise?: ScriptStep
  ) {
    this.script = [...script];
  }

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const step = this.script.shift() ?? this.otherwise;
    if (step === undefined) {
      throw new PermanentAPIError('Scripted transport has no responses left');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request);
    }
    return step;
  }
}

export const classificationJson = (category: string, confidence: number, rationale = 'test rationale'): string =>
  JSON.stringify({ category, confidence, rationale });

export const replyJson = (reply: string): string => JSON.stringify({ reply });

// Answer a classification prompt with `category`, a response prompt with `reply`
export const answerBoth =
  (category: string, confidence: number, reply = 'Thanks for reaching out, we are on it.') =>
  (request: CompletionRequest): string => {
    const instructions = request.messages[0]?.content ?? '';
    return instructions.includes('Classify the customer email')
      ? classificationJson(category, confidence)
      : replyJson(reply);
  };

export const never = (): Promise<string> => new Promise<string>(() => undefined);

export interface ConfigPatch {
  gateway?: Partial<GatewaySettings>;
  pipeline?: Partial<PipelineSettings>;
  responses?: Partial<ResponseSettings>;
  guardrails?: Partial<GuardrailSettings>;
}

/**
 * Default configuration with instant backoff and short timeouts
 */
export function testConfig(patch: ConfigPatch = {}): PipelineConfig {
  const base = getDefaultPipelineConfig();
  return {
    ...base,
    gateway: {
      ...base.gateway,
      initialDelayMs: 0,
      maxDelayMs: 0,
      jitter: 0,
      requestTimeoutMs: 1000,
      ...patch.gateway,
    },
    pipeline: { ...base.pipeline, ...patch.pipeline },
    responses: { ...base.responses, ...patch.responses },
    guardrails: { ...base.guardrails, ...patch.guardrails },
  };
}

let emailCounter = 0;

export function makeEmail(overrides: Partial<EmailRecord> = {}): EmailRecord {
  emailCounter++;
  return freezeEmailRecord({
    id: `email-${emailCounter}`,
    sender: 'jane.doe@example.com',
    subject: 'Question about my account',
    body: 'Hello, I have a question.',
    receivedAt: new Date('2024-03-01T09:30:00Z'),
    metadata: {},
    ...overrides,
  });
}
