export { type Env, EnvError, getEnv, parseEnv } from './env.js';
export {
  type PipelineConfig,
  type CategoryDefinition,
  type ClassificationSettings,
  type GatewaySettings,
  type PipelineSettings,
  type ResponseSettings,
  type GuardrailSettings,
  FALLBACK_CATEGORY,
  ResponsePolicy,
  FollowUpAction,
  PipelineConfigError,
  parsePipelineConfig,
  getDefaultPipelineConfig,
  loadPipelineConfig,
} from './pipeline-config.js';
