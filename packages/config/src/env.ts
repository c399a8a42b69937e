import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

// Load .env file
dotenvConfig();

const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  PORT: z.coerce.number().int().min(0).default(8080),
  HOST: z.string().default('0.0.0.0'),

  // Remote model - the key is only required once a Groq transport is built
  GROQ_API_KEY: z.string().optional().default(''),
  GROQ_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),

  // Pipeline configuration file (YAML)
  PIPELINE_CONFIG_PATH: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Application
  APP_VERSION: z.string().default('1.0.0'),
  SERVICE_NAME: z.string().default('inbox-triage'),
});

export type Env = z.infer<typeof envSchema>;

export class EnvError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'EnvError';
  }
}

let cachedEnv: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new EnvError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}
