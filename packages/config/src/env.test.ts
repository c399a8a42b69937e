import { describe, it, expect } from 'vitest';
import { parseEnv, EnvError } from './env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(8080);
    expect(env.GROQ_API_KEY).toBe('');
    expect(env.GROQ_MODEL).toBe('llama-3.3-70b-versatile');
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.PIPELINE_CONFIG_PATH).toBeUndefined();
  });

  it('coerces the port', () => {
    expect(parseEnv({ PORT: '3000' }).PORT).toBe(3000);
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(EnvError);
  });
});
