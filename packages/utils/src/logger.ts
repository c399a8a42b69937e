import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  service?: string;
  requestId?: string;
  runId?: string;
  emailId?: string;
  category?: string;
}

const isDevelopment = (process.env['NODE_ENV'] ?? 'development') === 'development';

const loggerOptions: pino.LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: process.env['SERVICE_NAME'] ?? 'inbox-triage',
    version: process.env['APP_VERSION'] ?? '1.0.0',
  },
};

if (isDevelopment) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export const logger: Logger = baseLogger;

export function createLogger(context: LogContext): Logger {
  return baseLogger.child(context);
}

export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}
