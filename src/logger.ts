// src/logger.ts
import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  /** Log level (default: based on NODE_ENV) */
  level?: string;
  serviceName?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
}

/**
 * Context attached to every line a pipeline run logs
 */
export interface LogContext {
  environment?: string;
  runId?: string;
  stage?: string;
  [key: string]: unknown;
}

// Provider outputs routinely carry connection strings and keys
export const REDACTION_PATHS = [
  'outputs.*.connectionString',
  'outputs.*.accountKey',
  'outputs.*.instrumentationKey',
  '*.connectionString',
  '*.accountKey',
  '*.instrumentationKey'
];

function getDefaultLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) {
    return envLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
}

function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const { level = getDefaultLevel(), serviceName = 'stackpipe' } = config;

  return {
    level,
    name: serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
      env: process.env.NODE_ENV ?? 'development'
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    messageKey: 'msg',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]'
    }
  };
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options = createLoggerOptions(config);
  const pretty = config.pretty ?? isDevelopment();

  if (pretty) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}'
      }
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return pino(options);
}

export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}
