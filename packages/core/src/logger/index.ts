/**
 * Pino logger with redaction
 *
 * Features:
 * - Redaction of personal data and credentials
 * - Correlation ID support for distributed tracing
 * - Pretty printing in development
 * - Structured JSON logging in production
 */

import { randomUUID } from 'node:crypto';

import pino, { type Logger, type LoggerOptions } from 'pino';

import { createCensor, REDACTION_PATHS } from './redaction.js';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Logger name, shown on every line */
  name?: string;
  /** Log level (default: based on NODE_ENV) */
  level?: string;
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Additional redaction paths */
  additionalRedactionPaths?: string[];
}

/**
 * Context that can be attached to log entries
 */
export interface LogContext {
  correlationId?: string;
  serviceType?: string;
  schoolId?: number;
  [key: string]: unknown;
}

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

/**
 * Build pino options; exported so Fastify can create its own instance
 */
export function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const { name = 'school-registry', level = getDefaultLevel(), additionalRedactionPaths = [] } =
    config;
  const pretty = config.pretty ?? isDevelopment();

  const options: LoggerOptions = {
    level,
    name,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: name,
      env: process.env.NODE_ENV ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'msg',
    redact: {
      paths: [...REDACTION_PATHS, ...additionalRedactionPaths],
      censor: createCensor,
    },
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    };
  }

  return options;
}

/**
 * Create a named logger
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino(createLoggerOptions(config));
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

export type { Logger, LoggerOptions } from 'pino';
