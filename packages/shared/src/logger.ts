/**
 * Structured Logging with Correlation IDs
 *
 * Every line is a JSON object carrying the correlation ID, contract ID and
 * span ID from the AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    contractId: reqContext?.contractId,
    comparisonId: reqContext?.comparisonId,
    spanId: reqContext?.spanId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

/**
 * Flatten an unknown thrown value, following `cause` one level deep.
 */
export function serializeError(error: unknown): Record<string, unknown> | string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause instanceof Error) {
    serialized.cause = { name: error.cause.name, message: error.cause.message };
  }
  return serialized;
}

let stderrOnly = false;

/**
 * Send every log line to stderr, for processes whose stdout carries output.
 */
export function routeLogsToStderr(): void {
  stderrOnly = true;
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (!enabled('info')) return;
    const line = formatLog('INFO', message, context);
    if (stderrOnly) console.error(line);
    else console.log(line);
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error: serializeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (!enabled('debug')) return;
    const line = formatLog('DEBUG', message, context);
    if (stderrOnly) console.error(line);
    else console.debug(line);
  },
};
