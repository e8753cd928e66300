/**
 * Structured Logging with Correlation IDs
 *
 * One JSON line per event; correlation and assessment IDs come from the
 * AsyncLocalStorage context.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const reqContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    assessmentId: reqContext?.assessmentId,
    message,
    ...context,
  });
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return { message: error.message, name: error.name, code, stack: error.stack };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
