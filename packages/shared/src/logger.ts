/**
 * Structured Logging
 *
 * One JSON object per line. Each line names the correlation, run and document
 * it belongs to, so a batch of validations can be split apart afterwards.
 * `LOG_LEVEL=silent` turns logging off (the test setup does this).
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

function formatLog(level: Level, message: string, context?: LogContext): string {
  const runContext = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    runId: runContext?.runId,
    documentId: runContext?.documentId,
    message,
    ...context,
  });
}

function isSilenced(): boolean {
  return process.env.LOG_LEVEL === 'silent';
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production';
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (isSilenced()) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (isSilenced()) return;
    console.warn(formatLog('WARN', message, context));
  },

  /** `error` may be anything a step threw; non-Error values are stringified */
  error: (message: string, error?: unknown, context?: LogContext) => {
    if (isSilenced()) return;
    const detail =
      error instanceof Error ? { message: error.message, stack: error.stack, name: error.name } : String(error);
    console.error(formatLog('ERROR', message, { ...context, error: detail }));
  },

  debug: (message: string, context?: LogContext) => {
    if (isSilenced() || !debugEnabled()) return;
    console.debug(formatLog('DEBUG', message, context));
  },
};
