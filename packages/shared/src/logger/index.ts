/**
 * Structured logging for kubemend
 */

import { pino, type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type { Logger };

export interface LogContext {
  component?: string;
  namespace?: string;
  target?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'kubemend',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: Logger | null = null;

export function getLogger(): Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): Logger {
  return getLogger().child(context);
}

/**
 * Audit event for a finished remediation. Dashboards downstream key on
 * `event: 'remediation_outcome'`.
 */
export function logRemediationOutcome(outcome: {
  status: 'success' | 'failure';
  action: string;
  resourceName: string;
  namespace: string;
  previousValue?: string;
  newValue?: string;
  attempts: number;
  dryRun: boolean;
  errorCode?: string;
  errorDetail?: string;
}): void {
  const logger = getLogger();
  const summary = `Remediation ${outcome.action} on ${outcome.namespace}/${outcome.resourceName}: ${outcome.status}${
    outcome.dryRun ? ' (dry-run)' : ''
  }`;

  if (outcome.status === 'success') {
    logger.info({ event: 'remediation_outcome', ...outcome }, summary);
  } else {
    logger.error({ event: 'remediation_outcome', ...outcome }, summary);
  }
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
