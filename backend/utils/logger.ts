import { Logger } from '@aws-lambda-powertools/logger';
import { createLocalLogger, LogMeta, PermissionsLogger, parseLogLevel } from './localLogger';

export type { LogMeta, PermissionsLogger } from './localLogger';

// Check if running locally
const isLocal = process.env.NODE_ENV !== 'production';

const powertoolsLogger = new Logger({
  serviceName: process.env.SERVICE_NAME || 'workspace-permissions',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  // Sample rate for debug logs in production (0-1, where 0.1 = 10%)
  sampleRateValue: process.env.LOG_SAMPLE_RATE ? parseFloat(process.env.LOG_SAMPLE_RATE) : 0.1,
});

powertoolsLogger.appendKeys({
  environment: process.env.NODE_ENV || 'development',
});

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

/**
 * Structured logger using AWS Lambda Powertools
 * In local development, wraps with human-readable formatting
 * In production, uses structured JSON logs
 */
export const logger: PermissionsLogger = isLocal ? createLocalLogger(powertoolsLogger) : {
  info: (message: string, meta?: LogMeta) => {
    powertoolsLogger.info(message, meta ?? {});
  },

  warn: (message: string, meta?: LogMeta) => {
    powertoolsLogger.warn(message, meta ?? {});
  },

  error: (message: string, error?: unknown, meta?: LogMeta) => {
    powertoolsLogger.error(message, { error: serializeError(error), ...meta });
  },

  debug: (message: string, meta?: LogMeta) => {
    powertoolsLogger.debug(message, meta ?? {});
  },

  addContext: (attributes: LogMeta) => {
    powertoolsLogger.appendKeys(attributes);
  },
};
