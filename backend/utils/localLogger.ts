import type { Logger } from '@aws-lambda-powertools/logger';

/**
 * Human-readable logger for local development
 * Wraps PowerTools logger with a more readable format
 */

export type LogMeta = Record<string, unknown>;

export type LogLevelName = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface PermissionsLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  addContext(attributes: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevelName, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

export function parseLogLevel(value: string | undefined): LogLevelName {
  const upper = (value || '').toUpperCase();
  if (upper === 'ERROR' || upper === 'WARN' || upper === 'INFO' || upper === 'DEBUG') {
    return upper;
  }
  return 'INFO';
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return { message: String(error.message) };
  }
  return { message: String(error) };
}

export function formatMessage(level: LogLevelName, message: string, meta?: LogMeta): string {
  const timestamp = new Date().toISOString().split('T')[1].replace('Z', '');
  const levelColors: Record<LogLevelName, string> = {
    ERROR: colors.red,
    WARN: colors.yellow,
    INFO: colors.green,
    DEBUG: colors.dim,
  };

  const levelText = level.padEnd(5);
  let output = `${colors.dim}[${timestamp}]${colors.reset} ${levelColors[level]}${levelText}${colors.reset} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    // Only show important fields in dev
    const { error, objectType, objectPath, duration, statusCode, ...rest } = meta;

    if (error !== undefined) {
      const { message: errorText, stack } = describeError(error);
      output += `\n${colors.red}  └─ Error: ${errorText}${colors.reset}`;
      if (stack && level === 'ERROR') {
        output += `\n${colors.dim}     ${stack.split('\n').slice(1, 3).join('\n     ')}${colors.reset}`;
      }
    }

    const importantFields: string[] = [];
    if (objectType) importantFields.push(`type=${String(objectType)}`);
    if (objectPath) importantFields.push(`path=${String(objectPath)}`);
    if (duration) importantFields.push(`${String(duration)}ms`);
    if (statusCode) importantFields.push(`status=${String(statusCode)}`);

    if (importantFields.length > 0) {
      output += ` ${colors.dim}(${importantFields.join(', ')})${colors.reset}`;
    }

    // Show other fields if in debug mode
    if (process.env.LOG_LEVEL === 'DEBUG' && Object.keys(rest).length > 0) {
      output += `\n${colors.dim}  └─ ${JSON.stringify(rest, null, 2)}${colors.reset}`;
    }
  }

  return output;
}

export const createLocalLogger = (powertoolsLogger: Logger): PermissionsLogger => {
  // Store context for local logging
  let localContext: LogMeta = {};
  const threshold = LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL)];

  const write = (level: LogLevelName, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] > threshold) {
      return;
    }
    console.log(formatMessage(level, message, { ...localContext, ...meta }));
  };

  return {
    info: (message, meta) => write('INFO', message, meta),

    warn: (message, meta) => write('WARN', message, meta),

    error: (message, error, meta) => write('ERROR', message, { error, ...meta }),

    debug: (message, meta) => write('DEBUG', message, meta),

    addContext: (attributes) => {
      localContext = { ...localContext, ...attributes };
      // Also update PowerTools for consistency
      powertoolsLogger.appendKeys(attributes);
    },
  };
};
