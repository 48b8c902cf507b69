type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface ScopedLogger {
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
  debug: LoggerFn;
}

function debugEnabled(): boolean {
  const flag = process.env.FIQH_ADVISOR_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (level === 'debug' && !debugEnabled()) return;
  // stdout belongs to streamed answers and --json output; logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

/** Logger whose messages are prefixed with `[scope]`. */
export function createLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    info: (message, context) => emit('info', `${prefix} ${message}`, context),
    warn: (message, context) => emit('warn', `${prefix} ${message}`, context),
    error: (message, context) => emit('error', `${prefix} ${message}`, context),
    debug: (message, context) => emit('debug', `${prefix} ${message}`, context),
  };
}
