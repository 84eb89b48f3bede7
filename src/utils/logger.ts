/**
 * Logging Utility
 *
 * Component-scoped console logging with a process-wide minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  component?: string;
  action?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minimumLevel: LogLevel = 'info';

/**
 * Set the lowest level that reaches the console
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Format a log message with context prefix.
 */
function formatMessage(context: LogContext, message: string): string {
  const parts: string[] = [];

  if (context.component) {
    parts.push(`[${context.component}]`);
  }
  if (context.action) {
    parts.push(`(${context.action})`);
  }

  const prefix = parts.length > 0 ? `${parts.join(' ')} ` : '';
  return `${prefix}${message}`;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

/**
 * Create a logger instance with optional default context.
 *
 * @example
 * const log = createLogger({ component: 'PlaybackEngine' });
 * log.warn('Decode loop did not exit in time', { action: 'stop' });
 * // Output: [PlaybackEngine] (stop) Decode loop did not exit in time
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  return {
    debug(message, context = {}) {
      if (!isEnabled('debug')) return;
      console.debug(formatMessage({ ...defaultContext, ...context }, message));
    },

    info(message, context = {}) {
      if (!isEnabled('info')) return;
      console.info(formatMessage({ ...defaultContext, ...context }, message));
    },

    warn(message, context = {}) {
      if (!isEnabled('warn')) return;
      console.warn(formatMessage({ ...defaultContext, ...context }, message));
    },

    error(message, error, context = {}) {
      if (!isEnabled('error')) return;
      const formattedMessage = formatMessage(
        { ...defaultContext, ...context },
        message
      );

      if (error) {
        console.error(formattedMessage, error);
      } else {
        console.error(formattedMessage);
      }
    },
  };
}

/**
 * Default logger instance for quick logging without context.
 */
export const log = createLogger();
