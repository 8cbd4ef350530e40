// Structured logging

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Default console logger implementation
 */
export const consoleLogger: Logger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[logitrace] [DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[logitrace] [INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[logitrace] [WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[logitrace] [ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
