/**
 * Logger interface. Consumers can pass their own implementation
 * (console, pino, winston, ...) through the session config.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export const consoleLogger: Logger = {
  debug(message, data) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message, data) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message, data) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message, data) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Console output in development, silence otherwise
 */
export function defaultLogger(): Logger {
  return process.env.NODE_ENV === 'development' ? consoleLogger : noopLogger;
}
