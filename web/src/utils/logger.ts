/**
 * Scoped console logger.
 * debug/info only print when logging is enabled; warn/error always print.
 */

export interface Logger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, enabled = false): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, payload) {
      if (!enabled) return;
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`, payload ?? '');
    },
    info(message, payload) {
      if (!enabled) return;
      // eslint-disable-next-line no-console
      console.log(`${prefix} ${message}`, payload ?? '');
    },
    warn(message, payload) {
      console.warn(`${prefix} ${message}`, payload ?? '');
    },
    error(message, payload) {
      console.error(`${prefix} ${message}`, payload ?? '');
    },
    child(childScope) {
      return createLogger(childScope, enabled);
    },
  };
}
