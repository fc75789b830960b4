/**
 * Pluggable logger. The library is silent unless a logger is passed in.
 * Callers must only ever hand non-secret metadata to a logger.
 */

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Console-backed logger, e.g. `consoleLogger('[token-access]')`.
 */
export function consoleLogger(prefix = '[ta-crypto]'): Logger {
  return {
    debug(message, meta) {
      if (meta) console.debug(`${prefix} ${message}`, meta);
      else console.debug(`${prefix} ${message}`);
    },
    warn(message, meta) {
      if (meta) console.warn(`${prefix} ${message}`, meta);
      else console.warn(`${prefix} ${message}`);
    },
  };
}
