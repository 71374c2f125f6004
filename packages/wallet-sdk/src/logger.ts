/**
 * Logger used by the protocol engine. Defaults to console with a bracketed
 * component prefix; hosts may inject their own.
 */
export interface ProtocolLogger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createConsoleLogger(prefix = '[linksign]'): ProtocolLogger {
  return {
    debug: (message) => console.debug(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, err) => {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}:`, err instanceof Error ? err.message : err);
      }
    },
  };
}
