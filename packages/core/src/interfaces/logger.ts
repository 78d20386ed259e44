/** Structured logger accepted by the reconciliation run */
export interface RunLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/** Logger that discards everything */
export const silentLogger: RunLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
