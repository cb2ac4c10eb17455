import type { Logger } from '../types/types.js';

const noop = () => {};

/**
 * Wrap `logger` so debug lines are dropped unless `debug` is on. Warnings and
 * errors always pass through.
 */
export function gateLogger(logger: Logger, debug: boolean): Logger {
  if (debug) return logger;
  return {
    debug: noop,
    warn: (message) => logger.warn(message),
    error: (message, error) => logger.error(message, error),
  };
}
