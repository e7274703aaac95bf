/**
 * @module logger
 *
 * Minimal logging seam. Defaults to the console; callers embedding the
 * pipeline in a service can pass their own.
 */

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function write(
  fn: (...args: unknown[]) => void,
  message: string,
  context?: Record<string, unknown>,
): void {
  if (context) {
    fn(`[array-ld] ${message}`, context);
  } else {
    fn(`[array-ld] ${message}`);
  }
}

export const consoleLogger: Logger = {
  debug: (message, context) => write(console.debug, message, context),
  info: (message, context) => write(console.info, message, context),
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
