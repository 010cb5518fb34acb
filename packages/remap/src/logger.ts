import type { RemapLogger } from "./types.js";

export const LOG_TAG = "hash-remap";

/** Console logger with a consistent "[tag] message" prefix */
export function createConsoleLogger(tag: string = LOG_TAG): RemapLogger {
  return {
    debug: (message) => console.debug(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
  };
}

/**
 * Gate `debug` behind a flag. Warnings always pass through.
 */
export function gateDebug(logger: RemapLogger, enabled: boolean): RemapLogger {
  if (enabled) return logger;
  return {
    debug: () => undefined,
    warn: (message) => logger.warn(message),
  };
}
