import type { QueueLogger } from "./types.js";

export const silentLogger: QueueLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Logger for callers that are not embedded in a host with its own logger. */
export function createConsoleLogger(options: { debug?: boolean } = {}): QueueLogger {
  return {
    debug: options.debug ? (message) => console.debug(message) : undefined,
    info: (message) => console.info(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
}
