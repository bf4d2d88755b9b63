import type { Logger } from './types.js';

/** Default logger */
export const consoleLogger: Logger = console;

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
