/**
 * warden-jwt - Logging
 *
 * Leveled logging on top of `console`. Debug output is off unless the
 * `WARDEN_LOG_DEBUG` environment variable is `1` or `true`.
 */

import type { WardenLogger } from '../types';

const LOG_PREFIX = '[warden]';

function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
  return env.WARDEN_LOG_DEBUG === '1' || env.WARDEN_LOG_DEBUG === 'true';
}

function format(message: string): string {
  return `${LOG_PREFIX} ${message}`;
}

/**
 * Create a logger writing to `console`.
 *
 * @param env - environment consulted for `WARDEN_LOG_DEBUG`
 */
export function createConsoleLogger(env: NodeJS.ProcessEnv = process.env): WardenLogger {
  const debug = isDebugEnabled(env);
  return {
    debug: (message, context) => {
      if (debug) console.debug(format(message), context ?? {});
    },
    info: (message, context) => console.info(format(message), context ?? {}),
    warn: (message, context) => console.warn(format(message), context ?? {}),
    error: (message, context) => console.error(format(message), context ?? {}),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: WardenLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
