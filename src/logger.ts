/**
 * Console-backed logging
 *
 * Debug lines are printed only when TOOLBOX_CLIENT_DEBUG is set to 1/true.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function debugEnabled(env: NodeJS.ProcessEnv): boolean {
  const flag = env.TOOLBOX_CLIENT_DEBUG?.toLowerCase();
  return flag === '1' || flag === 'true';
}

/**
 * Create a logger whose lines are prefixed with `[scope]`
 */
export function createLogger(scope: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const prefix = `[${scope}]`;
  const verbose = debugEnabled(env);

  return {
    debug(message, ...details) {
      if (verbose) {
        console.debug(prefix, message, ...details);
      }
    },
    info(message, ...details) {
      console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    }
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
