// Console logging for the main process

// Safe logging that won't crash on EPIPE
export function log(...args: unknown[]): void {
  try {
    console.log(...args);
  } catch {
    // Ignore write errors
  }
}

export function logError(...args: unknown[]): void {
  try {
    console.error(...args);
  } catch {
    // Ignore write errors
  }
}

/**
 * Create a scoped logger that prefixes every line with `[scope]`.
 *
 * Usage:
 *   const log = debug('catalog');
 *   log('validated', { topology, source });
 */
export function debug(scope: string, enabled = true) {
  const prefix = `[${scope}]`;
  const scoped = (...args: unknown[]) => {
    if (enabled) {
      log(prefix, ...args);
    }
  };
  scoped.error = (...args: unknown[]) => {
    logError(prefix, ...args);
  };
  return scoped;
}

export type Logger = ReturnType<typeof debug>;
