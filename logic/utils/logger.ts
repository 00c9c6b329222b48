/**
 * Minimal logger contract shared by the app, entries and coordinators.
 * Mirrors the `log` / `error` pair that every long-lived object exposes.
 */
export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Create a console-backed logger that prefixes every line with a timestamp and a scope
 * @param scope - Scope shown in brackets (e.g. an entry id)
 * @param now - Clock used for the timestamp
 */
export function createConsoleLogger(scope: string, now: () => number = Date.now): Logger {
  const prefix = () => `${new Date(now()).toISOString()} [${scope}]`;
  return {
    log: (...args: unknown[]) => console.log(prefix(), ...args),
    error: (...args: unknown[]) => console.error(prefix(), ...args),
  };
}
