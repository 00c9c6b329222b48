/**
 * Error Handling Utilities
 *
 * Error taxonomy for the tariff pipeline plus helpers for rendering and classifying errors.
 * This module has no I/O so it can be shared by the pure engines and the coordinators.
 */

/**
 * Extract error message from error object or value
 * @param error - Error object, string, or any value
 * @returns Error message as string
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for all errors raised by the tariff pipeline
 */
export class TariffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or HTTP failure while reaching the vendor (tariff API or token endpoint)
 */
export class TransportError extends TariffError {
  readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode;
  }
}

/**
 * Token invalid, expired or exhausted.
 * `retryable` is false once the token manager has reached its terminal state.
 */
export class AuthError extends TariffError {
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
  }
}

/**
 * Raw price data that cannot be turned into a consistent schedule
 */
export class MalformedScheduleError extends TariffError {}

/**
 * Not enough schedule coverage for a requested derivation
 */
export class InsufficientCoverageError extends TariffError {
  readonly requiredMinutes?: number;
  readonly coveredMinutes?: number;

  constructor(message: string, options: { requiredMinutes?: number; coveredMinutes?: number } = {}) {
    super(message);
    this.requiredMinutes = options.requiredMinutes;
    this.coveredMinutes = options.coveredMinutes;
  }
}

/**
 * Invalid configuration file or value
 */
export class ConfigError extends TariffError {}

/**
 * Whether retrying the same operation can succeed.
 * Bad data and terminal auth failures are never retried.
 * @param error - Any thrown value
 * @returns True for transport errors and retryable auth errors
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  if (error instanceof AuthError) {
    return error.retryable;
  }
  return false;
}

/**
 * Short classification used in log lines and coordinator failure reasons
 */
export function describeErrorKind(error: unknown): string {
  if (error instanceof TariffError) {
    return error.name;
  }
  return 'UnexpectedError';
}
