/** Injection token for the logger used by application services. */
export const LOGGER_SERVICE = Symbol('LOGGER_SERVICE');

/** Structured fields appended to a log line. */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logging port. Services depend on this instead of a concrete logger,
 * so tests can pass a jest.fn() stand-in.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}
