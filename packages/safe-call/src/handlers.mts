/**
 * Error handlers for the `*WithHandler` wrappers
 * Pure helpers; the consumer decides where the output goes
 */

import type { ErrorHandler } from "./safe-call.mjs";

import { isPanicError, isSafeCallError } from "./errors.mjs";

/**
 * Anything shaped like a logger method: `logger.error`, `console.error`, ...
 */
export type LogSink = (message: string, meta: Record<string, unknown>) => void;

export interface LoggableFormatOptions {
  /** Include the captured trace of a PanicError */
  readonly includeTrace?: boolean;
  readonly includeTimestamp?: boolean;
}

/**
 * One-line summary of an error for a log message
 */
export const summarize = (error: Error): string =>
  isPanicError(error) ? `recovered panic: ${error.payloadText}` : error.message;

/**
 * Transform an error into a loggable record
 *
 * @description
 * `message` is the one-line summary, so a panic record carries no stack
 * frames unless `includeTrace` is set.
 *
 * @example
 * ```typescript
 * const error = safeCall(() => { throw 'boom'; });
 * if (error) {
 *   myLogger.error(toLoggableFormat(error, { includeTrace: true }));
 * }
 * ```
 */
export const toLoggableFormat = (
  error: Error,
  options?: LoggableFormatOptions,
): Record<string, unknown> => ({
  ...(isSafeCallError(error) ? { tag: error.tag } : {}),
  name: error.name,
  message: summarize(error),
  ...(isPanicError(error) ? { payload: error.payloadText } : {}),
  ...(options?.includeTrace && isPanicError(error)
    ? { trace: error.trace }
    : {}),
  ...(options?.includeTimestamp
    ? { timestamp: new Date().toISOString() }
    : {}),
});

/**
 * Create a handler that reports every error to a log sink
 *
 * @example
 * ```typescript
 * const onError = createLoggingHandler((msg, meta) => logger.error(msg, meta));
 * const config = safeCall1WithHandler(() => loadConfig(path), onError);
 * ```
 */
export const createLoggingHandler =
  (sink: LogSink, options?: LoggableFormatOptions): ErrorHandler =>
  (error) => {
    sink(summarize(error), toLoggableFormat(error, options));
  };
