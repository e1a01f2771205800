/**
 * @module errors
 * @description Error values produced by the safe-call wrappers and the validator
 * @since 2026-10-19
 *
 * @remarks
 * Both error kinds are plain `Error` subclasses so they travel anywhere an
 * `Error` is expected. Each one carries a readonly discriminant `tag` for
 * narrowing, in the same way across the package.
 *
 * @example
 * ```typescript
 * import { isPanicError } from '@safecall/safe-call';
 *
 * function report(error: Error) {
 *   if (isPanicError(error)) {
 *     console.error('unexpected throw', error.payload);
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

import { inspect } from "node:util";

/**
 * "No error" is `undefined`; wrapped computations return this alongside
 * their values.
 */
export type MaybeError = Error | undefined;

/**
 * Error raised deliberately by a failed precondition
 *
 * @category Error Types
 * @since 2026-10-19
 *
 * @example
 * ```typescript
 * const error = validate(port > 0, 'invalid port: %d', port);
 * // error?.message === 'invalid port: -1'
 * ```
 */
export class ValidationError extends Error {
  /** Discriminator for type narrowing */
  readonly tag = "validation" as const;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error synthesized when a wrapped computation throws instead of returning
 *
 * @category Error Types
 * @since 2026-10-19
 *
 * @description
 * The message embeds the payload text and the captured trace:
 * `panic occurred: <payload-text>\nStack trace:\n<trace>`.
 * The thrown value itself is kept as `payload` and as `cause`.
 */
export class PanicError extends Error {
  /** Discriminator for type narrowing */
  readonly tag = "panic" as const;

  constructor(
    /** Whatever value was thrown */
    public readonly payload: unknown,
    /** Text form of the payload as it appears in the message */
    public readonly payloadText: string,
    /** Stack frames captured with the payload, one per line */
    public readonly trace: string,
  ) {
    super(`panic occurred: ${payloadText}\nStack trace:\n${trace}`, {
      cause: payload,
    });
    this.name = "PanicError";

    Object.setPrototypeOf(this, PanicError.prototype);
  }
}

/**
 * Every error this package creates
 */
export type SafeCallError = ValidationError | PanicError;

/**
 * Creates a type guard that checks the tag of a library error
 *
 * @internal
 */
function createTagTypeGuard<T extends SafeCallError>(tag: T["tag"]) {
  return (error: unknown): error is T =>
    error instanceof Error && "tag" in error && error.tag === tag;
}

/**
 * Type guard for ValidationError
 *
 * @category Type Guards
 * @since 2026-10-19
 */
export const isValidationError =
  createTagTypeGuard<ValidationError>("validation");

/**
 * Type guard for PanicError
 *
 * @category Type Guards
 * @since 2026-10-19
 *
 * @example
 * ```typescript
 * const error = safeCall(() => parseConfig(raw));
 * if (isPanicError(error)) {
 *   metrics.increment('config.parse.crash');
 * }
 * ```
 */
export const isPanicError = createTagTypeGuard<PanicError>("panic");

export const isSafeCallError = (error: unknown): error is SafeCallError =>
  isValidationError(error) || isPanicError(error);

/**
 * Text used for a thrown value that cannot be described without throwing
 */
export const UNPRINTABLE_PAYLOAD = "<unprintable payload>";

/**
 * Text form of a thrown value.
 * Strings are used verbatim, errors contribute their message, anything else
 * goes through `util.inspect` on a single line. Never throws: a value whose
 * description throws (a revoked proxy, a throwing getter or custom inspector)
 * yields {@link UNPRINTABLE_PAYLOAD}.
 *
 * @example
 * ```typescript
 * describePayload('boom');             // 'boom'
 * describePayload(new Error('boom'));  // 'boom'
 * describePayload({ code: 7 });        // '{ code: 7 }'
 * ```
 */
export const describePayload = (payload: unknown): string => {
  try {
    if (typeof payload === "string") {
      return payload;
    }
    if (payload instanceof Error) {
      return String(payload.message);
    }
    return inspect(payload, { breakLength: Infinity });
  } catch (_describeError) {
    return UNPRINTABLE_PAYLOAD;
  }
};

const isFrame = (line: string): boolean => line.trimStart().startsWith("at ");

/**
 * Keeps only the `at ...` lines of a V8 stack string, trimmed, capped at
 * `maxFrames`.
 */
export const stackFrames = (stack: string, maxFrames = Infinity): string[] =>
  stack
    .split("\n")
    .filter(isFrame)
    .map((line) => line.trim())
    .slice(0, maxFrames);
