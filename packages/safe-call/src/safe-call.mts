/**
 * @module safe-call
 * @description Wrappers that turn a throwing computation into a returned error
 * @since 2026-10-19
 */

import { debuglog } from "node:util";

import type { SafeCallConfig } from "./config.mjs";
import type { MaybeError } from "./errors.mjs";

import { resolveConfig } from "./config.mjs";
import { describePayload, PanicError, stackFrames } from "./errors.mjs";

const debug = debuglog("safecall");

/**
 * Callback that receives the error of a handler variant
 */
export type ErrorHandler = (error: Error) => void;

/**
 * Outcome of {@link SafeCallFamily.capture}
 */
export type Recovered<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: PanicError };

export interface SafeCallFamily {
  /**
   * Runs `fn` and returns what it returned, or the captured PanicError when it
   * throws.
   */
  capture<T>(fn: () => T): Recovered<T>;

  /**
   * Runs a computation returning an error (or `undefined`).
   * The returned error passes through unchanged; a throw becomes a PanicError.
   */
  safeCall(fn: () => MaybeError): MaybeError;

  /** Same as `safeCall` for a computation with no result and no error */
  safeCall0(fn: () => void): MaybeError;

  safeCall1<T>(
    fn: () => readonly [T, MaybeError],
  ): readonly [T | undefined, MaybeError];

  safeCall2<T1, T2>(
    fn: () => readonly [T1, T2, MaybeError],
  ): readonly [T1 | undefined, T2 | undefined, MaybeError];

  safeCall3<T1, T2, T3>(
    fn: () => readonly [T1, T2, T3, MaybeError],
  ): readonly [T1 | undefined, T2 | undefined, T3 | undefined, MaybeError];

  /**
   * Any-arity form: `fn` returns its values followed by an error.
   * When `fn` throws, `defaults` fill the value slots.
   */
  safeCallTuple<T extends readonly unknown[]>(
    fn: () => readonly [...T, MaybeError],
    defaults: readonly [...T],
  ): readonly [...T, MaybeError];

  safeCallWithHandler(fn: () => MaybeError, handler: ErrorHandler): void;

  safeCall0WithHandler(fn: () => void, handler: ErrorHandler): void;

  safeCall1WithHandler<T>(
    fn: () => readonly [T, MaybeError],
    handler: ErrorHandler,
  ): T | undefined;

  safeCall2WithHandler<T1, T2>(
    fn: () => readonly [T1, T2, MaybeError],
    handler: ErrorHandler,
  ): readonly [T1 | undefined, T2 | undefined];

  safeCall3WithHandler<T1, T2, T3>(
    fn: () => readonly [T1, T2, T3, MaybeError],
    handler: ErrorHandler,
  ): readonly [T1 | undefined, T2 | undefined, T3 | undefined];
}

/**
 * Create a safe-call wrapper family bound to a configuration
 *
 * @description
 * The configuration is resolved once; the returned functions hold no other
 * state, so a family can be shared freely. Handlers passed to the
 * `*WithHandler` variants run outside the protected region: if a handler
 * throws, that throw reaches the caller.
 *
 * @example
 * ```typescript
 * const { safeCall1 } = createSafeCall({
 *   maxStackFrames: 5,
 *   onPanic: (error) => logger.error(error.message),
 * });
 *
 * const [user, error] = safeCall1(() => [JSON.parse(raw) as User, undefined]);
 * ```
 */
export function createSafeCall(config: SafeCallConfig = {}): SafeCallFamily {
  const { captureStack, maxStackFrames, formatPayload, onPanic } =
    resolveConfig(config);

  const payloadText = (payload: unknown): string => {
    try {
      return formatPayload(payload);
    } catch (formatError) {
      debug(
        "formatPayload threw, using the default description: %s",
        describePayload(formatError),
      );
      return describePayload(payload);
    }
  };

  // frames of the throw site, when the payload is an Error with a string stack
  const throwSiteStack = (payload: unknown): string | undefined => {
    try {
      if (payload instanceof Error && typeof payload.stack === "string") {
        return payload.stack;
      }
    } catch (stackError) {
      debug(
        "could not read the stack of the thrown value: %s",
        describePayload(stackError),
      );
    }
    return undefined;
  };

  const captureTrace = (payload: unknown): string => {
    if (!captureStack) {
      return "";
    }
    // throw site first, then a snapshot of the capture site
    const stack =
      throwSiteStack(payload) ?? new Error("stack snapshot").stack ?? "";
    return stackFrames(stack, maxStackFrames).join("\n");
  };

  const toPanicError = (payload: unknown): PanicError => {
    const error = new PanicError(
      payload,
      payloadText(payload),
      captureTrace(payload),
    );
    debug("recovered from panic: %s", error.payloadText);

    if (onPanic) {
      try {
        onPanic(error);
      } catch (hookError) {
        debug("onPanic hook threw: %s", describePayload(hookError));
      }
    }
    return error;
  };

  const capture = <T,>(fn: () => T): Recovered<T> => {
    try {
      return { success: true, data: fn() };
    } catch (payload) {
      return { success: false, error: toPanicError(payload) };
    }
  };

  const safeCall = (fn: () => MaybeError): MaybeError => {
    const outcome = capture(fn);
    return outcome.success ? outcome.data : outcome.error;
  };

  const safeCall0 = (fn: () => void): MaybeError =>
    safeCall(() => {
      fn();
      return undefined;
    });

  const safeCallTuple = <T extends readonly unknown[],>(
    fn: () => readonly [...T, MaybeError],
    defaults: readonly [...T],
  ): readonly [...T, MaybeError] => {
    // a computation that throws never hands back its tuple, so nothing it
    // wrote before throwing can reach the caller
    const outcome = capture(fn);
    return outcome.success ? outcome.data : [...defaults, outcome.error];
  };

  const safeCall1 = <T,>(
    fn: () => readonly [T, MaybeError],
  ): readonly [T | undefined, MaybeError] =>
    safeCallTuple<[T | undefined]>(fn, [undefined]);

  const safeCall2 = <T1, T2>(
    fn: () => readonly [T1, T2, MaybeError],
  ): readonly [T1 | undefined, T2 | undefined, MaybeError] =>
    safeCallTuple<[T1 | undefined, T2 | undefined]>(fn, [undefined, undefined]);

  const safeCall3 = <T1, T2, T3>(
    fn: () => readonly [T1, T2, T3, MaybeError],
  ): readonly [T1 | undefined, T2 | undefined, T3 | undefined, MaybeError] =>
    safeCallTuple<[T1 | undefined, T2 | undefined, T3 | undefined]>(fn, [
      undefined,
      undefined,
      undefined,
    ]);

  const safeCallWithHandler = (
    fn: () => MaybeError,
    handler: ErrorHandler,
  ): void => {
    const error = safeCall(fn);
    if (error) {
      handler(error);
    }
  };

  const safeCall0WithHandler = (fn: () => void, handler: ErrorHandler): void => {
    const error = safeCall0(fn);
    if (error) {
      handler(error);
    }
  };

  const safeCall1WithHandler = <T,>(
    fn: () => readonly [T, MaybeError],
    handler: ErrorHandler,
  ): T | undefined => {
    const [result, error] = safeCall1(fn);
    if (error) {
      handler(error);
    }
    return result;
  };

  const safeCall2WithHandler = <T1, T2>(
    fn: () => readonly [T1, T2, MaybeError],
    handler: ErrorHandler,
  ): readonly [T1 | undefined, T2 | undefined] => {
    const [result1, result2, error] = safeCall2(fn);
    if (error) {
      handler(error);
    }
    return [result1, result2];
  };

  const safeCall3WithHandler = <T1, T2, T3>(
    fn: () => readonly [T1, T2, T3, MaybeError],
    handler: ErrorHandler,
  ): readonly [T1 | undefined, T2 | undefined, T3 | undefined] => {
    const [result1, result2, result3, error] = safeCall3(fn);
    if (error) {
      handler(error);
    }
    return [result1, result2, result3];
  };

  return {
    capture,
    safeCall,
    safeCall0,
    safeCall1,
    safeCall2,
    safeCall3,
    safeCallTuple,
    safeCallWithHandler,
    safeCall0WithHandler,
    safeCall1WithHandler,
    safeCall2WithHandler,
    safeCall3WithHandler,
  };
}

/**
 * Wrapper family bound to the default configuration
 */
export const defaultSafeCall: SafeCallFamily = createSafeCall();

export const {
  capture,
  safeCall,
  safeCall0,
  safeCall1,
  safeCall2,
  safeCall3,
  safeCallTuple,
  safeCallWithHandler,
  safeCall0WithHandler,
  safeCall1WithHandler,
  safeCall2WithHandler,
  safeCall3WithHandler,
} = defaultSafeCall;
