/**
 * Configuration of a safe-call wrapper family
 */

import type { PanicError } from "./errors.mjs";

import { describePayload } from "./errors.mjs";

export interface SafeCallConfig {
  /** Include stack frames in the PanicError trace (default: true) */
  readonly captureStack?: boolean;
  /** Keep at most this many frames in the trace (default: Infinity) */
  readonly maxStackFrames?: number;
  /** Text form of a thrown value used in the PanicError message */
  readonly formatPayload?: (payload: unknown) => string;
  /** Called with every PanicError right after it is captured */
  readonly onPanic?: (error: PanicError) => void;
}

export type ResolvedSafeCallConfig = Required<Omit<SafeCallConfig, "onPanic">> &
  Pick<SafeCallConfig, "onPanic">;

/**
 * Default safe-call configuration
 */
export const defaultConfig: Required<Omit<SafeCallConfig, "onPanic">> = {
  captureStack: true,
  maxStackFrames: Infinity,
  formatPayload: describePayload,
};

/**
 * Merge a partial configuration with the defaults
 */
export function resolveConfig(
  config: SafeCallConfig = {},
): ResolvedSafeCallConfig {
  const maxStackFrames = config.maxStackFrames ?? defaultConfig.maxStackFrames;

  return {
    captureStack: config.captureStack ?? defaultConfig.captureStack,
    // whole, non-negative frame count; NaN falls back to the default
    maxStackFrames: Number.isNaN(maxStackFrames)
      ? defaultConfig.maxStackFrames
      : Math.max(0, Math.floor(maxStackFrames)),
    formatPayload: config.formatPayload ?? defaultConfig.formatPayload,
    onPanic: config.onPanic,
  };
}
