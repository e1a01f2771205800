/**
 * @safecall/safe-call v1.0.0
 *
 * Synchronous safe execution wrappers: run a computation, turn a throw into
 * a returned error, optionally hand errors to a callback.
 */

// ============================================================================
// Errors
// ============================================================================

export type { MaybeError, SafeCallError } from "./errors.mjs";

export {
  ValidationError,
  PanicError,
  isValidationError,
  isPanicError,
  isSafeCallError,
  describePayload,
  UNPRINTABLE_PAYLOAD,
  stackFrames,
} from "./errors.mjs";

// ============================================================================
// Validation
// ============================================================================

export { validate } from "./validate.mjs";

// ============================================================================
// Configuration
// ============================================================================

export {
  defaultConfig,
  resolveConfig,
  type SafeCallConfig,
  type ResolvedSafeCallConfig,
} from "./config.mjs";

// ============================================================================
// Safe-call wrappers
// ============================================================================

export {
  createSafeCall,
  defaultSafeCall,
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
  type ErrorHandler,
  type Recovered,
  type SafeCallFamily,
} from "./safe-call.mjs";

// ============================================================================
// Error handlers
// ============================================================================

export {
  toLoggableFormat,
  summarize,
  createLoggingHandler,
  type LogSink,
  type LoggableFormatOptions,
} from "./handlers.mjs";
