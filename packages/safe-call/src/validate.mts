import { format } from "node:util";

import { ValidationError } from "./errors.mjs";

/**
 * Creates an error when a condition is not met.
 *
 * The template uses printf-style placeholders (`%s`, `%d`, `%j`, `%o`, ...)
 * with `util.format` semantics; surplus arguments are appended.
 *
 * @example
 * ```typescript
 * validate(false, 'x:%s', 'y')?.message; // 'x:y'
 * validate(true, 'never formatted');     // undefined
 * ```
 */
export function validate(
  condition: boolean,
  template: string,
  ...args: unknown[]
): ValidationError | undefined {
  if (condition) {
    return undefined;
  }
  return new ValidationError(format(template, ...args));
}
