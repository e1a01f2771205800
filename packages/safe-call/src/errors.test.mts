import { describe, expect, it } from "vitest";
import { inspect } from "node:util";

import {
  describePayload,
  isPanicError,
  isSafeCallError,
  isValidationError,
  PanicError,
  stackFrames,
  UNPRINTABLE_PAYLOAD,
  ValidationError,
} from "./errors.mjs";

describe("Error Types", () => {
  describe("ValidationError", () => {
    it("should carry the message verbatim", () => {
      const error = new ValidationError("invalid port: -1");

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe("invalid port: -1");
      expect(error.name).toBe("ValidationError");
      expect(error.tag).toBe("validation");
    });
  });

  describe("PanicError", () => {
    it("should embed payload text and trace in the message", () => {
      const error = new PanicError(
        "boom",
        "boom",
        "at parse (config.ts:1:1)\nat load (config.ts:9:3)",
      );

      expect(error.message).toBe(
        "panic occurred: boom\nStack trace:\nat parse (config.ts:1:1)\nat load (config.ts:9:3)",
      );
      expect(error.name).toBe("PanicError");
      expect(error.tag).toBe("panic");
    });

    it("should keep the thrown value as payload and cause", () => {
      const thrown = { code: 7 };
      const error = new PanicError(thrown, "{ code: 7 }", "");

      expect(error.payload).toBe(thrown);
      expect(error.cause).toBe(thrown);
      expect(error.payloadText).toBe("{ code: 7 }");
      expect(error.message).toBe("panic occurred: { code: 7 }\nStack trace:\n");
    });
  });

  describe("type guards", () => {
    const validation = new ValidationError("bad");
    const panic = new PanicError("boom", "boom", "");

    it("should narrow by tag", () => {
      expect(isValidationError(validation)).toBe(true);
      expect(isValidationError(panic)).toBe(false);
      expect(isPanicError(panic)).toBe(true);
      expect(isPanicError(validation)).toBe(false);
    });

    it("should reject foreign values", () => {
      expect(isPanicError(new Error("boom"))).toBe(false);
      expect(isPanicError({ tag: "panic", message: "boom" })).toBe(false);
      expect(isValidationError(null)).toBe(false);
      expect(isSafeCallError("validation")).toBe(false);
    });

    it("should accept both library errors in isSafeCallError", () => {
      expect(isSafeCallError(validation)).toBe(true);
      expect(isSafeCallError(panic)).toBe(true);
      expect(isSafeCallError(new TypeError("nope"))).toBe(false);
    });
  });

  describe("describePayload", () => {
    it("should use strings verbatim", () => {
      expect(describePayload("panic test")).toBe("panic test");
      expect(describePayload("")).toBe("");
    });

    it("should use the message of errors", () => {
      expect(describePayload(new RangeError("out of range"))).toBe(
        "out of range",
      );
    });

    it("should inspect other values on one line", () => {
      expect(describePayload(42)).toBe("42");
      expect(describePayload(null)).toBe("null");
      expect(describePayload(undefined)).toBe("undefined");
      expect(describePayload({ code: 7 })).toBe("{ code: 7 }");
      expect(describePayload(["a", 1])).toBe("[ 'a', 1 ]");
    });

    it("should fall back to a fixed text when describing throws", () => {
      const revoked = Proxy.revocable({}, {});
      revoked.revoke();
      const withThrowingMessage = new Error("hidden");
      Object.defineProperty(withThrowingMessage, "message", {
        get() {
          throw new Error("getter");
        },
      });

      expect(describePayload(revoked.proxy)).toBe("<unprintable payload>");
      expect(describePayload(withThrowingMessage)).toBe(UNPRINTABLE_PAYLOAD);
      expect(
        describePayload({
          [inspect.custom]: () => {
            throw new Error("inspect broke");
          },
        }),
      ).toBe(UNPRINTABLE_PAYLOAD);
    });
  });

  describe("stackFrames", () => {
    const stack = [
      "Error: failed",
      "    at parse (config.ts:1:1)",
      "    at load (config.ts:9:3)",
      "    at main (index.ts:4:2)",
      "",
    ].join("\n");

    it("should keep only the frame lines, trimmed", () => {
      expect(stackFrames(stack)).toEqual([
        "at parse (config.ts:1:1)",
        "at load (config.ts:9:3)",
        "at main (index.ts:4:2)",
      ]);
    });

    it("should cap the number of frames", () => {
      expect(stackFrames(stack, 1)).toEqual(["at parse (config.ts:1:1)"]);
      expect(stackFrames(stack, 0)).toEqual([]);
    });

    it("should drop multi-line message text", () => {
      const multiline = "Error: first\nsecond line\n    at run (job.ts:2:2)";
      expect(stackFrames(multiline)).toEqual(["at run (job.ts:2:2)"]);
    });
  });
});
