/**
 * Tests for errors.ts - Engine error types
 */
import { describe, it, expect } from "vitest";
import { TaggedError } from "./tagged-error";
import {
  CacheConfigError,
  FlightCancelledError,
  isCacheConfigError,
  isFlightCancelledError,
  isMemoflightError,
} from "./errors";

describe("Engine errors", () => {
  describe("CacheConfigError", () => {
    it("carries the rejected option", () => {
      const error = new CacheConfigError({
        option: "maxSize",
        value: 0,
        reason: "must be a positive integer",
      });
      expect(error._tag).toBe("CacheConfigError");
      expect(error.name).toBe("CacheConfigError");
      expect(error.option).toBe("maxSize");
      expect(error.value).toBe(0);
      expect(error.message).toBe(
        "CacheConfigError: Invalid maxSize (0) - must be a positive integer"
      );
    });

    it("is an Error", () => {
      const error = new CacheConfigError({
        option: "ttl",
        value: -1,
        reason: "must be a positive duration",
      });
      expect(error instanceof Error).toBe(true);
      expect(TaggedError.isTaggedError(error)).toBe(true);
    });
  });

  describe("FlightCancelledError", () => {
    it("carries the key and reason", () => {
      const error = new FlightCancelledError({ key: "k", reason: "cleared" });
      expect(error._tag).toBe("FlightCancelledError");
      expect(error.key).toBe("k");
      expect(error.reason).toBe("cleared");
      expect(error.message).toBe(
        "FlightCancelledError: In-flight computation for k was cleared"
      );
    });
  });

  describe("type guards", () => {
    const config = new CacheConfigError({
      option: "maxSize",
      value: -2,
      reason: "must be a positive integer",
    });
    const cancelled = new FlightCancelledError({
      key: "k",
      reason: "invalidated",
    });

    it("narrow by tag", () => {
      expect(isCacheConfigError(config)).toBe(true);
      expect(isCacheConfigError(cancelled)).toBe(false);
      expect(isFlightCancelledError(cancelled)).toBe(true);
      expect(isFlightCancelledError(config)).toBe(false);
    });

    it("separate engine errors from computation failures", () => {
      expect(isMemoflightError(config)).toBe(true);
      expect(isMemoflightError(cancelled)).toBe(true);
      expect(isMemoflightError(new Error("computation failed"))).toBe(false);
      expect(isMemoflightError("CacheConfigError")).toBe(false);
    });
  });
});

describe("TaggedError", () => {
  class StaleRead extends TaggedError("StaleRead") {
    constructor(readonly key: string) {
      super(`StaleRead: ${key}`, { cause: "clock skew" });
    }
  }

  it("sets tag, name and cause", () => {
    const error = new StaleRead("user:1");
    expect(error._tag).toBe("StaleRead");
    expect(error.name).toBe("StaleRead");
    expect(error.message).toBe("StaleRead: user:1");
    expect(error.cause).toBe("clock skew");
    expect(error.key).toBe("user:1");
  });

  it("recognizes only errors with a string tag", () => {
    expect(TaggedError.isTaggedError(new StaleRead("a"))).toBe(true);
    expect(TaggedError.isTaggedError(new Error("plain"))).toBe(false);
    expect(TaggedError.isTaggedError({ _tag: "StaleRead" })).toBe(false);
  });
});
