import { describe, expect, it } from "vitest";
import {
  createMemoCache,
  makeKey,
  normalize,
  createBoundedStore,
  createFlight,
  CacheConfigError,
  FlightCancelledError,
  isMemoflightError,
  Duration,
  parseDuration,
} from "./index";
import { createTestClock, createDeferred } from "./testing-entry";

describe("named exports", () => {
  it("exposes the engine and its building blocks", () => {
    expect(typeof createMemoCache).toBe("function");
    expect(typeof makeKey).toBe("function");
    expect(typeof normalize).toBe("function");
    expect(typeof createBoundedStore).toBe("function");
    expect(typeof createFlight).toBe("function");
    expect(typeof isMemoflightError).toBe("function");
  });

  it("exposes error classes and duration helpers", () => {
    expect(new CacheConfigError({ option: "maxSize", value: 0, reason: "x" })._tag).toBe(
      "CacheConfigError"
    );
    expect(new FlightCancelledError({ key: "k", reason: "cleared" })._tag).toBe(
      "FlightCancelledError"
    );
    expect(parseDuration("2s")).toEqual(Duration.seconds(2));
  });

  it("exposes the testing helpers on their own entry", () => {
    expect(typeof createTestClock).toBe("function");
    expect(typeof createDeferred).toBe("function");
  });
});
