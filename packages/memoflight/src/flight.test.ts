/**
 * Tests for flight.ts - One-shot shared result cell
 */
import { describe, it, expect } from "vitest";
import { createFlight } from "./flight";

describe("createFlight()", () => {
  it("starts pending", () => {
    const flight = createFlight<number>();
    expect(flight.state).toBe("pending");
  });

  it("delivers one value to every waiter", async () => {
    const flight = createFlight<string>();
    const waiters = [flight.promise, flight.promise, flight.promise];

    expect(flight.resolve("done")).toBe(true);

    await expect(Promise.all(waiters)).resolves.toEqual([
      "done",
      "done",
      "done",
    ]);
    expect(flight.state).toBe("fulfilled");
  });

  it("delivers one failure to every waiter", async () => {
    const flight = createFlight<string>();
    const failure = new Error("boom");
    const first = flight.promise;
    const second = flight.promise;

    expect(flight.reject(failure)).toBe(true);

    await expect(first).rejects.toBe(failure);
    await expect(second).rejects.toBe(failure);
    expect(flight.state).toBe("rejected");
  });

  it("ignores every settlement after the first", async () => {
    const flight = createFlight<number>();

    expect(flight.resolve(1)).toBe(true);
    expect(flight.resolve(2)).toBe(false);
    expect(flight.reject(new Error("late"))).toBe(false);

    await expect(flight.promise).resolves.toBe(1);
    expect(flight.state).toBe("fulfilled");
  });

  it("keeps a rejection once settled", async () => {
    const flight = createFlight<number>();
    const failure = new Error("first");

    flight.reject(failure);
    expect(flight.resolve(5)).toBe(false);

    await expect(flight.promise).rejects.toBe(failure);
  });
});
