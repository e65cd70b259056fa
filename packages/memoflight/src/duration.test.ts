/**
 * Tests for duration.ts - Duration helpers
 */
import { describe, it, expect } from "vitest";
import {
  Duration,
  millis,
  seconds,
  minutes,
  hours,
  days,
  toMillis,
  isDuration,
  parse,
  resolveMillis,
} from "./duration";

describe("Duration", () => {
  describe("constructors", () => {
    it("converts each unit to milliseconds", () => {
      expect(toMillis(millis(250))).toBe(250);
      expect(toMillis(seconds(2))).toBe(2_000);
      expect(toMillis(minutes(5))).toBe(300_000);
      expect(toMillis(hours(1))).toBe(3_600_000);
      expect(toMillis(days(1))).toBe(86_400_000);
    });

    it("exposes the same helpers on the namespace", () => {
      expect(Duration.seconds(30)).toEqual(seconds(30));
    });
  });

  describe("isDuration()", () => {
    it("recognizes durations", () => {
      expect(isDuration(minutes(1))).toBe(true);
    });

    it("rejects other values", () => {
      expect(isDuration(1000)).toBe(false);
      expect(isDuration({ millis: 1000 })).toBe(false);
      expect(isDuration(null)).toBe(false);
    });
  });

  describe("parse()", () => {
    it("parses single units", () => {
      expect(parse("500ms")).toEqual(millis(500));
      expect(parse("30s")).toEqual(seconds(30));
      expect(parse("5m")).toEqual(minutes(5));
      expect(parse("2h")).toEqual(hours(2));
      expect(parse("1d")).toEqual(days(1));
    });

    it("parses combined and spaced segments", () => {
      expect(parse("1h30m")).toEqual(millis(5_400_000));
      expect(parse(" 1m 30s ")).toEqual(millis(90_000));
    });

    it("accepts fractions and upper case", () => {
      expect(parse("1.5S")).toEqual(millis(1_500));
    });

    it("returns undefined for malformed input", () => {
      expect(parse("")).toBeUndefined();
      expect(parse("ten minutes")).toBeUndefined();
      expect(parse("10")).toBeUndefined();
      expect(parse("5m later")).toBeUndefined();
      expect(parse("-5s")).toBeUndefined();
    });
  });

  describe("resolveMillis()", () => {
    it("passes numbers through as milliseconds", () => {
      expect(resolveMillis(1200)).toBe(1200);
    });

    it("reads durations and strings", () => {
      expect(resolveMillis(seconds(3))).toBe(3_000);
      expect(resolveMillis("3s")).toBe(3_000);
    });

    it("returns undefined for an unparsable string", () => {
      expect(resolveMillis("soon")).toBeUndefined();
    });
  });
});
