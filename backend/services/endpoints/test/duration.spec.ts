// backend/services/endpoints/test/duration.spec.ts
import { describe, it, expect } from "vitest";
import {
  DurationParseError,
  HOUR,
  MICROSECOND,
  MILLISECOND,
  MINUTE,
  SECOND,
  formatDuration,
  parseDuration,
} from "../src/lib/duration";

describe("parseDuration", () => {
  it.each([
    ["0", 0n],
    ["30s", 30n * SECOND],
    ["1m30s", 90n * SECOND],
    ["2h45m", 2n * HOUR + 45n * MINUTE],
    ["1.5ms", 1_500_000n],
    ["100us", 100n * MICROSECOND],
    ["100µs", 100n * MICROSECOND],
    ["100μs", 100n * MICROSECOND],
    ["10ns", 10n],
    [".5s", 500n * MILLISECOND],
    ["1.s", SECOND],
    ["+5s", 5n * SECOND],
    ["-1.5h", -(HOUR + 30n * MINUTE)],
    ["-9223372036854775808ns", -(1n << 63n)],
  ])("parses %s", (text, expected) => {
    expect(parseDuration(text)).toBe(expected);
  });

  it.each([
    "",
    "-",
    "s",
    "30",
    ".s",
    "1x",
    "1S",
    "1.2.3s",
    "ten seconds",
    "9223372036854775808ns",
  ])("rejects %j", (text) => {
    expect(() => parseDuration(text)).toThrow(DurationParseError);
  });

  it("names the offending unit", () => {
    expect(() => parseDuration("5d")).toThrow('unknown unit "d" in duration "5d"');
  });
});

describe("formatDuration", () => {
  it.each([
    [0n, "0s"],
    [10n, "10ns"],
    [1_500n, "1.5µs"],
    [1_500_000n, "1.5ms"],
    [30n * SECOND, "30s"],
    [1_500n * MILLISECOND, "1.5s"],
    [90n * SECOND, "1m30s"],
    [HOUR, "1h0m0s"],
    [2n * HOUR + 45n * MINUTE, "2h45m0s"],
    [-90n * SECOND, "-1m30s"],
  ])("formats %s ns as %s", (d, expected) => {
    expect(formatDuration(d)).toBe(expected);
  });

  it("reads back what it writes", () => {
    for (const d of [1n, 999n, 1_001n * MICROSECOND, 61n * SECOND, 25n * HOUR + 1n]) {
      expect(parseDuration(formatDuration(d))).toBe(d);
    }
  });
});
