import { describe, it, expect } from "vitest";
import { parseIntegerOption, parseSecondsOption } from "./options.js";

describe("parseIntegerOption", () => {
  it("passes undefined through", () => {
    expect(parseIntegerOption("batch-size", undefined, 1, 64)).toBeUndefined();
  });

  it("parses values in range", () => {
    expect(parseIntegerOption("batch-size", "8", 1, 64)).toBe(8);
    expect(parseIntegerOption("min-delay", "0", 0)).toBe(0);
  });

  it("rejects values out of range or not whole", () => {
    expect(() => parseIntegerOption("batch-size", "65", 1, 64)).toThrow(
      'Invalid --batch-size: expected an integer from 1 to 64, got "65"'
    );
    expect(() => parseIntegerOption("batch-size", "2.5", 1, 64)).toThrow(/expected an integer/);
    expect(() => parseIntegerOption("min-delay", "-1", 0)).toThrow(
      'Invalid --min-delay: expected an integer at least 0, got "-1"'
    );
    expect(() => parseIntegerOption("sid", "", 0)).toThrow(/expected an integer/);
  });
});

describe("parseSecondsOption", () => {
  it("converts seconds to milliseconds", () => {
    expect(parseSecondsOption("timeout", "30")).toBe(30_000);
    expect(parseSecondsOption("timeout", "0.5")).toBe(500);
  });

  it("rejects zero and non-numbers", () => {
    expect(() => parseSecondsOption("timeout", "0")).toThrow(
      'Invalid --timeout: expected a positive number of seconds, got "0"'
    );
    expect(() => parseSecondsOption("timeout", "soon")).toThrow(/positive number/);
  });
});
