import { describe, it, expect } from "vitest";
import { createRunId } from "./run-id.js";

describe("createRunId", () => {
  it("combines a filename-safe timestamp with a random suffix", () => {
    const clock = { now: () => 0, isoNow: () => "2024-01-01T00:00:00.000Z" };

    expect(createRunId(clock, () => 0.5)).toBe("run_2024-01-01T00-00-00-000Z_i00000");
  });
});
