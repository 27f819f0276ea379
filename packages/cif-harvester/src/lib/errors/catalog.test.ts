import { describe, it, expect } from "vitest";
import {
  emptyBody,
  failureReason,
  invalidConfig,
  networkError,
  requestTimeout,
  unexpectedStatus,
  unknownError,
} from "./catalog.js";

describe("error catalog", () => {
  it("lists several config issues as bullets", () => {
    const error = invalidConfig("config.yaml", ["fetch.batchSize: too big", "logging.level: unknown"]);

    expect(error.code).toBe("VALIDATION_CONFIG_INVALID");
    expect(error.details).toBe("• fetch.batchSize: too big\n• logging.level: unknown");
  });

  it("keeps a single config issue as is", () => {
    expect(invalidConfig("config.yaml", ["invalid YAML: bad indent"]).details).toBe("invalid YAML: bad indent");
  });

  it("wraps unknown values", () => {
    const error = unknownError("boom");

    expect(error.code).toBe("UNKNOWN_ERROR");
    expect(error.message).toBe("boom");
  });
});

describe("failureReason", () => {
  const url = "https://example.test/material/A/download/cif";

  it("maps request errors to short ledger details", () => {
    expect(failureReason(requestTimeout(url, 30_000))).toBe("timeout");
    expect(failureReason(emptyBody(url))).toBe("empty body");
    expect(failureReason(unexpectedStatus(url, 404, "Not Found"))).toBe("HTTP 404 Not Found");
    expect(failureReason(unexpectedStatus(url, 500, ""))).toBe("HTTP 500");
    expect(failureReason(networkError(url, new Error("socket hang up")))).toBe("network error: socket hang up");
  });

  it("falls back to the message of anything else", () => {
    expect(failureReason(new Error("EACCES: permission denied"))).toBe("EACCES: permission denied");
    expect(failureReason("plain")).toBe("plain");
  });
});
