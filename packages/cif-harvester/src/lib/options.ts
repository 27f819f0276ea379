import { invalidOption } from "./errors/catalog.js";

/**
 * Parse an integer flag value, throwing VALIDATION_INVALID_OPTION when it
 * is not a whole number in [min, max].
 */
export function parseIntegerOption(
  name: string,
  value: string | undefined,
  min: number,
  max = Number.MAX_SAFE_INTEGER
): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < min || n > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `from ${min} to ${max}`;
    throw invalidOption(name, `expected an integer ${range}, got "${value}"`);
  }
  return n;
}

/**
 * Parse a positive number of seconds into milliseconds.
 */
export function parseSecondsOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value.trim());
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds <= 0) {
    throw invalidOption(name, `expected a positive number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}
