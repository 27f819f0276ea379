/**
 * Abstraction for wall-clock time.
 * Ledger timestamps and run ids read from here so tests can pin them.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
  /** Current time as an ISO 8601 string */
  isoNow(): string;
}
