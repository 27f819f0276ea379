import type { Clock } from "./ports/clock.js";
import type { RandomFn } from "./ports/timer.js";
import { systemClock } from "./adapters/system-clock.js";

/**
 * Tag for the ledger entries one fetch run writes, e.g.
 * `run_2024-01-01T00-00-00-000Z_k3j9x0`.
 */
export function createRunId(clock: Clock = systemClock, random: RandomFn = Math.random): string {
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `run_${clock.isoNow().replace(/[:.]/g, "-")}_${suffix}`;
}
