/**
 * Promise-based delay.
 * Resolves early when the optional signal aborts, so a cancelled run
 * does not sit out its politeness pauses.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Source of uniformly distributed numbers in [0, 1). */
export type RandomFn = () => number;
