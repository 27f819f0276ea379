import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Unique identifier for this task */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<T>;
}

export interface QueueOptions<T> {
  /** Maximum number of concurrent tasks (the worker count) */
  concurrency: number;
  /** Logger instance for queue operations */
  logger: Logger;
  /** Receives each task's result as it settles */
  onResult?: (id: string, result: T) => void;
  /** Aborting stops dispatch; in-flight tasks still finish */
  signal?: AbortSignal;
}

export interface QueueStats {
  /** Number of tasks waiting for a worker */
  pending: number;
  /** Number of tasks currently being processed */
  active: number;
  /** Number of tasks whose execute() resolved */
  completed: number;
  /** Number of tasks whose execute() threw */
  failed: number;
  /** Number of tasks dropped by cancellation before they started */
  cancelled: number;
  /** Total number of tasks processed (completed + failed) */
  totalProcessed: number;
  /** Average processing time in milliseconds */
  averageLatencyMs: number;
}

export interface WorkQueue<T> {
  /** Add a task; every task is handed to exactly one worker */
  enqueue(task: QueueTask<T>): void;
  /** Get current queue statistics */
  getStats(): QueueStats;
  /** Wait until no task is pending or active */
  drain(): Promise<void>;
  /** Stop dispatching; active tasks complete, pending ones are dropped */
  cancel(): void;
  /** Whether cancel() has been called */
  isCancelled(): boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Maximum number of latency samples to keep for rolling average */
const MAX_LATENCY_SAMPLES = 100;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded work queue.
 * Up to `concurrency` tasks run at once; each pending task is popped by
 * exactly one worker slot. There is no retry: a task runs once.
 */
export function createQueue<T>(options: QueueOptions<T>): WorkQueue<T> {
  const { concurrency, logger, onResult, signal } = options;
  const limit = Math.max(1, Math.floor(concurrency));

  const pending: QueueTask<T>[] = [];
  const active = new Set<string>();
  const latencies: number[] = [];
  const drainWaiters: Array<() => void> = [];

  let completed = 0;
  let failed = 0;
  let cancelled = 0;
  let stopped = false;

  function getStats(): QueueStats {
    const avgLatency =
      latencies.length > 0
        ? latencies.reduce((a, b) => a + b, 0) / latencies.length
        : 0;

    return {
      pending: pending.length,
      active: active.size,
      completed,
      failed,
      cancelled,
      totalProcessed: completed + failed,
      averageLatencyMs: Math.round(avgLatency),
    };
  }

  function checkDrainComplete(): void {
    if (pending.length === 0 && active.size === 0) {
      for (const resolve of drainWaiters.splice(0)) {
        resolve();
      }
    }
  }

  function processNext(): void {
    while (!stopped && active.size < limit && pending.length > 0) {
      const task = pending.shift();
      if (task) {
        void processTask(task);
      }
    }
    checkDrainComplete();
  }

  async function processTask(task: QueueTask<T>): Promise<void> {
    const startTime = Date.now();

    active.add(task.id);
    logger.debug("Task started", { taskId: task.id, active: active.size });

    try {
      const result = await task.execute();
      const latency = Date.now() - startTime;
      latencies.push(latency);
      if (latencies.length > MAX_LATENCY_SAMPLES) latencies.shift();

      completed++;
      logger.debug("Task completed", { taskId: task.id, latencyMs: latency });
      onResult?.(task.id, result);
    } catch (error) {
      failed++;
      logger.error("Task threw", {
        taskId: task.id,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      active.delete(task.id);
      processNext();
    }
  }

  function enqueue(task: QueueTask<T>): void {
    if (stopped) {
      cancelled++;
      logger.debug("Task dropped, queue cancelled", { taskId: task.id });
      return;
    }
    pending.push(task);
    processNext();
  }

  function drain(): Promise<void> {
    if (pending.length === 0 && active.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      drainWaiters.push(resolve);
    });
  }

  function cancel(): void {
    if (stopped) return;
    stopped = true;
    cancelled += pending.length;
    logger.info("Queue cancelled", { dropped: pending.length, active: active.size });
    pending.length = 0;
    checkDrainComplete();
  }

  if (signal?.aborted) {
    cancel();
  } else {
    signal?.addEventListener("abort", cancel, { once: true });
  }

  return {
    enqueue,
    getStats,
    drain,
    cancel,
    isCancelled: () => stopped,
  };
}
