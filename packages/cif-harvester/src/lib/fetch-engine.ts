import type { Logger } from "./logger.js";
import type { ProgressLedger } from "./ledger.js";
import type { ContentStore } from "./content-store.js";
import { isSafeIdentifier } from "./content-store.js";
import type { ProgressReporter } from "./progress.js";
import type { FetchedResource, ResourceFetcher } from "./ports/resource-fetcher.js";
import type { DelayFn, RandomFn } from "./ports/timer.js";
import { realDelay } from "./adapters/real-timers.js";
import { createQueue } from "./queue.js";
import { uniqueIdentifiers } from "./id-list.js";
import { failureReason } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Everything a fetch run needs, resolved once up front */
export interface FetchConfig {
  idsPath: string;
  outputDir: string;
  ledgerPath: string;
  timeoutMs: number;
  batchSize: number;
  /** Download URL with an `{id}` placeholder */
  urlTemplate: string;
  userAgent: string;
  minDelayMs: number;
  maxDelayMs: number;
}

export type SkipReason = "ledger" | "artifact";

export type FetchOutcome =
  | { kind: "success"; id: string; detail: string; status: number; path: string }
  | { kind: "failed"; id: string; reason: string; status: number | null }
  | { kind: "skipped"; id: string; reason: SkipReason };

export type SkippedOutcome = Extract<FetchOutcome, { kind: "skipped" }>;

/** What a dispatched identifier can end in */
export type AttemptOutcome = Exclude<FetchOutcome, SkippedOutcome>;

export interface DispatchPlan {
  dispatch: string[];
  skipped: SkippedOutcome[];
  duplicates: number;
}

export interface FetchSummary {
  /** Identifiers in the input, duplicates included */
  total: number;
  dispatched: number;
  succeeded: number;
  failed: number;
  skipped: number;
  duplicates: number;
  /** Dispatched identifiers dropped before a worker took them */
  cancelled: number;
  interrupted: boolean;
  failures: Array<{ id: string; reason: string }>;
}

export interface FetchEngineDeps {
  fetcher: ResourceFetcher;
  ledger: ProgressLedger;
  store: ContentStore;
  reporter: ProgressReporter;
  logger: Logger;
  delay?: DelayFn;
  random?: RandomFn;
  /** Aborting stops dispatch; in-flight requests run to completion and are recorded */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Substitute an identifier into a download URL template.
 */
export function buildResourceUrl(template: string, id: string): string {
  return template.replaceAll("{id}", encodeURIComponent(id));
}

/**
 * Decide which identifiers need a request: duplicates collapse to the first
 * occurrence, then anything the ledger marks done or the store already holds
 * is skipped.
 */
export function planDispatch(
  ids: readonly string[],
  ledger: Pick<ProgressLedger, "isDone">,
  store: Pick<ContentStore, "has">
): DispatchPlan {
  const { ids: unique, duplicates } = uniqueIdentifiers(ids);
  const dispatch: string[] = [];
  const skipped: DispatchPlan["skipped"] = [];

  for (const id of unique) {
    if (ledger.isDone(id)) {
      skipped.push({ kind: "skipped", id, reason: "ledger" });
    } else if (store.has(id)) {
      skipped.push({ kind: "skipped", id, reason: "artifact" });
    } else {
      dispatch.push(id);
    }
  }

  return { dispatch, skipped, duplicates };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Fetch every missing identifier once, `batchSize` at a time.
 * Per-identifier failures are recorded and never abort the run.
 */
export async function runFetchEngine(
  ids: readonly string[],
  config: FetchConfig,
  deps: FetchEngineDeps
): Promise<FetchSummary> {
  const { fetcher, ledger, store, reporter, signal } = deps;
  const delay = deps.delay ?? realDelay;
  const random = deps.random ?? Math.random;
  const logger = deps.logger.child({ component: "engine" });

  const plan = planDispatch(ids, ledger, store);
  const summary: FetchSummary = {
    total: ids.length,
    dispatched: plan.dispatch.length,
    succeeded: 0,
    failed: 0,
    skipped: plan.skipped.length,
    duplicates: plan.duplicates,
    cancelled: 0,
    interrupted: false,
    failures: [],
  };

  logger.info("Dispatch planned", {
    total: summary.total,
    dispatch: summary.dispatched,
    skipped: summary.skipped,
    duplicates: summary.duplicates,
  });

  reporter.start(plan.dispatch.length);

  async function attempt(id: string): Promise<AttemptOutcome> {
    if (!isSafeIdentifier(id)) {
      return { kind: "failed", id, reason: "invalid identifier", status: null };
    }

    const url = buildResourceUrl(config.urlTemplate, id);
    let resource: FetchedResource;
    try {
      resource = await fetcher.get(url, {
        timeoutMs: config.timeoutMs,
        headers: { "User-Agent": config.userAgent },
      });
    } catch (error) {
      return { kind: "failed", id, reason: failureReason(error), status: null };
    }

    const { status, statusText, body } = resource;

    if (status !== 200) {
      const reason = statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`;
      return { kind: "failed", id, reason, status };
    }
    if (body.length === 0) {
      return { kind: "failed", id, reason: "empty body", status };
    }

    try {
      const path = await store.write(id, body);
      return { kind: "success", id, detail: "HTTP 200", status, path };
    } catch (error) {
      return { kind: "failed", id, reason: `write error: ${errorMessage(error)}`, status };
    }
  }

  async function politenessPause(): Promise<void> {
    if (config.maxDelayMs <= 0) return;
    const span = config.maxDelayMs - config.minDelayMs;
    await delay(Math.round(config.minDelayMs + random() * span), signal);
  }

  function tally(outcome: AttemptOutcome): void {
    if (outcome.kind === "success") {
      summary.succeeded++;
    } else {
      summary.failed++;
      summary.failures.push({ id: outcome.id, reason: outcome.reason });
    }
    reporter.advance({
      outcome,
      completed: summary.succeeded + summary.failed,
      total: summary.dispatched,
      succeeded: summary.succeeded,
      failed: summary.failed,
    });
  }

  const queue = createQueue<AttemptOutcome>({
    concurrency: config.batchSize,
    logger,
    onResult: (_id, outcome) => tally(outcome),
    signal,
  });

  for (const id of plan.dispatch) {
    queue.enqueue({
      id,
      execute: async () => {
        const outcome = await attempt(id);
        if (outcome.kind === "success") {
          await ledger.record(id, "success", outcome.detail, outcome.status);
          logger.debug("Fetched", { id, path: outcome.path });
        } else {
          await ledger.record(id, "failed", outcome.reason, outcome.status);
          logger.debug("Fetch failed", { id, reason: outcome.reason });
        }
        await politenessPause();
        return outcome;
      },
    });
  }

  await queue.drain();
  await ledger.flush();

  summary.cancelled = queue.getStats().cancelled;
  summary.interrupted = signal?.aborted ?? false;

  reporter.finish(summary);
  logger.info("Run finished", {
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
    cancelled: summary.cancelled,
  });

  return summary;
}
