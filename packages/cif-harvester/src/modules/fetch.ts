import { Command } from "commander";
import chalk from "chalk";
import { mkdir } from "fs/promises";
import { loadConfig, MAX_BATCH_SIZE, MAX_DELAY_MS, MIN_BATCH_SIZE, type ConfigOverrides } from "../lib/config.js";
import { createCommandLogger, createContext, type CLIContext, type GlobalOptions } from "../lib/cli-context.js";
import { readIdentifierList } from "../lib/id-list.js";
import { ProgressLedger } from "../lib/ledger.js";
import { ContentStore } from "../lib/content-store.js";
import { runFetchEngine, type FetchConfig, type FetchSummary } from "../lib/fetch-engine.js";
import { selectProgressReporter, type ProgressReporter } from "../lib/progress.js";
import { outputSuccess, type FetchResultJson } from "../lib/json-output.js";
import { parseIntegerOption, parseSecondsOption } from "../lib/options.js";
import { createRunId } from "../lib/run-id.js";
import { outputDirUncreatable } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import type { Clock } from "../lib/ports/clock.js";
import type { DelayFn, RandomFn } from "../lib/ports/timer.js";
import type { ResourceFetcher } from "../lib/ports/resource-fetcher.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import {
  createNodeFetchResourceFetcher,
  createProcessSignalHandler,
  INTERRUPTED_EXIT_CODE,
  systemClock,
} from "../lib/adapters/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Raw flag values as commander hands them over */
export interface FetchOptions {
  ids?: string;
  out?: string;
  timeout?: string;
  log?: string;
  batchSize?: string;
  urlTemplate?: string;
  minDelay?: string;
  maxDelay?: string;
  config?: string;
}

/**
 * Dependencies for a fetch run.
 * All have defaults for production use.
 */
export interface FetchDeps {
  fetcher?: ResourceFetcher;
  signalHandler?: SignalHandler;
  reporter?: ProgressReporter;
  delay?: DelayFn;
  random?: RandomFn;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

export interface FetchRunResult {
  summary: FetchSummary;
  exitCode: number;
}

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

/**
 * Turn fetch flags into config overrides; unset flags stay undefined so
 * lower-precedence sources show through.
 */
export function parseFetchFlags(options: FetchOptions): ConfigOverrides {
  return {
    idsPath: options.ids,
    outputDir: options.out,
    ledgerPath: options.log,
    timeoutMs: parseSecondsOption("timeout", options.timeout),
    batchSize: parseIntegerOption("batch-size", options.batchSize, MIN_BATCH_SIZE, MAX_BATCH_SIZE),
    urlTemplate: options.urlTemplate,
    minDelayMs: parseIntegerOption("min-delay", options.minDelay, 0, MAX_DELAY_MS),
    maxDelayMs: parseIntegerOption("max-delay", options.maxDelay, 0, MAX_DELAY_MS),
  };
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function toFetchResultJson(summary: FetchSummary, config: FetchConfig): FetchResultJson {
  return {
    summary: {
      total: summary.total,
      dispatched: summary.dispatched,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      duplicates: summary.duplicates,
      cancelled: summary.cancelled,
    },
    interrupted: summary.interrupted,
    failures: summary.failures,
    outputDir: config.outputDir,
    ledgerPath: config.ledgerPath,
  };
}

/**
 * Human-readable end-of-run summary. Per-failure reasons stay in the ledger.
 */
export function formatFetchSummary(summary: FetchSummary, config: FetchConfig): string[] {
  const lines: string[] = [];

  if (summary.interrupted) {
    lines.push(chalk.yellow("Interrupted, in-flight requests were recorded"));
  }
  if (summary.total === 0) {
    lines.push(chalk.gray(`No identifiers in ${config.idsPath}`));
  }

  lines.push(
    `${chalk.green(`✓ ${summary.succeeded} fetched`)}  ` +
      `${summary.failed > 0 ? chalk.red(`✗ ${summary.failed} failed`) : chalk.gray("0 failed")}  ` +
      chalk.gray(`${summary.skipped} skipped`)
  );

  const extras: string[] = [];
  if (summary.duplicates > 0) extras.push(`${summary.duplicates} duplicate ids ignored`);
  if (summary.cancelled > 0) extras.push(`${summary.cancelled} not started`);
  if (extras.length > 0) {
    lines.push(chalk.gray(extras.join(", ")));
  }

  if (summary.failed > 0) {
    lines.push(chalk.gray(`Failure reasons are in ${config.ledgerPath}; re-run to retry them`));
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

/**
 * Set up and run one fetch pass.
 * Setup failures throw CLIErrors; per-identifier failures never do.
 */
export async function runFetch(
  options: FetchOptions,
  context: CLIContext,
  deps: FetchDeps = {}
): Promise<FetchRunResult> {
  const { clock = systemClock, env = process.env } = deps;

  const { config, sources } = loadConfig({
    explicitPath: options.config,
    cli: parseFetchFlags(options),
    env,
  });

  const reporter = deps.reporter ?? selectProgressReporter(context.mode, { quiet: context.quiet });
  const logger = createCommandLogger(
    context,
    { level: config.logLevel, json: config.logJson },
    (line, level) => reporter.log(line, level)
  );
  logger.debug("Configuration loaded", { sources });

  const ids = await readIdentifierList(config.idsPath);

  try {
    await mkdir(config.outputDir, { recursive: true });
  } catch (error) {
    throw outputDirUncreatable(config.outputDir, errorMessage(error));
  }

  const runId = createRunId(clock, deps.random);
  const ledger = new ProgressLedger({ path: config.ledgerPath, logger, runId, clock });
  await ledger.load();

  const store = new ContentStore({ dir: config.outputDir, logger });
  await store.scan();

  const fetcher = deps.fetcher ?? createNodeFetchResourceFetcher({ userAgent: config.userAgent });
  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  const controller = new AbortController();
  signalHandler.onInterrupt(() => {
    logger.warn("Interrupt received, finishing in-flight requests");
    controller.abort();
  });

  const startedAt = clock.now();
  let summary: FetchSummary;
  try {
    summary = await runFetchEngine(ids, config, {
      fetcher,
      ledger,
      store,
      reporter,
      logger,
      delay: deps.delay,
      random: deps.random,
      signal: controller.signal,
    });
  } finally {
    signalHandler.removeAll();
  }

  if (context.mode === "json") {
    outputSuccess(toFetchResultJson(summary, config), {
      runId,
      durationMs: clock.now() - startedAt,
    });
  } else {
    for (const line of formatFetchSummary(summary, config)) {
      console.log(line);
    }
  }

  return { summary, exitCode: summary.interrupted ? INTERRUPTED_EXIT_CODE : 0 };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFetchCommand(program: Command, deps: FetchDeps = {}): void {
  program
    .command("fetch")
    .description("Download missing .cif files for a list of identifiers, resuming from the ledger")
    .option("--ids <path>", "Identifier list, one per line (default: missing_ids.txt)")
    .option("--out <dir>", "Output directory, created if absent (default: cif_downloads)")
    .option("--timeout <seconds>", "Per-request timeout in seconds (default: 30)")
    .option("--log <path>", "Progress ledger path (default: download_ledger.jsonl)")
    .option("--batch-size <n>", "Concurrent downloads, 1-64 (default: 5)")
    .option("--url-template <url>", "Download URL with an {id} placeholder")
    .option("--min-delay <ms>", "Minimum pause after each request (default: 500)")
    .option("--max-delay <ms>", "Maximum pause after each request (default: 1000)")
    .option("--config <path>", "YAML config file")
    .action(async (options: FetchOptions, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalOptions>());
      const { exitCode } = await runFetch(options, context, deps);
      if (exitCode !== 0) process.exitCode = exitCode;
    });
}
