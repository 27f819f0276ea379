import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, type ConfigOverrides } from "../lib/config.js";
import { createCommandLogger, createContext, type CLIContext, type GlobalOptions } from "../lib/cli-context.js";
import { scrapeListing, type ScrapeStopReason, type ScrapeSummary } from "../lib/listing-scraper.js";
import { outputSuccess, type ScrapeResultJson } from "../lib/json-output.js";
import { parseIntegerOption, parseSecondsOption } from "../lib/options.js";
import { invalidOption } from "../lib/errors/catalog.js";
import type { Clock } from "../lib/ports/clock.js";
import type { DelayFn } from "../lib/ports/timer.js";
import type { ResourceFetcher } from "../lib/ports/resource-fetcher.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import {
  createNodeFetchResourceFetcher,
  createProcessSignalHandler,
  INTERRUPTED_EXIT_CODE,
  systemClock,
} from "../lib/adapters/index.js";

export interface ScrapeOptions {
  sid: string;
  out?: string;
  interval?: string;
  maxPages?: string;
  config?: string;
}

export interface ScrapeDeps {
  fetcher?: ResourceFetcher;
  signalHandler?: SignalHandler;
  delay?: DelayFn;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

export interface ScrapeRunResult {
  result: ScrapeResultJson;
  exitCode: number;
}

const STOP_DESCRIPTIONS: Record<ScrapeStopReason, string> = {
  "no-rows": "page had no table rows",
  "no-links": "page had no material links",
  "last-page": "reached the last page",
  "max-pages": "reached --max-pages",
  interrupted: "interrupted",
};

export function defaultScrapeOutput(sid: number): string {
  return `qpod_sid${sid}_material_ids.txt`;
}

export function parseSid(value: string): number {
  const sid = parseIntegerOption("sid", value, 0);
  if (sid === undefined) throw invalidOption("sid", "is required");
  return sid;
}

export function parseScrapeFlags(options: ScrapeOptions): ConfigOverrides {
  return {
    scrapeIntervalMs: parseSecondsOption("interval", options.interval),
    scrapeMaxPages: parseIntegerOption("max-pages", options.maxPages, 1),
  };
}

export function formatScrapeSummary(result: ScrapeResultJson): string[] {
  return [
    `${chalk.green(`✓ ${result.added} new ids`)} from ${result.pagesFetched} page(s) of sid ${result.sid}`,
    chalk.gray(`${result.totalKnown} ids in ${result.outputPath}; stopped: ${STOP_DESCRIPTIONS[result.stopReason]}`),
  ];
}

function toScrapeResultJson(sid: number, outputPath: string, summary: ScrapeSummary): ScrapeResultJson {
  return { sid, outputPath, ...summary };
}

export async function runScrape(
  options: ScrapeOptions,
  context: CLIContext,
  deps: ScrapeDeps = {}
): Promise<ScrapeRunResult> {
  const { clock = systemClock, env = process.env } = deps;
  const sid = parseSid(options.sid);
  const outputPath = options.out ?? defaultScrapeOutput(sid);

  const { config } = loadConfig({
    explicitPath: options.config,
    cli: parseScrapeFlags(options),
    env,
  });
  const logger = createCommandLogger(context, { level: config.logLevel, json: config.logJson });

  const fetcher = deps.fetcher ?? createNodeFetchResourceFetcher({ userAgent: config.userAgent });
  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  const controller = new AbortController();
  signalHandler.onInterrupt(() => {
    logger.warn("Interrupt received, stopping after the current page");
    controller.abort();
  });

  const startedAt = clock.now();
  let summary: ScrapeSummary;
  try {
    summary = await scrapeListing(
      {
        sid,
        outputPath,
        listingUrlTemplate: config.listingUrlTemplate,
        intervalMs: config.scrapeIntervalMs,
        maxAttempts: config.scrapeMaxAttempts,
        maxPages: config.scrapeMaxPages,
        timeoutMs: config.timeoutMs,
        userAgent: config.userAgent,
      },
      { fetcher, logger, delay: deps.delay, signal: controller.signal }
    );
  } finally {
    signalHandler.removeAll();
  }

  const result = toScrapeResultJson(sid, outputPath, summary);
  if (context.mode === "json") {
    outputSuccess(result, { durationMs: clock.now() - startedAt });
  } else {
    for (const line of formatScrapeSummary(result)) {
      console.log(line);
    }
  }

  return {
    result,
    exitCode: summary.stopReason === "interrupted" ? INTERRUPTED_EXIT_CODE : 0,
  };
}

export function registerScrapeCommand(program: Command, deps: ScrapeDeps = {}): void {
  program
    .command("scrape")
    .description("Collect material ids from the listing table into an identifier list")
    .requiredOption("--sid <n>", "Listing table id")
    .option("--out <file>", "Identifier list to append to (default: qpod_sid<sid>_material_ids.txt)")
    .option("--interval <seconds>", "Pause between pages (default: 5)")
    .option("--max-pages <n>", "Stop after this many pages")
    .option("--config <path>", "YAML config file")
    .action(async (options: ScrapeOptions, command: Command) => {
      const context = createContext(command.optsWithGlobals<GlobalOptions>());
      const { exitCode } = await runScrape(options, context, deps);
      if (exitCode !== 0) process.exitCode = exitCode;
    });
}
