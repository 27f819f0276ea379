import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { access } from "fs/promises";
import { loadConfig } from "../lib/config.js";
import { createCommandLogger, createContext, type CLIContext, type GlobalOptions } from "../lib/cli-context.js";
import { ProgressLedger } from "../lib/ledger.js";
import { outputSuccess, type StatusResultJson } from "../lib/json-output.js";
import { isErrnoException } from "../lib/errors/types.js";
import type { Logger } from "../lib/logger.js";

export interface StatusOptions {
  log?: string;
  config?: string;
}

/**
 * Current state of every identifier in a ledger.
 * Failed identifiers come back oldest failure first.
 */
export async function summarizeLedger(path: string, logger: Logger): Promise<StatusResultJson> {
  const ledger = new ProgressLedger({ path, logger });
  const current = await ledger.load();

  let succeeded = 0;
  let entries = 0;
  const failures: StatusResultJson["failures"] = [];

  for (const [id, entry] of current) {
    const attempts = ledger.history(id).length;
    entries += attempts;
    if (entry.outcome === "success") {
      succeeded++;
    } else {
      failures.push({ id, detail: entry.detail, attempts, timestamp: entry.timestamp });
    }
  }
  failures.sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.id.localeCompare(b.id));

  return {
    ledgerPath: path,
    identifiers: current.size,
    succeeded,
    failed: failures.length,
    entries,
    malformedLines: ledger.malformedLines,
    failures,
  };
}

export function formatStatus(status: StatusResultJson): string[] {
  const counts = new CliTable3({
    head: [chalk.cyan("Identifiers"), chalk.cyan("Succeeded"), chalk.cyan("Failed"), chalk.cyan("Entries"), chalk.cyan("Malformed")],
  });
  counts.push([status.identifiers, status.succeeded, status.failed, status.entries, status.malformedLines]);

  const lines = [chalk.bold(`Ledger ${status.ledgerPath}`), counts.toString()];

  if (status.failures.length > 0) {
    const failures = new CliTable3({
      head: [chalk.cyan("Identifier"), chalk.cyan("Last reason"), chalk.cyan("Attempts"), chalk.cyan("Last attempt")],
    });
    for (const failure of status.failures) {
      failures.push([failure.id, failure.detail, failure.attempts, failure.timestamp]);
    }
    lines.push(chalk.bold("Currently failed:"), failures.toString());
  }
  return lines;
}

export async function runStatus(
  options: StatusOptions,
  context: CLIContext,
  env: NodeJS.ProcessEnv = process.env
): Promise<StatusResultJson> {
  const { config } = loadConfig({
    explicitPath: options.config,
    cli: { ledgerPath: options.log },
    env,
  });
  const logger = createCommandLogger(context, { level: config.logLevel, json: config.logJson });

  const status = await summarizeLedger(config.ledgerPath, logger);

  if (context.mode === "json") {
    outputSuccess(status);
    return status;
  }

  if (!(await exists(config.ledgerPath))) {
    console.log(chalk.gray(`No ledger at ${config.ledgerPath} yet`));
    return status;
  }
  for (const line of formatStatus(status)) {
    console.log(line);
  }
  return status;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return false;
    throw error;
  }
}

export function registerStatusCommand(program: Command, env?: NodeJS.ProcessEnv): void {
  program
    .command("status")
    .description("Summarise the progress ledger and list identifiers that currently fail")
    .option("--log <path>", "Progress ledger path (default: download_ledger.jsonl)")
    .option("--config <path>", "YAML config file")
    .action(async (options: StatusOptions, command: Command) => {
      await runStatus(options, createContext(command.optsWithGlobals<GlobalOptions>()), env);
    });
}
