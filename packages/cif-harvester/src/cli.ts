import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { registerFetchCommand, type FetchDeps } from "./modules/fetch.js";
import { registerScrapeCommand, type ScrapeDeps } from "./modules/scrape.js";
import { registerDedupCommand } from "./modules/dedup.js";
import { registerReconcileCommand } from "./modules/reconcile.js";
import { registerStatusCommand } from "./modules/status.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { outputModeFromArgv } from "./lib/output/mode.js";

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw).version;
}

export interface ProgramDeps {
  fetch?: FetchDeps;
  scrape?: ScrapeDeps;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const program = new Command()
    .name("cif-harvester")
    .description("Scrape material listings and resumably download their CIF files")
    .version(readVersion())
    .option("--json", "Output JSON instead of human-readable text")
    .option("-q, --quiet", "Suppress progress output and info logs")
    .option("-v, --verbose", "Debug logging");

  registerScrapeCommand(program, deps.scrape);
  registerDedupCommand(program);
  registerReconcileCommand(program);
  registerFetchCommand(program, deps.fetch);
  registerStatusCommand(program, deps.env);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    renderUnknownError(error, outputModeFromArgv(argv));
    process.exitCode = 1;
  }
}
