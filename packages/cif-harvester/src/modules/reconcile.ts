import { Command } from "commander";
import chalk from "chalk";
import { readdir, writeFile } from "fs/promises";
import { createContext, type CLIContext, type GlobalOptions } from "../lib/cli-context.js";
import { readIdentifierList, uniqueIdentifiers } from "../lib/id-list.js";
import { identifierFromArtifactName } from "../lib/content-store.js";
import { outputSuccess, type ReconcileResultJson } from "../lib/json-output.js";
import { inputNotReadable } from "../lib/errors/catalog.js";
import { errorMessage, isErrnoException } from "../lib/errors/types.js";

export interface ReconcileOptions {
  ids: string;
  out: string;
  missing: string;
}

export const DEFAULT_MISSING_PATH = "missing_ids.txt";

/**
 * Identifiers with an artifact in the store directory.
 * A directory that doesn't exist yet holds nothing.
 */
async function storedIdentifiers(dir: string): Promise<Set<string>> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return new Set();
    throw inputNotReadable(dir, errorMessage(error));
  }

  const ids = new Set<string>();
  for (const name of names) {
    const id = identifierFromArtifactName(name);
    if (id !== undefined) ids.add(id);
  }
  return ids;
}

/**
 * Compare an identifier list with the store and write the sorted missing
 * ids, one per line, for the next fetch run.
 */
export async function reconcile(options: ReconcileOptions): Promise<ReconcileResultJson> {
  const { ids: expected } = uniqueIdentifiers(await readIdentifierList(options.ids));
  const present = await storedIdentifiers(options.out);
  const expectedSet = new Set(expected);

  const missing = expected.filter((id) => !present.has(id)).sort();
  const extra = [...present].filter((id) => !expectedSet.has(id)).sort();

  await writeFile(options.missing, missing.length > 0 ? `${missing.join("\n")}\n` : "", "utf-8");

  return {
    expected: expected.length,
    present: expected.length - missing.length,
    missing,
    extra,
    missingPath: options.missing,
  };
}

export function formatReconcileResult(result: ReconcileResultJson): string[] {
  const lines = [
    `${result.expected} expected  ${chalk.green(`${result.present} present`)}  ` +
      (result.missing.length > 0 ? chalk.yellow(`${result.missing.length} missing`) : chalk.gray("0 missing")) +
      `  ${chalk.gray(`${result.extra.length} extra`)}`,
  ];

  if (result.missing.length > 0) {
    lines.push(chalk.bold("Missing:"), ...result.missing.map((id) => `  ${id}`));
  }
  if (result.extra.length > 0) {
    lines.push(chalk.bold("Not in the list:"), ...result.extra.map((id) => `  ${id}`));
  }
  lines.push(chalk.gray(`Missing ids written to ${result.missingPath}`));
  return lines;
}

export async function runReconcile(options: ReconcileOptions, context: CLIContext): Promise<ReconcileResultJson> {
  const result = await reconcile(options);
  if (context.mode === "json") {
    outputSuccess(result);
  } else {
    for (const line of formatReconcileResult(result)) {
      console.log(line);
    }
  }
  return result;
}

export function registerReconcileCommand(program: Command): void {
  program
    .command("reconcile")
    .description("Compare an identifier list with downloaded files and write the missing ids")
    .requiredOption("--ids <file>", "Identifier list")
    .requiredOption("--out <dir>", "Download directory")
    .option("--missing <file>", "Where to write missing ids", DEFAULT_MISSING_PATH)
    .action(async (options: ReconcileOptions, command: Command) => {
      await runReconcile(options, createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}
