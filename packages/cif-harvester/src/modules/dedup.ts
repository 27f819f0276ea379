import { Command } from "commander";
import chalk from "chalk";
import { copyFile, writeFile } from "fs/promises";
import { createContext, type CLIContext, type GlobalOptions } from "../lib/cli-context.js";
import { dedupeLines, readListFile } from "../lib/id-list.js";
import { outputSuccess, type DedupResultJson } from "../lib/json-output.js";

export const BACKUP_SUFFIX = ".bak";

/**
 * Rewrite a list file without duplicate or blank lines.
 * The original is copied to `<file>.bak` first; an already clean file is
 * left alone and no backup is made.
 */
export async function dedupFile(path: string): Promise<DedupResultJson> {
  const content = await readListFile(path);
  const { lines, removedDuplicates, removedBlank } = dedupeLines(content);
  const rewritten = lines.length > 0 ? `${lines.join("\n")}\n` : "";

  if (rewritten === content) {
    return { path, kept: lines.length, removedDuplicates, removedBlank, changed: false };
  }

  const backupPath = `${path}${BACKUP_SUFFIX}`;
  await copyFile(path, backupPath);
  await writeFile(path, rewritten, "utf-8");

  return { path, backupPath, kept: lines.length, removedDuplicates, removedBlank, changed: true };
}

export function formatDedupResult(result: DedupResultJson): string[] {
  if (!result.changed) {
    return [chalk.gray(`${result.path} is already clean (${result.kept} lines)`)];
  }
  return [
    `${chalk.green("✓")} Removed ${result.removedDuplicates} duplicate and ${result.removedBlank} blank line(s), kept ${result.kept}`,
    chalk.gray(`Original saved as ${result.backupPath}`),
  ];
}

export async function runDedup(path: string, context: CLIContext): Promise<DedupResultJson> {
  const result = await dedupFile(path);
  if (context.mode === "json") {
    outputSuccess(result);
  } else {
    for (const line of formatDedupResult(result)) {
      console.log(line);
    }
  }
  return result;
}

export function registerDedupCommand(program: Command): void {
  program
    .command("dedup")
    .description("Remove duplicate and blank lines from an identifier list, keeping first occurrences")
    .argument("<file>", "List file to rewrite in place")
    .action(async (file: string, _options: unknown, command: Command) => {
      await runDedup(file, createContext(command.optsWithGlobals<GlobalOptions>()));
    });
}
